import type {NodeId, AbstractAxis} from './grid-types.js';
import type {GridTree, GridLayoutHost, MeasuredBox} from './grid-tree.js';
import type {PlacedMasonryItem} from './masonry.js';

export interface MasonryItemBaseline {
  nodeId: NodeId;
  gridAxisTrack: number;
  /**
   * Includes the leading margin. null when the item has no baseline.
   */
  baselineOffset: number | null;
  itemSize: number;
  leadingMargin: number;
}

export interface BaselineGroup {
  /**
   * Indices into the placed items
   */
  items: number[];
  maxBaseline: number;
}

export interface BaselineAdjustment {
  itemIndex: number;
  /**
   * Always positive
   */
  positionAdjustment: number;
}

export function shouldAlignBaseline(tree: GridTree, item: NodeId, masonryAxis: AbstractAxis) {
  const style = tree.gridItemStyle(item);
  const alignment = masonryAxis === 'block' ? style.alignSelf : style.justifySelf;
  return alignment === 'baseline';
}

function leadingMargin(tree: GridTree, item: NodeId, masonryAxis: AbstractAxis) {
  const {margin} = tree.gridItemStyle(item);
  return masonryAxis === 'block' ? margin.top : margin.left;
}

/**
 * The ascent of the item's first available font, scaled to its font size
 */
export function baselineFromFontMetrics(host: GridLayoutHost, item: NodeId): number | null {
  const metrics = host.fontMetrics?.(item);
  if (!metrics || metrics.upem <= 0) return null;
  return metrics.ascender * (metrics.fontSize / metrics.upem);
}

/**
 * Where the item's baseline is from its margin edge, taken from its layout or
 * estimated from its font
 */
export function extractItemBaseline(
  host: GridLayoutHost,
  item: NodeId,
  box: MeasuredBox,
  masonryAxis: AbstractAxis
): number | null {
  const baseline = box.firstBaseline ?? baselineFromFontMetrics(host, item);
  if (baseline == null) return null;
  return baseline + leadingMargin(host, item, masonryAxis);
}

/**
 * Shims that line up the baselines of the baseline-aligned items in each
 * grid-axis track. Items without a baseline align by their bottom margin edge.
 */
export function calculateBaselineAdjustments(
  host: GridLayoutHost,
  placed: readonly PlacedMasonryItem[],
  boxes: readonly MeasuredBox[],
  masonryAxis: AbstractAxis
): BaselineAdjustment[] {
  const baselines = new Map<number, MasonryItemBaseline>();
  const groups = new Map<number, BaselineGroup>();

  for (let i = 0; i < placed.length; i++) {
    const {nodeId, area} = placed[i];
    if (!shouldAlignBaseline(host, nodeId, masonryAxis)) continue;

    baselines.set(i, {
      nodeId,
      gridAxisTrack: area.gridAxisStart,
      baselineOffset: extractItemBaseline(host, nodeId, boxes[i], masonryAxis),
      itemSize: area.masonryAxisSize,
      leadingMargin: leadingMargin(host, nodeId, masonryAxis)
    });
  }

  const baselineOf = (b: MasonryItemBaseline) => b.baselineOffset ?? b.itemSize + b.leadingMargin;

  for (const [i, baseline] of baselines) {
    let group = groups.get(baseline.gridAxisTrack);
    if (!group) {
      group = {items: [], maxBaseline: -Infinity};
      groups.set(baseline.gridAxisTrack, group);
    }
    group.items.push(i);
    group.maxBaseline = Math.max(group.maxBaseline, baselineOf(baseline));
  }

  const adjustments: BaselineAdjustment[] = [];

  for (const group of groups.values()) {
    if (!Number.isFinite(group.maxBaseline) || group.maxBaseline <= 0) continue;

    for (const i of group.items) {
      const baseline = baselines.get(i);
      if (!baseline) continue;
      const shim = group.maxBaseline - baselineOf(baseline);
      if (shim > 0) adjustments.push({itemIndex: i, positionAdjustment: shim});
    }
  }

  return adjustments;
}
