import {environment} from './environment.js';
import {MasonryError} from './grid-errors.js';
import {auto, definite, resolveLengthPercentage} from './grid-types.js';
import {calculateBaselineAdjustments} from './masonry-baseline.js';
import {resolveItemPlacement} from './subgrid-placement.js';
import {extractLineNames, extractTracks, templateKind} from './track-extraction.js';
import {Logger, meanOfKnown, sortedBy, sum} from './util.js';

import type {
  NodeId,
  AbstractAxis,
  GridAxis,
  LineNames,
  AvailableSize,
  AvailableSpace,
  SelfAlignment,
  Size,
  Point,
  TrackSpan,
  TrackSizingFunction
} from './grid-types.js';
import type {
  GridTree,
  GridLayoutHost,
  MeasuredBox,
  SolverGridStyle,
  SolverItemStyle
} from './grid-tree.js';
import type {BaselineAdjustment} from './masonry-baseline.js';

const DEFAULT_ITEM_TOLERANCE = 16;

/**
 * The grid axis of a masonry container is the one with tracks, perpendicular
 * to the masonry axis items stack along
 */
export function gridAxisFromMasonry(masonryAxis: AbstractAxis): AbstractAxis {
  return masonryAxis === 'block' ? 'inline' : 'block';
}

/**
 * Inline tracks are columns, block tracks are rows
 */
export function gridAxisTracks(axis: AbstractAxis): GridAxis {
  return axis === 'inline' ? 'column' : 'row';
}

export interface MasonryConfig {
  /**
   * The axis items flow along: block when rows are masonry
   */
  masonryAxis: AbstractAxis;
  gridAxis: AbstractAxis;
  tracks: TrackSizingFunction[];
  trackCount: number;
  itemTolerance: number;
  densePacking: boolean;
  autoFitRange: TrackSpan | null;
  /**
   * Names of the grid axis lines, one list per line
   */
  lineNames: LineNames;
  /**
   * Gap between tracks
   */
  gridAxisGap: number;
  /**
   * Gap between items stacked in the same track
   */
  masonryAxisGap: number;
}

function inferMasonryAxis(tree: GridTree, node: NodeId): AbstractAxis {
  const style = tree.gridContainerStyle(node);
  const rows = templateKind(tree, node, 'row');
  const columns = templateKind(tree, node, 'column');
  const displayIsMasonry = style?.display === 'masonry' || style?.display === 'inline-masonry';

  if (rows === 'masonry' && columns === 'masonry') {
    throw MasonryError.invalidAxis('block', 'rows and columns cannot both be masonry');
  }

  if (rows === 'masonry') return 'block';
  if (columns === 'masonry') return 'inline';
  if (columns === 'tracks' && rows === 'none') return 'block';
  if (rows === 'tracks' && columns === 'none') return 'inline';
  if (displayIsMasonry && rows !== 'tracks') return 'block';
  if (displayIsMasonry) return 'inline';

  throw MasonryError.invalidAxis('block', 'no axis is masonry');
}

/**
 * Works out which axis is the masonry axis and expands the tracks of the other
 * one, along with the settings placement needs.
 */
export function calculateMasonryConfig(
  tree: GridTree,
  node: NodeId,
  available: AvailableSize
): MasonryConfig {
  const style = tree.gridContainerStyle(node);
  const masonryAxis = inferMasonryAxis(tree, node);
  const gridAxis = gridAxisFromMasonry(masonryAxis);
  const trackAxis = gridAxisTracks(gridAxis);
  const gridAxisSize = definite(gridAxis === 'inline' ? available.width : available.height);
  const masonryAxisSize = definite(masonryAxis === 'inline' ? available.width : available.height);
  const gridGapStyle = trackAxis === 'column' ? style?.columnGap : style?.rowGap;
  const masonryGapStyle = trackAxis === 'column' ? style?.rowGap : style?.columnGap;
  const gridAxisGap = gridGapStyle == null ? 0 : resolveLengthPercentage(gridGapStyle, gridAxisSize);
  const masonryAxisGap = masonryGapStyle == null
    ? 0
    : resolveLengthPercentage(masonryGapStyle, masonryAxisSize);

  let tracks: TrackSizingFunction[];
  let autoFitRange: TrackSpan | null = null;

  if (templateKind(tree, node, trackAxis) === 'none') {
    tracks = [auto()];
  } else {
    const expanded = extractTracks(tree, node, trackAxis, {
      containerSize: gridAxisSize,
      gap: gridAxisGap
    });
    tracks = expanded.tracks;
    autoFitRange = expanded.autoFitRange;
  }

  const max = environment.maxRepetitions;
  if (tracks.length < 1 || tracks.length > max) {
    throw new MasonryError({
      kind: 'invalid-track-count',
      trackCount: tracks.length,
      min: 1,
      max
    });
  }

  const fontSize = style?.fontSize;
  const declaredNames = trackAxis === 'column'
    ? style?.gridTemplateColumnNames
    : style?.gridTemplateRowNames;

  return {
    masonryAxis,
    gridAxis,
    tracks,
    trackCount: tracks.length,
    itemTolerance: fontSize != null && Number.isFinite(fontSize) && fontSize > 0
      ? fontSize
      : DEFAULT_ITEM_TOLERANCE,
    densePacking: style?.gridAutoFlow.dense ?? false,
    autoFitRange,
    lineNames: extractLineNames(declaredNames ?? [], tracks.length),
    gridAxisGap,
    masonryAxisGap
  };
}

export interface GridItemInfo {
  nodeId: NodeId;
  order: number;
  rowSpan: number;
  columnSpan: number;
  /**
   * Zero-based track the item is locked to on the grid axis, if any
   */
  gridAxisStart: number | null;
}

/**
 * The in-flow children of a masonry container in order-modified document
 * order, with grid-axis spans clamped to the track count
 */
export function collectMasonryItems(
  tree: GridTree,
  container: NodeId,
  config: MasonryConfig
): GridItemInfo[] {
  const items: GridItemInfo[] = [];
  const trackAxis = gridAxisTracks(config.gridAxis);

  for (const child of tree.children(container)) {
    if (tree.gridContainerStyle(child)?.display === 'none') continue;

    const style = tree.gridItemStyle(child);
    const gridRange = trackAxis === 'row' ? style.gridRow : style.gridColumn;
    const masonryRange = trackAxis === 'row' ? style.gridColumn : style.gridRow;
    const grid = resolveItemPlacement(gridRange, config.trackCount, config.lineNames);
    // the masonry axis has no tracks or names to resolve against
    const masonrySpan = resolveItemPlacement(masonryRange, 0, []).span;

    items.push({
      nodeId: child,
      order: style.order,
      rowSpan: trackAxis === 'row' ? grid.span : masonrySpan,
      columnSpan: trackAxis === 'row' ? masonrySpan : grid.span,
      gridAxisStart: grid.start
    });
  }

  return sortedBy(items, item => item.order);
}

export function gridAxisSpan(item: GridItemInfo, masonryAxis: AbstractAxis) {
  return masonryAxis === 'block' ? item.columnSpan : item.rowSpan;
}

/**
 * An item's size on the grid axis, which is what it contributes to the size of
 * the tracks it can land in
 */
export interface MasonryItemContribution {
  item: GridItemInfo;
  span: number;
  size: number;
}

export interface VirtualPlacement {
  itemId: NodeId;
  virtualTrackStart: number;
  trackSpan: number;
  placementWeight: number;
  /**
   * Per-track share of the item's size, gaps excluded
   */
  intrinsicContribution: number;
}

/**
 * Auto-placed spanning items can end up at any start track, so they are
 * assumed to be at every one of them while the tracks are sized.
 */
export function createVirtualPlacementsForSpanningItems(
  items: readonly MasonryItemContribution[],
  trackCount: number,
  gap: number
): VirtualPlacement[] {
  const placements: VirtualPlacement[] = [];

  for (const {item, span, size} of items) {
    if (span <= 1) continue;

    if (span > trackCount) {
      throw new MasonryError({
        kind: 'track-span-exceeds-available',
        span,
        availableTracks: trackCount
      });
    }

    const starts = trackCount - span + 1;
    const intrinsicContribution = Math.max(0, size - gap * (span - 1)) / span;

    for (let start = 0; start < starts; start++) {
      placements.push({
        itemId: item.nodeId,
        virtualTrackStart: start,
        trackSpan: span,
        placementWeight: 1 / starts,
        intrinsicContribution
      });
    }
  }

  return placements;
}

/**
 * The size a track needs for its content: the largest single-track item that
 * can land in it, or the largest per-track share of a spanning item that could
 * cover it, whichever is bigger
 */
export function calculateTrackIntrinsicSizeWithSpanning(
  items: readonly MasonryItemContribution[],
  virtualPlacements: readonly VirtualPlacement[],
  trackIndex: number
): number {
  let size = 0;

  for (const {item, span, size: itemSize} of items) {
    if (span !== 1) continue;
    if (item.gridAxisStart != null && item.gridAxisStart !== trackIndex) continue;
    size = Math.max(size, itemSize);
  }

  for (const vp of virtualPlacements) {
    const end = vp.virtualTrackStart + vp.trackSpan;
    if (trackIndex >= vp.virtualTrackStart && trackIndex < end) {
      size = Math.max(size, vp.intrinsicContribution);
    }
  }

  return Math.max(0, size);
}

/**
 * Grid container style for the generic solver: the tracks go on the grid axis
 * and the masonry axis gets none
 */
export function createSolverGridStyleForMasonry(
  tracks: TrackSizingFunction[],
  masonryAxis: AbstractAxis,
  gap: number
): SolverGridStyle {
  if (masonryAxis === 'block') {
    return {
      display: 'grid',
      gridTemplateRows: [],
      gridTemplateColumns: tracks.slice(),
      rowGap: 0,
      columnGap: gap
    };
  } else {
    return {
      display: 'grid',
      gridTemplateRows: tracks.slice(),
      gridTemplateColumns: [],
      rowGap: gap,
      columnGap: 0
    };
  }
}

/**
 * A stand-in item that holds one track open to its intrinsic size
 */
export function createSolverItemStyleForMasonry(
  trackIndex: number,
  size: number,
  masonryAxis: AbstractAxis
): SolverItemStyle {
  const area = {start: trackIndex, span: 1};

  if (masonryAxis === 'block') {
    return {display: 'block', width: size, height: 0, gridRow: null, gridColumn: area};
  } else {
    return {display: 'block', width: 0, height: size, gridRow: area, gridColumn: null};
  }
}

export function createSolverAvailableSpace(
  gridAxisSpace: AvailableSpace,
  masonryAxis: AbstractAxis
): AvailableSize {
  if (masonryAxis === 'block') {
    return {width: gridAxisSpace, height: 'max-content'};
  } else {
    return {width: 'max-content', height: gridAxisSpace};
  }
}

/**
 * Sizes measured by the host have to be finite and non-negative
 */
function checkedSize(item: NodeId, size: number, dimension: 'width' | 'height') {
  if (!Number.isFinite(size) || size < 0) {
    throw new MasonryError({
      kind: 'content-sizing-failed',
      itemNodeId: item,
      reason: `measured ${dimension} ${size} is not a usable length`
    });
  }
  return size;
}

function measureOnGridAxis(host: GridLayoutHost, item: NodeId, masonryAxis: AbstractAxis) {
  const box = host.measure(item, {width: 'max-content', height: 'max-content'});
  return masonryAxis === 'block'
    ? checkedSize(item, box.width, 'width')
    : checkedSize(item, box.height, 'height');
}

/**
 * Sizes the grid-axis tracks before anything is placed, with every item
 * contributing to every track it could land in
 */
export function sizeMasonryTracks(
  host: GridLayoutHost,
  config: MasonryConfig,
  items: readonly GridItemInfo[],
  available: AvailableSize
): number[] {
  const contributions = items.map(item => ({
    item,
    span: gridAxisSpan(item, config.masonryAxis),
    size: measureOnGridAxis(host, item.nodeId, config.masonryAxis)
  }));
  const virtual = createVirtualPlacementsForSpanningItems(
    contributions,
    config.trackCount,
    config.gridAxisGap
  );
  const solverItems: SolverItemStyle[] = [];

  for (let i = 0; i < config.trackCount; i++) {
    const size = calculateTrackIntrinsicSizeWithSpanning(contributions, virtual, i);
    solverItems.push(createSolverItemStyleForMasonry(i, size, config.masonryAxis));
  }

  return host.solveTracks(
    createSolverGridStyleForMasonry(config.tracks, config.masonryAxis, config.gridAxisGap),
    solverItems,
    createSolverAvailableSpace(
      config.gridAxis === 'inline' ? available.width : available.height,
      config.masonryAxis
    )
  );
}

export interface GapOpportunity {
  trackIndex: number;
  gapPosition: number;
  gapSize: number;
  trackTotalSize: number;
  span: number;
}

/**
 * Running positions of the tracks of a masonry container, and the choice of
 * track for each item as they're placed one after another
 */
export class MasonryTrackState {
  public trackPositions: number[];
  public trackItemCounts: number[];
  public trackCount: number;
  public itemTolerance: number;
  public lastPlacedTrack: number | null;
  public placementCursor: number;
  public gap: number;

  constructor(trackCount: number, itemTolerance = DEFAULT_ITEM_TOLERANCE, gap = 0) {
    this.trackPositions = new Array(trackCount).fill(0);
    this.trackItemCounts = new Array(trackCount).fill(0);
    this.trackCount = trackCount;
    this.itemTolerance = Math.max(0, itemTolerance);
    this.lastPlacedTrack = null;
    this.placementCursor = 0;
    this.gap = gap;
  }

  getTrackPosition(track: number) {
    return this.trackPositions[track] ?? 0;
  }

  /**
   * Where an item spanning [track, track + span) would go on the masonry axis
   */
  placementPosition(track: number, span: number) {
    let position = 0;
    const end = Math.min(track + span, this.trackCount);
    for (let i = track; i < end; i++) position = Math.max(position, this.trackPositions[i]);
    return position;
  }

  findShortestTrackWithTolerance(): number {
    let min = Infinity;
    for (const position of this.trackPositions) min = Math.min(min, position);

    const candidates: number[] = [];
    for (let i = 0; i < this.trackCount; i++) {
      if (this.trackPositions[i] <= min + this.itemTolerance) candidates.push(i);
    }

    if (candidates.length === 0) return 0;
    if (candidates.length === 1) return candidates[0];

    // candidates are ascending, so find() gives the earliest
    if (this.lastPlacedTrack != null) {
      const last = this.lastPlacedTrack;
      const afterLast = candidates.find(track => track >= last);
      if (afterLast !== undefined) return afterLast;
    }

    const afterCursor = candidates.find(track => track >= this.placementCursor);
    if (afterCursor !== undefined) return afterCursor;

    return candidates[0];
  }

  /**
   * The start track for a spanning item that ends up highest, if it beats
   * the shortest-track choice by more than the tolerance
   */
  findDensePlacement(span: number): number | null {
    if (span === 0 || span > this.trackCount) return null;

    let best: number | null = null;
    let bestPosition = Infinity;

    for (let track = 0; track + span <= this.trackCount; track++) {
      const position = this.placementPosition(track, span);
      if (position < bestPosition) {
        bestPosition = position;
        best = track;
      }
    }

    if (best == null) return null;

    const normal = this.findShortestTrackWithTolerance();
    const normalPosition = normal + span <= this.trackCount
      ? this.placementPosition(normal, span)
      : Infinity;

    return bestPosition + this.itemTolerance < normalPosition ? best : null;
  }

  placeItem(track: number, size: number, span: number) {
    if (!Number.isInteger(track) || track < 0 || span < 1 || track + span > this.trackCount) {
      throw MasonryError.placementFailed(
        track,
        `tracks ${track} to ${track + span} are outside of the ${this.trackCount} tracks`
      );
    }

    const end = track + span;
    const position = this.placementPosition(track, span);

    for (let i = track; i < end; i++) {
      this.trackPositions[i] = position + size + this.gap;
      this.trackItemCounts[i] += 1;
    }
  }

  placeItemWithTracking(track: number, size: number, span: number) {
    this.placeItem(track, size, span);
    this.lastPlacedTrack = track;
    this.placementCursor = Math.min(
      Math.min(track + span, this.trackCount),
      Math.max(0, this.trackCount - 1)
    );
  }

  log(log?: Logger) {
    const flush = !log;

    log ||= new Logger();

    log.text(`Masonry tracks (tolerance ${this.itemTolerance})\n`);
    log.pushIndent();
    for (let i = 0; i < this.trackCount; i++) {
      if (i === this.lastPlacedTrack) log.bold();
      log.text(`${i}: ${this.trackPositions[i]}`);
      if (i === this.lastPlacedTrack) log.reset();
      log.dim();
      log.text(` (${this.trackItemCounts[i]} items)`);
      log.reset();
      log.text('\n');
    }
    log.popIndent();

    if (flush) log.flush();
  }
}

/**
 * Openings before the normal placement that a dense-packed item could fill
 * without changing its size: the spanned tracks have to add up to the same
 * size as the tracks it would otherwise go in. Earliest first.
 */
export function detectCompatibleGaps(
  state: MasonryTrackState,
  trackSizes: readonly number[],
  span: number,
  itemSize: number,
  normalTrackSize: number,
  itemTolerance: number
): GapOpportunity[] {
  const tolerance = environment.gapMatchTolerance;
  const gaps: GapOpportunity[] = [];
  const normalPosition = state.getTrackPosition(state.findShortestTrackWithTolerance());
  let maxPosition = 0;

  for (const position of state.trackPositions) maxPosition = Math.max(maxPosition, position);

  for (let start = 0; start + span <= state.trackCount; start++) {
    const gapPosition = state.placementPosition(start, span);
    if (gapPosition >= normalPosition) continue;

    const gapSize = maxPosition - gapPosition;
    if (gapSize < itemSize - itemTolerance) continue;

    const trackTotalSize = sum(trackSizes.slice(start, start + span));
    if (Math.abs(trackTotalSize - normalTrackSize) > tolerance) continue;

    if (gapSize > tolerance) {
      gaps.push({trackIndex: start, gapPosition, gapSize, trackTotalSize, span});
    }
  }

  return gaps.sort((a, b) => a.gapPosition - b.gapPosition || a.trackIndex - b.trackIndex);
}

export interface GridArea {
  gridAxisStart: number;
  /**
   * Exclusive
   */
  gridAxisEnd: number;
  masonryAxisPosition: number;
  masonryAxisSize: number;
}

export interface PlacedMasonryItem {
  nodeId: NodeId;
  area: GridArea;
}

/**
 * Collapses auto-fit tracks that ended up with no items to 0. Items after them
 * move back because positions are computed from the track sizes.
 */
export function collapseAutoFitTracks(
  placed: readonly PlacedMasonryItem[],
  trackSizes: readonly number[],
  range: TrackSpan
): number[] {
  const occupied = new Set<number>();
  const ret = trackSizes.slice();

  for (const {area} of placed) {
    for (let i = area.gridAxisStart; i < area.gridAxisEnd; i++) occupied.add(i);
  }

  for (let i = range.start; i < Math.min(range.end, ret.length); i++) {
    if (!occupied.has(i)) ret[i] = 0;
  }

  return ret;
}

/**
 * Converts a placement into a position and size in the container. Tracks
 * without a usable size (missing, negative or not finite) count as the mean
 * of those that have one.
 */
export function gridAreaToLayout(
  area: GridArea,
  masonryAxis: AbstractAxis,
  trackSizes: readonly number[],
  gap: number
): {location: Point, size: Size} {
  const fallback = meanOfKnown(trackSizes) ?? 0;
  const trackSize = (i: number) => {
    const size = trackSizes[i];
    return size !== undefined && Number.isFinite(size) && size >= 0 ? size : fallback;
  };

  let gridPosition = 0;
  for (let i = 0; i < area.gridAxisStart; i++) gridPosition += trackSize(i) + gap;

  const span = Math.max(0, area.gridAxisEnd - area.gridAxisStart);
  let gridSize = span > 1 ? gap * (span - 1) : 0;
  for (let i = area.gridAxisStart; i < area.gridAxisEnd; i++) gridSize += trackSize(i);

  const masonryPosition = area.masonryAxisPosition;
  const masonrySize = Math.max(0, area.masonryAxisSize);

  if (masonryAxis === 'block') {
    return {
      location: {x: gridPosition, y: masonryPosition},
      size: {width: gridSize, height: masonrySize}
    };
  } else {
    return {
      location: {x: masonryPosition, y: gridPosition},
      size: {width: masonrySize, height: gridSize}
    };
  }
}

/**
 * The container's size: as far as its items reach on both axes, and at least
 * the available space where that's definite
 */
export function calculateContainerSizeFromPlacements(
  placed: readonly PlacedMasonryItem[],
  masonryAxis: AbstractAxis,
  available: AvailableSize,
  trackSizes: readonly number[],
  gap: number
): Size {
  let width = 0;
  let height = 0;

  for (const {area} of placed) {
    const {location, size} = gridAreaToLayout(area, masonryAxis, trackSizes, gap);
    width = Math.max(width, location.x + size.width);
    height = Math.max(height, location.y + size.height);
  }

  const availableWidth = definite(available.width);
  const availableHeight = definite(available.height);

  return {
    width: availableWidth == null ? width : Math.max(availableWidth, width),
    height: availableHeight == null ? height : Math.max(availableHeight, height)
  };
}

export function alignItemWithinArea(
  areaStart: number,
  areaEnd: number,
  alignment: SelfAlignment,
  size: number,
  baselineShim: number
): number {
  const areaSize = Math.max(0, areaEnd - areaStart);

  switch (alignment) {
    case 'start':
    case 'flex-start':
    case 'baseline':
      return areaStart + baselineShim;
    case 'end':
    case 'flex-end':
      return areaStart + areaSize - size;
    case 'center':
      return areaStart + (areaSize - size) / 2;
    case 'stretch':
      return areaStart;
  }
}

export function shouldStretch(alignment: SelfAlignment | null) {
  return alignment == null || alignment === 'stretch';
}

export interface MasonryItemLayout {
  nodeId: NodeId;
  area: GridArea;
  location: Point;
  size: Size;
  baselineShim: number;
}

export interface MasonryLayout {
  config: MasonryConfig;
  /**
   * After auto-fit collapsing
   */
  trackSizes: number[];
  items: MasonryItemLayout[];
  size: Size;
}

function gridAxisAvailable(
  config: MasonryConfig,
  trackSizes: readonly number[],
  start: number,
  span: number
): AvailableSize {
  const area = gridAreaToLayout(
    {gridAxisStart: start, gridAxisEnd: start + span, masonryAxisPosition: 0, masonryAxisSize: 0},
    config.masonryAxis,
    trackSizes,
    config.gridAxisGap
  );

  if (config.masonryAxis === 'block') {
    return {width: area.size.width, height: 'max-content'};
  } else {
    return {width: 'max-content', height: area.size.height};
  }
}

function masonrySize(item: NodeId, box: MeasuredBox, masonryAxis: AbstractAxis) {
  return masonryAxis === 'block'
    ? checkedSize(item, box.height, 'height')
    : checkedSize(item, box.width, 'width');
}

/**
 * Lays out a masonry container: sizes its tracks, places its items one by one
 * in the shortest track, aligns baselines and returns every item's rectangle
 * along with the container's size
 */
export function layoutMasonry(
  host: GridLayoutHost,
  container: NodeId,
  available: AvailableSize
): MasonryLayout {
  const config = calculateMasonryConfig(host, container, available);
  const items = collectMasonryItems(host, container, config);
  const trackSizes = sizeMasonryTracks(host, config, items, available);
  const state = new MasonryTrackState(
    config.trackCount,
    config.itemTolerance,
    config.masonryAxisGap
  );
  const placed: PlacedMasonryItem[] = [];
  const boxes: MeasuredBox[] = [];

  for (const item of items) {
    const span = gridAxisSpan(item, config.masonryAxis);
    let track: number;
    let box: MeasuredBox | null = null;

    if (item.gridAxisStart != null) {
      track = item.gridAxisStart;
    } else if (span > 1) {
      track = state.findDensePlacement(span) ?? state.findShortestTrackWithTolerance();
    } else if (config.densePacking) {
      const normal = state.findShortestTrackWithTolerance();
      let normalTrackSize = 0;
      for (let i = normal; i < normal + span; i++) normalTrackSize += trackSizes[i] ?? 0;

      box = host.measure(item.nodeId, gridAxisAvailable(config, trackSizes, normal, span));
      const gaps = detectCompatibleGaps(
        state,
        trackSizes,
        span,
        masonrySize(item.nodeId, box, config.masonryAxis),
        normalTrackSize,
        config.itemTolerance
      );
      track = gaps.length ? gaps[0].trackIndex : normal;
    } else {
      track = state.findShortestTrackWithTolerance();
    }

    track = Math.max(0, Math.min(track, config.trackCount - span));
    box ??= host.measure(item.nodeId, gridAxisAvailable(config, trackSizes, track, span));

    const size = masonrySize(item.nodeId, box, config.masonryAxis);

    placed.push({
      nodeId: item.nodeId,
      area: {
        gridAxisStart: track,
        gridAxisEnd: track + span,
        masonryAxisPosition: state.placementPosition(track, span),
        masonryAxisSize: size
      }
    });
    boxes.push(box);

    state.placeItemWithTracking(track, size, span);
  }

  const finalTrackSizes = config.autoFitRange
    ? collapseAutoFitTracks(placed, trackSizes, config.autoFitRange)
    : trackSizes.slice();

  const shims = new Map<number, number>();
  const adjustments: BaselineAdjustment[] = calculateBaselineAdjustments(
    host,
    placed,
    boxes,
    config.masonryAxis
  );
  for (const adjustment of adjustments) {
    shims.set(adjustment.itemIndex, adjustment.positionAdjustment);
  }

  const layouts: MasonryItemLayout[] = placed.map((p, i) => {
    const shim = shims.get(i) ?? 0;
    const style = host.gridItemStyle(p.nodeId);
    const block = config.masonryAxis === 'block';
    const gridAlignment = block ? style.justifySelf : style.alignSelf;
    const area = gridAreaToLayout(p.area, config.masonryAxis, finalTrackSizes, config.gridAxisGap);
    const areaStart = block ? area.location.x : area.location.y;
    const areaSize = block ? area.size.width : area.size.height;
    const measured = block ? boxes[i].width : boxes[i].height;
    const gridSize = shouldStretch(gridAlignment) ? areaSize : Math.min(measured, areaSize);
    const gridPosition = gridAlignment == null
      ? areaStart
      : alignItemWithinArea(areaStart, areaStart + areaSize, gridAlignment, gridSize, 0);
    const masonryPosition = p.area.masonryAxisPosition + shim;
    const masonryExtent = Math.max(0, p.area.masonryAxisSize);

    return {
      nodeId: p.nodeId,
      area: {...p.area, masonryAxisPosition: masonryPosition},
      location: block
        ? {x: gridPosition, y: masonryPosition}
        : {x: masonryPosition, y: gridPosition},
      size: block
        ? {width: gridSize, height: masonryExtent}
        : {width: masonryExtent, height: gridSize},
      baselineShim: shim
    };
  });

  return {
    config,
    trackSizes: finalTrackSizes,
    items: layouts,
    size: calculateContainerSizeFromPlacements(
      layouts,
      config.masonryAxis,
      available,
      finalTrackSizes,
      config.gridAxisGap
    )
  };
}
