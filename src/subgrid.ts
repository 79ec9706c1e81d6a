import {environment} from './environment.js';
import {SubgridError} from './grid-errors.js';
import {offsetTransform, spanLength} from './grid-types.js';
import {checkParentGridContainer} from './grid-context.js';
import {LineNameInheritanceMapper} from './line-names.js';
import {placeSubgridItems, resolveItemPlacement} from './subgrid-placement.js';
import {templateKind} from './track-extraction.js';
import {Logger} from './util.js';

import type {
  NodeId,
  GridAxis,
  LineNames,
  TrackSpan,
  TrackSizingFunction,
  TrackSizingContribution,
  CoordinateTransform
} from './grid-types.js';
import type {GridTree, GridLayoutHost} from './grid-tree.js';
import type {SubgridItemPlacement} from './subgrid-placement.js';
import type {TreeLogOptions} from './util.js';

/**
 * The tracks and line names items are placed into. A ParentGridContext is one
 * of these, and so is a SubgridTrackInheritance.
 */
export interface EffectiveTracks {
  rowTracks: TrackSizingFunction[];
  columnTracks: TrackSizingFunction[];
  rowLineNames: LineNames;
  columnLineNames: LineNames;
}

export interface SubgridSpans {
  /**
   * Tracks of the parent the subgrid covers, null when that axis isn't
   * subgridded
   */
  row: TrackSpan | null;
  column: TrackSpan | null;
}

export interface SubgridTrackInheritance extends EffectiveTracks {
  subgridId: NodeId;
  usesSubgridRows: boolean;
  usesSubgridColumns: boolean;
  /**
   * Local track index to the parent's track index
   */
  coordinateTransform: CoordinateTransform;
}

export interface TrackInheritanceLevel {
  subgridId: NodeId;
  /**
   * The subgrid this one is nested in, null if its parent is a regular grid
   */
  parentSubgridId: NodeId | null;
  rowSpanInParent: TrackSpan | null;
  columnSpanInParent: TrackSpan | null;
  transform: CoordinateTransform;
}

function checkSpan(span: TrackSpan, parentTrackCount: number, axis: GridAxis) {
  // a parent axis that is masonry or has no template has nothing to inherit
  if (parentTrackCount === 0) {
    throw new SubgridError({kind: 'invalid-track-inheritance', trackType: axis});
  }

  if (span.start < 0 || span.end > parentTrackCount || span.start >= span.end) {
    throw new SubgridError({
      kind: 'track-count-mismatch',
      expected: span.end,
      actual: parentTrackCount
    });
  }
}

/**
 * Builds what a subgrid sees of its parent: on each subgridded axis, the
 * parent's tracks over the span and the names of the lines bounding them,
 * merged with the names the subgrid declares itself. On other axes the
 * subgrid keeps its own tracks and names.
 */
export function buildSubgridTrackInheritance(
  parent: EffectiveTracks,
  subgridId: NodeId,
  spans: SubgridSpans,
  own: EffectiveTracks,
  mapper: LineNameInheritanceMapper = new LineNameInheritanceMapper()
): SubgridTrackInheritance {
  let rowTracks = own.rowTracks;
  let columnTracks = own.columnTracks;
  let rowLineNames = own.rowLineNames;
  let columnLineNames = own.columnLineNames;

  if (spans.row) {
    checkSpan(spans.row, parent.rowTracks.length, 'row');
    rowTracks = parent.rowTracks.slice(spans.row.start, spans.row.end);
    rowLineNames = mapper.mapSubgridLineNames(
      parent.rowLineNames,
      own.rowLineNames,
      {start: spans.row.start, end: spans.row.end + 1},
      subgridId,
      'row'
    );
  }

  if (spans.column) {
    checkSpan(spans.column, parent.columnTracks.length, 'column');
    columnTracks = parent.columnTracks.slice(spans.column.start, spans.column.end);
    columnLineNames = mapper.mapSubgridLineNames(
      parent.columnLineNames,
      own.columnLineNames,
      {start: spans.column.start, end: spans.column.end + 1},
      subgridId,
      'column'
    );
  }

  return {
    subgridId,
    rowTracks,
    columnTracks,
    rowLineNames,
    columnLineNames,
    usesSubgridRows: spans.row != null,
    usesSubgridColumns: spans.column != null,
    coordinateTransform: offsetTransform(spans.row?.start ?? 0, spans.column?.start ?? 0)
  };
}

/**
 * Where a subgrid sits in its parent according to its own grid-row and
 * grid-column. An auto position starts at the first track.
 */
export function subgridSpansFromStyle(
  tree: GridTree,
  subgridId: NodeId,
  parent: EffectiveTracks,
  axes: {rows: boolean, columns: boolean}
): SubgridSpans {
  const style = tree.gridItemStyle(subgridId);
  const span = (axis: GridAxis) => {
    const tracks = axis === 'row' ? parent.rowTracks : parent.columnTracks;
    const names = axis === 'row' ? parent.rowLineNames : parent.columnLineNames;
    const range = axis === 'row' ? style.gridRow : style.gridColumn;
    const resolved = resolveItemPlacement(range, tracks.length, names);
    const start = resolved.start ?? 0;
    return {start, end: start + resolved.span};
  };

  return {
    row: axes.rows ? span('row') : null,
    column: axes.columns ? span('column') : null
  };
}

function mapIndex(index: number, offset: number, axis: GridAxis) {
  const mapped = index + offset;
  if (!Number.isSafeInteger(mapped) || mapped < 0) {
    throw SubgridError.coordinateMappingFailed(
      `${axis === 'row' ? 'Row' : 'Column'} track index ${index} ` +
      `cannot be offset by ${offset}`
    );
  }
  return mapped;
}

function mapThroughLevel(
  c: TrackSizingContribution,
  level: TrackInheritanceLevel
): TrackSizingContribution | null {
  const span = c.axis === 'row' ? level.rowSpanInParent : level.columnSpanInParent;
  // sized by that subgrid's own tracks, so it goes no further up
  if (!span) return null;

  const t = level.transform;
  const offset = c.axis === 'row' ? t.rowOffset : t.columnOffset;
  const scale = c.axis === 'row' ? t.rowScale : t.columnScale;

  return {
    itemId: c.itemId,
    axis: c.axis,
    trackIndex: mapIndex(c.trackIndex, offset, c.axis),
    minSize: c.minSize * scale,
    maxSize: c.maxSize * scale,
    preferredSize: c.preferredSize == null ? null : c.preferredSize * scale
  };
}

function validateIndex(c: TrackSizingContribution, root: EffectiveTracks) {
  const count = c.axis === 'row' ? root.rowTracks.length : root.columnTracks.length;
  if (c.trackIndex >= count) {
    throw SubgridError.coordinateMappingFailed(
      `${c.axis === 'row' ? 'Row' : 'Column'} track index ${c.trackIndex} ` +
      `exceeds parent grid track count ${count}`
    );
  }
}

/**
 * The sizing state of a subgrid and everything nested in it. Contributions
 * are kept in the coordinates of the root subgrid's parent grid, which is the
 * grid whose tracks they end up sizing.
 */
export class NestedSubgridCoordination {
  public rootSubgridId: NodeId;
  public subgridChain: NodeId[];
  public inheritanceChain: TrackInheritanceLevel[];
  public effectiveTracks: EffectiveTracks;
  public contributions: TrackSizingContribution[];
  public lineNameMappings: Map<NodeId, {rows: LineNames, columns: LineNames}>;

  constructor(level: TrackInheritanceLevel, inheritance: SubgridTrackInheritance) {
    this.rootSubgridId = level.subgridId;
    this.subgridChain = [level.subgridId];
    this.inheritanceChain = [level];
    this.effectiveTracks = inheritance;
    this.contributions = [];
    this.lineNameMappings = new Map([[level.subgridId, {
      rows: inheritance.rowLineNames,
      columns: inheritance.columnLineNames
    }]]);
  }

  private levelOf(subgridId: NodeId) {
    return this.inheritanceChain.find(level => level.subgridId === subgridId);
  }

  /**
   * Maps a contribution expressed in the tracks of `from` (a subgrid in this
   * chain) up to the root's parent grid
   */
  private mapToRoot(c: TrackSizingContribution, from: NodeId) {
    let current: TrackSizingContribution | null = c;
    let level = this.levelOf(from);
    let steps = 0;

    while (current && level) {
      current = mapThroughLevel(current, level);
      if (level.subgridId === this.rootSubgridId) return current;
      level = level.parentSubgridId == null ? undefined : this.levelOf(level.parentSubgridId);
      if (++steps > this.inheritanceChain.length) break;
    }

    if (!current) return null;

    throw SubgridError.coordinateMappingFailed(
      `Subgrid ${from} is not nested in subgrid ${this.rootSubgridId}`
    );
  }

  /**
   * Adds the contribution of one of the root subgrid's own items, given in the
   * root subgrid's tracks
   */
  addContribution(local: TrackSizingContribution, root: EffectiveTracks) {
    const mapped = this.mapToRoot(local, this.rootSubgridId);
    if (!mapped) return;
    validateIndex(mapped, root);
    this.contributions.push(mapped);
  }

  /**
   * Folds in a finished nested subgrid. Its contributions are in the tracks of
   * its parent subgrid, which must already be part of this chain.
   */
  mergeChildCoordination(child: NestedSubgridCoordination, root: EffectiveTracks) {
    const parentId = child.inheritanceChain[0].parentSubgridId;

    if (parentId == null || !this.levelOf(parentId)) {
      throw SubgridError.coordinateMappingFailed(
        `Subgrid ${child.rootSubgridId} has no parent in the chain of ` +
        `subgrid ${this.rootSubgridId}`
      );
    }

    const mapped: TrackSizingContribution[] = [];

    for (const c of child.contributions) {
      const m = this.mapToRoot(c, parentId);
      if (m) {
        validateIndex(m, root);
        mapped.push(m);
      }
    }

    this.subgridChain.push(...child.subgridChain);
    this.inheritanceChain.push(...child.inheritanceChain);
    this.contributions.push(...mapped);
    for (const [id, names] of child.lineNameMappings) this.lineNameMappings.set(id, names);
  }

  /**
   * Largest min and max contribution per track of the root's parent grid
   */
  contributionsByTrack(axis: GridAxis) {
    const tracks = new Map<number, {minSize: number, maxSize: number}>();

    for (const c of this.contributions) {
      if (c.axis !== axis) continue;
      const entry = tracks.get(c.trackIndex);
      if (entry) {
        entry.minSize = Math.max(entry.minSize, c.minSize);
        entry.maxSize = Math.max(entry.maxSize, c.maxSize);
      } else {
        tracks.set(c.trackIndex, {minSize: c.minSize, maxSize: c.maxSize});
      }
    }

    return tracks;
  }

  log(options?: TreeLogOptions, log?: Logger) {
    const flush = !log;

    log ||= new Logger();

    log.bold();
    log.text(`Subgrid ${this.rootSubgridId}`);
    log.reset();
    log.text(` (${this.subgridChain.length} in chain)\n`);
    log.pushIndent();

    for (const level of this.inheritanceChain) {
      const span = (s: TrackSpan | null) => s ? `${s.start}..${s.end}` : '-';
      log.text(`#${level.subgridId}`);
      log.dim();
      log.text(` in ${level.parentSubgridId ?? 'grid'}`);
      log.reset();
      log.text(` rows ${span(level.rowSpanInParent)}`);
      log.text(` columns ${span(level.columnSpanInParent)}\n`);
    }

    if (options?.lineNames) {
      for (const [id, names] of this.lineNameMappings) {
        log.text(`#${id} row lines ${JSON.stringify(names.rows)}\n`);
        log.text(`#${id} column lines ${JSON.stringify(names.columns)}\n`);
      }
    }

    if (options?.contributions) {
      for (const c of this.contributions) {
        log.text(`item ${c.itemId} ${c.axis} ${c.trackIndex}: ${c.minSize}/${c.maxSize}\n`);
      }
    }

    log.popIndent();

    if (flush) log.flush();
  }
}

export interface CoordinateNestedSubgridsOptions {
  /**
   * Where the subgrid sits in its parent. Read from its style when absent.
   */
  spans?: SubgridSpans;
  parentSubgridId?: NodeId | null;
  depth?: number;
  mapper?: LineNameInheritanceMapper;
}

export function isSubgrid(tree: GridTree, node: NodeId) {
  return templateKind(tree, node, 'row') === 'subgrid' ||
    templateKind(tree, node, 'column') === 'subgrid';
}

/**
 * Splits an item's size evenly over the tracks [start, end) it spans
 */
export function spreadContribution(
  itemId: NodeId,
  axis: GridAxis,
  start: number,
  end: number,
  minSize: number,
  maxSize: number
): TrackSizingContribution[] {
  const ret: TrackSizingContribution[] = [];
  const span = end - start;

  for (let i = start; i < end; i++) {
    ret.push({
      itemId,
      axis,
      trackIndex: i,
      minSize: minSize / span,
      maxSize: maxSize / span,
      preferredSize: null
    });
  }

  return ret;
}

function itemContributions(
  host: GridLayoutHost,
  placement: SubgridItemPlacement,
  inheritance: SubgridTrackInheritance
): TrackSizingContribution[] {
  const {itemId} = placement;
  const min = host.measure(itemId, {width: 'min-content', height: 'min-content'});
  const max = host.measure(itemId, {width: 'max-content', height: 'max-content'});
  const ret: TrackSizingContribution[] = [];

  if (inheritance.usesSubgridRows) {
    const {localRowStart: start, localRowEnd: end} = placement;
    ret.push(...spreadContribution(itemId, 'row', start, end, min.height, max.height));
  }

  if (inheritance.usesSubgridColumns) {
    const {localColumnStart: start, localColumnEnd: end} = placement;
    ret.push(...spreadContribution(itemId, 'column', start, end, min.width, max.width));
  }

  return ret;
}

/**
 * Places and measures the items of `subgridId`, recursing into the subgrids
 * among them, and returns the contributions they all make to the tracks of
 * `root`, the grid the outermost subgrid sits in.
 */
export function coordinateNestedSubgrids(
  host: GridLayoutHost,
  subgridId: NodeId,
  parentTracks: EffectiveTracks,
  root: EffectiveTracks,
  options: CoordinateNestedSubgridsOptions = {}
): NestedSubgridCoordination {
  const depth = options.depth ?? 1;
  const maxDepth = environment.maxSubgridNestingDepth;

  if (depth > maxDepth) {
    throw new SubgridError({kind: 'excessive-nesting-depth', depth, maxDepth});
  }

  const own = checkParentGridContainer(host, subgridId);
  if (!own || !own.hasSubgridRows && !own.hasSubgridColumns) {
    throw SubgridError.notSupported(`node ${subgridId} is not a subgrid`);
  }

  const mapper = options.mapper ?? new LineNameInheritanceMapper();
  const spans = options.spans ?? subgridSpansFromStyle(host, subgridId, parentTracks, {
    rows: own.hasSubgridRows,
    columns: own.hasSubgridColumns
  });
  const inheritance = buildSubgridTrackInheritance(parentTracks, subgridId, spans, own, mapper);
  const coordination = new NestedSubgridCoordination({
    subgridId,
    parentSubgridId: options.parentSubgridId ?? null,
    rowSpanInParent: spans.row,
    columnSpanInParent: spans.column,
    transform: inheritance.coordinateTransform
  }, inheritance);

  // an axis with no tracks at all still holds one row or column of items
  const size = {
    rows: Math.max(1, spans.row ? spanLength(spans.row) : own.rowTrackCount),
    columns: Math.max(1, spans.column ? spanLength(spans.column) : own.columnTrackCount)
  };

  const placements = placeSubgridItems(host, subgridId, inheritance, size);

  for (const placement of placements) {
    if (isSubgrid(host, placement.itemId)) {
      const child = coordinateNestedSubgrids(host, placement.itemId, inheritance, inheritance, {
        spans: childSpans(host, placement),
        parentSubgridId: subgridId,
        depth: depth + 1,
        mapper
      });
      coordination.mergeChildCoordination(child, root);
    } else {
      for (const c of itemContributions(host, placement, inheritance)) {
        coordination.addContribution(c, root);
      }
    }
  }

  return coordination;
}

export function childSpans(tree: GridTree, placement: SubgridItemPlacement): SubgridSpans {
  const rows = templateKind(tree, placement.itemId, 'row') === 'subgrid';
  const columns = templateKind(tree, placement.itemId, 'column') === 'subgrid';

  return {
    row: rows ? {start: placement.localRowStart, end: placement.localRowEnd} : null,
    column: columns
      ? {start: placement.localColumnStart, end: placement.localColumnEnd}
      : null
  };
}
