import {GridPreprocessingError} from './grid-errors.js';
import {binarySearchOf, sortedBy, Logger} from './util.js';

import type {NodeId, GridAxis, GridPosition, LineNames} from './grid-types.js';
import type {GridTree, GridLineRange, GridPlacement, GridAutoFlow} from './grid-tree.js';
import type {SubgridTrackInheritance} from './subgrid.js';

export type PlacementMethod =
  | {type: 'explicit-row'}
  | {type: 'explicit-column'}
  | {type: 'explicit-both'}
  | {type: 'auto', cursor: GridPosition}
  | {type: 'dense', cursor: GridPosition};

function lineIndex(p: GridPlacement, trackCount: number, lineNames: LineNames) {
  if (typeof p === 'number') {
    if (p > 0) return p - 1;
    if (p < 0) return trackCount + 1 + p;
    return null;
  }

  if (typeof p === 'object' && 'line' in p) {
    const i = lineNames.findIndex(names => names.includes(p.line));
    return i < 0 ? null : i;
  }

  return null;
}

function spanOf(p: GridPlacement) {
  return typeof p === 'object' && 'span' in p ? Math.max(1, Math.floor(p.span)) : null;
}

export interface ResolvedPlacement {
  /**
   * Zero-based start track, null if the item is auto-placed on this axis
   */
  start: number | null;
  span: number;
}

/**
 * Resolves grid-row or grid-column against a grid with `trackCount` tracks.
 * Subgrids have no implicit tracks, so a definite placement outside of the
 * grid is clamped into it. A name that matches no line makes the placement
 * auto.
 */
export function resolveItemPlacement(
  range: GridLineRange,
  trackCount: number,
  lineNames: LineNames
): ResolvedPlacement {
  let start = lineIndex(range.start, trackCount, lineNames);
  let end = lineIndex(range.end, trackCount, lineNames);
  let span: number;

  if (start != null && end != null) {
    if (end < start) [start, end] = [end, start];
    span = Math.max(1, end - start);
  } else if (start != null) {
    span = spanOf(range.end) ?? 1;
  } else if (end != null) {
    span = spanOf(range.start) ?? 1;
    start = Math.max(0, end - span);
  } else {
    span = spanOf(range.start) ?? spanOf(range.end) ?? 1;
  }

  if (trackCount > 0) {
    span = Math.min(span, trackCount);
    if (start != null) {
      start = Math.max(0, Math.min(start, trackCount - span));
    }
  }

  return {start, span};
}

export class AutoPlacementCursor {
  public currentRow: number;
  public currentColumn: number;
  public maxRows: number;
  public maxColumns: number;
  public flowDirection: GridAxis;
  public densePacking: boolean;

  constructor(rows: number, columns: number, flow: GridAutoFlow) {
    this.currentRow = 0;
    this.currentColumn = 0;
    this.maxRows = rows;
    this.maxColumns = columns;
    this.flowDirection = flow.direction;
    this.densePacking = flow.dense;
  }

  /**
   * Moves one cell in the flow direction. Returns false once the cursor has
   * left the grid.
   */
  advanceToNextPosition(): boolean {
    if (this.flowDirection === 'row') {
      this.currentColumn += 1;
      if (this.currentColumn >= this.maxColumns) {
        this.currentColumn = 0;
        this.currentRow += 1;
      }
    } else {
      this.currentRow += 1;
      if (this.currentRow >= this.maxRows) {
        this.currentRow = 0;
        this.currentColumn += 1;
      }
    }

    return this.currentRow < this.maxRows && this.currentColumn < this.maxColumns;
  }

  /**
   * Moves to just after a placed item along the flow direction
   */
  advancePastPlacedItem(placement: SubgridItemPlacement) {
    if (this.flowDirection === 'row') {
      this.currentRow = placement.localRowStart;
      this.currentColumn = placement.localColumnEnd;
      if (this.currentColumn >= this.maxColumns) {
        this.currentColumn = 0;
        this.currentRow += 1;
      }
    } else {
      this.currentColumn = placement.localColumnStart;
      this.currentRow = placement.localRowEnd;
      if (this.currentRow >= this.maxRows) {
        this.currentRow = 0;
        this.currentColumn += 1;
      }
    }
  }

  position(): GridPosition {
    return {row: this.currentRow, column: this.currentColumn};
  }

  isExhausted() {
    return this.currentRow >= this.maxRows || this.currentColumn >= this.maxColumns;
  }

  reset() {
    this.currentRow = 0;
    this.currentColumn = 0;
  }
}

export class OccupiedRange {
  public startPosition: number;
  public endPosition: number;
  public occupyingItem: NodeId;
  public placementMethod: PlacementMethod;

  constructor(start: number, end: number, item: NodeId, method: PlacementMethod) {
    this.startPosition = start;
    this.endPosition = end;
    this.occupyingItem = item;
    this.placementMethod = method;
  }

  overlaps(start: number, end: number) {
    return !(end <= this.startPosition || start >= this.endPosition);
  }

  contains(position: number) {
    return position >= this.startPosition && position < this.endPosition;
  }

  /**
   * Overlapping or touching
   */
  canMergeWith(other: OccupiedRange) {
    return other.startPosition <= this.endPosition && other.endPosition >= this.startPosition;
  }
}

/**
 * Occupancy of one track, as sorted and non-overlapping ranges of positions
 * along it. Ranges that touch are merged as soon as they're inserted, so the
 * list stays as short as the number of separate runs of occupied cells.
 */
export class TrackAvailability {
  public occupiedRanges: OccupiedRange[];
  public trackSize: number;
  public parentTrackIndex: number;

  constructor(parentTrackIndex: number) {
    this.occupiedRanges = [];
    this.trackSize = 0;
    this.parentTrackIndex = parentTrackIndex;
  }

  isRangeAvailable(start: number, end: number) {
    for (const range of this.occupiedRanges) {
      if (range.overlaps(start, end)) return false;
    }
    return true;
  }

  markRangeOccupied(start: number, end: number, item: NodeId, method: PlacementMethod) {
    const ranges = this.occupiedRanges;
    let i = binarySearchOf(ranges, start, r => r.startPosition);

    ranges.splice(i, 0, new OccupiedRange(start, end, item, method));

    while (i > 0 && ranges[i - 1].canMergeWith(ranges[i])) {
      const prev = ranges[i - 1];
      prev.endPosition = Math.max(prev.endPosition, ranges[i].endPosition);
      ranges.splice(i, 1);
      i -= 1;
    }

    while (i + 1 < ranges.length && ranges[i].canMergeWith(ranges[i + 1])) {
      ranges[i].endPosition = Math.max(ranges[i].endPosition, ranges[i + 1].endPosition);
      ranges.splice(i + 1, 1);
    }
  }

  /**
   * The first position at or after `start` that isn't occupied
   */
  getNextAvailablePosition(start: number) {
    let position = start;
    for (const range of this.occupiedRanges) {
      if (range.contains(position)) position = range.endPosition;
    }
    return position;
  }

  setTrackSize(size: number) {
    this.trackSize = Math.max(0, size);
  }

  getTrackSize() {
    return this.trackSize;
  }

  log(log?: Logger) {
    const flush = !log;

    log ||= new Logger();

    log.text(`track ${this.parentTrackIndex} (${this.trackSize}px):`);
    if (this.occupiedRanges.length === 0) {
      log.dim();
      log.text(' empty');
      log.reset();
    }
    for (const range of this.occupiedRanges) {
      log.text(` [${range.startPosition}, ${range.endPosition})`);
    }
    log.text('\n');

    if (flush) log.flush();
  }
}

export interface SubgridItemPlacement {
  itemId: NodeId;
  localRowStart: number;
  localRowEnd: number;
  localColumnStart: number;
  localColumnEnd: number;
  /**
   * Only set on subgridded axes, where the item's tracks are the parent's
   */
  parentRowStart: number | null;
  parentRowEnd: number | null;
  parentColumnStart: number | null;
  parentColumnEnd: number | null;
  placementMethod: PlacementMethod;
}

export interface SubgridGridSize {
  rows: number;
  columns: number;
}

interface PendingItem {
  id: NodeId;
  row: ResolvedPlacement;
  column: ResolvedPlacement;
}

/**
 * Places the items of one subgrid. Availability is kept per row, with the
 * occupied ranges running along columns.
 */
export class SubgridPlacementState {
  public cursor: AutoPlacementCursor;
  public rows: TrackAvailability[];
  public placements: SubgridItemPlacement[];
  private inheritance: SubgridTrackInheritance;
  private size: SubgridGridSize;

  constructor(
    inheritance: SubgridTrackInheritance,
    size: SubgridGridSize,
    flow: GridAutoFlow
  ) {
    this.inheritance = inheritance;
    this.size = size;
    this.cursor = new AutoPlacementCursor(size.rows, size.columns, flow);
    this.rows = [];
    for (let i = 0; i < size.rows; i++) {
      const parentIndex = inheritance.usesSubgridRows
        ? i + inheritance.coordinateTransform.rowOffset
        : i;
      this.rows.push(new TrackAvailability(parentIndex));
    }
    this.placements = [];
  }

  isAreaAvailable(row: number, column: number, rowSpan: number, columnSpan: number) {
    if (row + rowSpan > this.size.rows || column + columnSpan > this.size.columns) {
      return false;
    }

    for (let r = row; r < row + rowSpan; r++) {
      if (!this.rows[r].isRangeAvailable(column, column + columnSpan)) return false;
    }

    return true;
  }

  place(
    item: NodeId,
    row: number,
    column: number,
    rowSpan: number,
    columnSpan: number,
    method: PlacementMethod
  ): SubgridItemPlacement {
    for (let r = row; r < Math.min(row + rowSpan, this.size.rows); r++) {
      this.rows[r].markRangeOccupied(column, column + columnSpan, item, method);
    }

    const {usesSubgridRows, usesSubgridColumns, coordinateTransform: t} = this.inheritance;
    const placement: SubgridItemPlacement = {
      itemId: item,
      localRowStart: row,
      localRowEnd: row + rowSpan,
      localColumnStart: column,
      localColumnEnd: column + columnSpan,
      parentRowStart: usesSubgridRows ? row + t.rowOffset : null,
      parentRowEnd: usesSubgridRows ? row + rowSpan + t.rowOffset : null,
      parentColumnStart: usesSubgridColumns ? column + t.columnOffset : null,
      parentColumnEnd: usesSubgridColumns ? column + columnSpan + t.columnOffset : null,
      placementMethod: method
    };

    this.placements.push(placement);
    return placement;
  }

  private placeLocked(item: PendingItem, lockedAxis: GridAxis) {
    const locked = lockedAxis === 'row' ? item.row : item.column;
    const free = lockedAxis === 'row' ? item.column : item.row;
    const lockedStart = locked.start ?? 0;
    const limit = lockedAxis === 'row' ? this.size.columns : this.size.rows;

    for (let i = 0; i + free.span <= limit; i++) {
      const [row, column] = lockedAxis === 'row' ? [lockedStart, i] : [i, lockedStart];
      if (this.isAreaAvailable(row, column, item.row.span, item.column.span)) {
        return this.place(item.id, row, column, item.row.span, item.column.span, {
          type: lockedAxis === 'row' ? 'explicit-row' : 'explicit-column'
        });
      }
    }

    throw GridPreprocessingError.preprocessingFailed(
      'auto_placement',
      item.id,
      `No available ${lockedAxis === 'row' ? 'column' : 'row'} in ${lockedAxis} ${lockedStart + 1}`
    );
  }

  private placeAuto(item: PendingItem) {
    const cursor = this.cursor;
    const dense = cursor.densePacking;
    const maxPositions = Math.max(1, this.size.rows * this.size.columns);

    if (dense) cursor.reset();

    for (let attempts = 0; attempts < maxPositions && !cursor.isExhausted(); attempts++) {
      const {row, column} = cursor.position();

      if (this.isAreaAvailable(row, column, item.row.span, item.column.span)) {
        const placement = this.place(item.id, row, column, item.row.span, item.column.span, {
          type: dense ? 'dense' : 'auto',
          cursor: {row, column}
        });
        if (!dense) cursor.advancePastPlacedItem(placement);
        return placement;
      }

      if (!cursor.advanceToNextPosition()) break;
    }

    throw GridPreprocessingError.preprocessingFailed(
      'auto_placement',
      item.id,
      `No available positions found after checking ${maxPositions} positions`
    );
  }

  /**
   * Places `items` in CSS order: items definite on both axes first, then items
   * locked to a row or column, then the rest with the cursor
   */
  placeItems(tree: GridTree, items: readonly NodeId[]): SubgridItemPlacement[] {
    const {rowLineNames, columnLineNames} = this.inheritance;
    const ordered = sortedBy(items, id => tree.gridItemStyle(id).order);
    const pending: PendingItem[] = ordered.map(id => {
      const style = tree.gridItemStyle(id);
      return {
        id,
        row: resolveItemPlacement(style.gridRow, this.size.rows, rowLineNames),
        column: resolveItemPlacement(style.gridColumn, this.size.columns, columnLineNames)
      };
    });

    const placed: SubgridItemPlacement[] = [];

    for (const item of pending) {
      if (item.row.start != null && item.column.start != null) {
        placed.push(this.place(
          item.id,
          item.row.start,
          item.column.start,
          item.row.span,
          item.column.span,
          {type: 'explicit-both'}
        ));
      }
    }

    for (const item of pending) {
      if (item.row.start != null && item.column.start == null) {
        placed.push(this.placeLocked(item, 'row'));
      } else if (item.row.start == null && item.column.start != null) {
        placed.push(this.placeLocked(item, 'column'));
      }
    }

    for (const item of pending) {
      if (item.row.start == null && item.column.start == null) {
        placed.push(this.placeAuto(item));
      }
    }

    return placed;
  }

  log(log?: Logger) {
    const flush = !log;

    log ||= new Logger();

    log.text(`Subgrid placement ${this.size.rows}x${this.size.columns}\n`);
    log.pushIndent();
    for (const row of this.rows) row.log(log);
    log.popIndent();

    if (flush) log.flush();
  }
}

/**
 * Places the children of a subgrid into its tracks
 */
export function placeSubgridItems(
  tree: GridTree,
  subgridId: NodeId,
  inheritance: SubgridTrackInheritance,
  size: SubgridGridSize
): SubgridItemPlacement[] {
  const style = tree.gridContainerStyle(subgridId);
  const flow = style?.gridAutoFlow ?? {direction: 'row', dense: false};
  const state = new SubgridPlacementState(inheritance, size, flow);
  return state.placeItems(tree, tree.children(subgridId));
}
