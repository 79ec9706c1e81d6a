/**
 * Hosts hand out small, dense integer ids. Everything in gridflow that keeps
 * per-node state indexes arrays with them.
 */
export type NodeId = number;

export type GridAxis = 'row' | 'column';

/**
 * Inline is the horizontal direction and block the vertical one (gridflow only
 * deals with horizontal-tb writing modes)
 */
export type AbstractAxis = 'inline' | 'block';

export function otherAxis(axis: AbstractAxis): AbstractAxis {
  return axis === 'inline' ? 'block' : 'inline';
}

export function otherGridAxis(axis: GridAxis): GridAxis {
  return axis === 'row' ? 'column' : 'row';
}

export type Percentage = {value: number, unit: '%'};

export type LengthPercentage = number | Percentage;

export type TrackBreadth =
  | {type: 'length', value: number}
  | {type: 'percent', value: number}
  | {type: 'fr', value: number}
  | {type: 'auto'}
  | {type: 'min-content'}
  | {type: 'max-content'}
  | {type: 'fit-content', limit: LengthPercentage};

export interface TrackSizingFunction {
  min: TrackBreadth;
  max: TrackBreadth;
}

export type RepeatCount = number | 'auto-fill' | 'auto-fit';

export type TrackListComponent =
  | {type: 'single', track: TrackSizingFunction}
  | {type: 'repeat', count: RepeatCount, tracks: TrackSizingFunction[]};

/**
 * A declared grid-template-rows/columns value. `subgrid` and `masonry` are the
 * keywords; everything else is a track list.
 */
export type GridTemplate = 'subgrid' | 'masonry' | TrackListComponent[];

export function isTrackList(t: GridTemplate | null): t is TrackListComponent[] {
  return Array.isArray(t);
}

/**
 * One list of names per grid line. A template with N tracks has N + 1 lines.
 */
export type LineNames = string[][];

export function length(value: number): TrackSizingFunction {
  return {min: {type: 'length', value}, max: {type: 'length', value}};
}

export function percent(value: number): TrackSizingFunction {
  return {min: {type: 'percent', value}, max: {type: 'percent', value}};
}

export function fr(value: number): TrackSizingFunction {
  return {min: {type: 'auto'}, max: {type: 'fr', value}};
}

export function auto(): TrackSizingFunction {
  return {min: {type: 'auto'}, max: {type: 'auto'}};
}

export function minmax(min: TrackBreadth, max: TrackBreadth): TrackSizingFunction {
  return {min, max};
}

export function single(track: TrackSizingFunction): TrackListComponent {
  return {type: 'single', track};
}

export function repeat(
  count: RepeatCount,
  tracks: TrackSizingFunction[]
): TrackListComponent {
  return {type: 'repeat', count, tracks};
}

/**
 * The definite size of a track if it has one, else null
 */
export function fixedTrackSize(
  track: TrackSizingFunction,
  containerSize: number | null
): number | null {
  const resolve = (b: TrackBreadth) => {
    if (b.type === 'length') return b.value;
    if (b.type === 'percent' && containerSize != null) {
      return b.value / 100 * containerSize;
    }
    return null;
  };

  const min = resolve(track.min);
  const max = resolve(track.max);

  if (min != null && max != null) return Math.max(min, max);
  return min ?? max;
}

export function resolveLengthPercentage(
  v: LengthPercentage,
  containerSize: number | null
): number {
  if (typeof v === 'number') return v;
  return containerSize == null ? 0 : v.value / 100 * containerSize;
}

/**
 * Maps a nested subgrid's local track indices into its immediate parent's.
 * Transforms are composed by walking a chain of them, never by mutating one.
 */
export interface CoordinateTransform {
  rowOffset: number;
  columnOffset: number;
  rowScale: number;
  columnScale: number;
}

export function identityTransform(): CoordinateTransform {
  return {rowOffset: 0, columnOffset: 0, rowScale: 1, columnScale: 1};
}

export function offsetTransform(rowOffset: number, columnOffset: number) {
  return {rowOffset, columnOffset, rowScale: 1, columnScale: 1};
}

/**
 * Half-open range of tracks, zero-based: [start, end)
 */
export interface TrackSpan {
  start: number;
  end: number;
}

export function spanLength(span: TrackSpan) {
  return span.end - span.start;
}

export interface GridPosition {
  row: number;
  column: number;
}

export interface TrackSizingContribution {
  itemId: NodeId;
  axis: GridAxis;
  trackIndex: number;
  minSize: number;
  maxSize: number;
  preferredSize: number | null;
}

export interface Size {
  width: number;
  height: number;
}

export interface Point {
  x: number;
  y: number;
}

export type AvailableSpace = number | 'min-content' | 'max-content';

export interface AvailableSize {
  width: AvailableSpace;
  height: AvailableSpace;
}

export function definite(space: AvailableSpace): number | null {
  return typeof space === 'number' ? space : null;
}

export type SelfAlignment =
  | 'start'
  | 'end'
  | 'flex-start'
  | 'flex-end'
  | 'center'
  | 'baseline'
  | 'stretch';

export interface Edges {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

export const ZERO_EDGES: Readonly<Edges> = Object.freeze({
  top: 0,
  right: 0,
  bottom: 0,
  left: 0
});
