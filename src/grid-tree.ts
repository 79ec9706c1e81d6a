import type {
  NodeId,
  GridAxis,
  GridTemplate,
  LineNames,
  LengthPercentage,
  TrackListComponent,
  TrackSizingFunction,
  SelfAlignment,
  Edges,
  AvailableSize
} from './grid-types.js';

export type Display =
  | 'none'
  | 'block'
  | 'inline'
  | 'flex'
  | 'grid'
  | 'inline-grid'
  | 'masonry'
  | 'inline-masonry';

export interface GridAutoFlow {
  direction: GridAxis;
  dense: boolean;
}

export interface GridContainerStyle {
  display: Display;
  /**
   * null when grid-template-rows is `none` (not declared)
   */
  gridTemplateRows: GridTemplate | null;
  gridTemplateColumns: GridTemplate | null;
  gridTemplateRowNames: LineNames;
  gridTemplateColumnNames: LineNames;
  rowGap: LengthPercentage;
  columnGap: LengthPercentage;
  gridAutoFlow: GridAutoFlow;
  fontSize: number;
}

/**
 * 1-based line numbers like CSS; negative numbers count from the end line
 */
export type GridPlacement =
  | 'auto'
  | number
  | {span: number}
  | {line: string};

export interface GridLineRange {
  start: GridPlacement;
  end: GridPlacement;
}

export interface GridItemStyle {
  order: number;
  gridRow: GridLineRange;
  gridColumn: GridLineRange;
  alignSelf: SelfAlignment | null;
  justifySelf: SelfAlignment | null;
  margin: Edges;
}

/**
 * The computed value of a grid template after the host's style system has
 * resolved it. Unlike GridTemplate, `none` is explicit.
 */
export type ResolvedGridTemplate =
  | {type: 'none'}
  | {type: 'subgrid'}
  | {type: 'masonry'}
  | {type: 'tracks', components: TrackListComponent[]};

/**
 * What gridflow needs to know about the host's box tree.
 */
export interface GridTree {
  /**
   * Must return an empty list for ids that aren't in the tree
   */
  children(node: NodeId): readonly NodeId[];
  /**
   * null for nodes that have no style of their own (text)
   */
  gridContainerStyle(node: NodeId): GridContainerStyle | null;
  gridItemStyle(node: NodeId): GridItemStyle;
  /**
   * Optional. Hosts that keep resolved style around (a document's native tree)
   * implement this so track extraction doesn't re-derive it from declarations.
   * Returning null for a node means the data isn't available for it, and the
   * declared template is used instead.
   */
  resolvedGridTemplate?(node: NodeId, axis: GridAxis): ResolvedGridTemplate | null;
}

export interface MeasuredBox {
  width: number;
  height: number;
  /**
   * Distance from the top of the border box to the first baseline
   */
  firstBaseline: number | null;
}

export interface FontMetrics {
  ascender: number;
  descender: number;
  lineGap: number;
  upem: number;
  fontSize: number;
}

/**
 * A grid container style reduced to what a generic track sizing solver takes.
 */
export interface SolverGridStyle {
  display: 'grid';
  gridTemplateRows: TrackSizingFunction[];
  gridTemplateColumns: TrackSizingFunction[];
  rowGap: number;
  columnGap: number;
}

export interface SolverItemStyle {
  display: 'block';
  width: number;
  height: number;
  gridRow: {start: number, span: number} | null;
  gridColumn: {start: number, span: number} | null;
}

export interface GridLayoutHost extends GridTree {
  measure(node: NodeId, availableSpace: AvailableSize): MeasuredBox;
  /**
   * Run the host's grid track sizing on a container and its items and return
   * the sizes of the tracks on whichever axis has a non-empty template.
   */
  solveTracks(
    style: SolverGridStyle,
    items: SolverItemStyle[],
    availableSpace: AvailableSize
  ): number[];
  /**
   * Optional. Metrics of the first available font of a node's text content.
   */
  fontMetrics?(node: NodeId): FontMetrics | null;
}
