import {fixedTrackSize, ZERO_EDGES} from '../src/grid-types.js';

import type {NodeId, GridAxis, AvailableSize, Size} from '../src/grid-types.js';
import type {
  GridLayoutHost,
  GridContainerStyle,
  GridItemStyle,
  MeasuredBox,
  FontMetrics,
  ResolvedGridTemplate,
  SolverGridStyle,
  SolverItemStyle
} from '../src/grid-tree.js';

export interface FakeNode {
  children: NodeId[];
  container: GridContainerStyle | null;
  item: GridItemStyle;
  minContent: Size;
  maxContent: Size;
  /**
   * Height at a definite width, for text-like content that wraps
   */
  heightForWidth: ((width: number) => number) | null;
  firstBaseline: number | null;
  font: FontMetrics | null;
  resolved: {row: ResolvedGridTemplate | null, column: ResolvedGridTemplate | null};
}

export function containerStyle(style: Partial<GridContainerStyle> = {}): GridContainerStyle {
  return {
    display: 'grid',
    gridTemplateRows: null,
    gridTemplateColumns: null,
    gridTemplateRowNames: [],
    gridTemplateColumnNames: [],
    rowGap: 0,
    columnGap: 0,
    gridAutoFlow: {direction: 'row', dense: false},
    fontSize: 16,
    ...style
  };
}

export function itemStyle(style: Partial<GridItemStyle> = {}): GridItemStyle {
  return {
    order: 0,
    gridRow: {start: 'auto', end: 'auto'},
    gridColumn: {start: 'auto', end: 'auto'},
    alignSelf: null,
    justifySelf: null,
    margin: {...ZERO_EDGES},
    ...style
  };
}

export interface AddOptions {
  container?: Partial<GridContainerStyle>;
  item?: Partial<GridItemStyle>;
  size?: Size;
  minContent?: Size;
  heightForWidth?: (width: number) => number;
  firstBaseline?: number;
  font?: FontMetrics;
}

/**
 * An in-memory box tree. Ids are handed out in insertion order, so adding
 * parents before their children gives tree order.
 */
export class FakeTree implements GridLayoutHost {
  public nodes: FakeNode[];
  public measureCalls: {node: NodeId, space: AvailableSize}[];
  public solverCalls: {style: SolverGridStyle, items: SolverItemStyle[]}[];
  public childrenCalls: number;

  constructor() {
    this.nodes = [];
    this.measureCalls = [];
    this.solverCalls = [];
    this.childrenCalls = 0;
  }

  add(parent: NodeId | null, options: AddOptions = {}): NodeId {
    const id = this.nodes.length;
    const size = options.size ?? {width: 0, height: 0};

    this.nodes.push({
      children: [],
      container: options.container ? containerStyle(options.container) : null,
      item: itemStyle(options.item),
      minContent: options.minContent ?? size,
      maxContent: size,
      heightForWidth: options.heightForWidth ?? null,
      firstBaseline: options.firstBaseline ?? null,
      font: options.font ?? null,
      resolved: {row: null, column: null}
    });

    if (parent != null) this.nodes[parent].children.push(id);

    return id;
  }

  setResolved(node: NodeId, axis: GridAxis, template: ResolvedGridTemplate) {
    this.nodes[node].resolved[axis] = template;
  }

  children(node: NodeId): readonly NodeId[] {
    this.childrenCalls += 1;
    return this.nodes[node]?.children ?? [];
  }

  gridContainerStyle(node: NodeId) {
    return this.nodes[node]?.container ?? null;
  }

  gridItemStyle(node: NodeId) {
    return this.nodes[node]?.item ?? itemStyle();
  }

  resolvedGridTemplate(node: NodeId, axis: GridAxis) {
    return this.nodes[node]?.resolved[axis] ?? null;
  }

  measure(node: NodeId, space: AvailableSize): MeasuredBox {
    const n = this.nodes[node];
    this.measureCalls.push({node, space});

    const width = typeof space.width === 'number'
      ? space.width
      : space.width === 'min-content' ? n.minContent.width : n.maxContent.width;

    let height: number;
    if (typeof space.height === 'number') {
      height = space.height;
    } else if (typeof space.width === 'number' && n.heightForWidth) {
      height = n.heightForWidth(space.width);
    } else {
      height = space.height === 'min-content' ? n.minContent.height : n.maxContent.height;
    }

    return {width, height, firstBaseline: n.firstBaseline};
  }

  /**
   * Fixed tracks get their size, the rest the largest item in them
   */
  solveTracks(style: SolverGridStyle, items: SolverItemStyle[]): number[] {
    this.solverCalls.push({style, items});

    const columns = style.gridTemplateColumns.length > 0;
    const tracks = columns ? style.gridTemplateColumns : style.gridTemplateRows;

    return tracks.map((track, i) => {
      const fixed = fixedTrackSize(track, null);
      if (fixed != null) return fixed;
      let size = 0;
      for (const item of items) {
        const area = columns ? item.gridColumn : item.gridRow;
        if (area && area.start === i) size = Math.max(size, columns ? item.width : item.height);
      }
      return size;
    });
  }

  fontMetrics(node: NodeId) {
    return this.nodes[node]?.font ?? null;
  }
}
