import {environment} from './environment.js';
import {SubgridError} from './grid-errors.js';
import {fixedTrackSize} from './grid-types.js';
import {GridContextCache, checkParentGridContainer} from './grid-context.js';
import {LineNameInheritanceMapper} from './line-names.js';
import {layoutMasonry} from './masonry.js';
import {
  buildSubgridTrackInheritance,
  childSpans,
  coordinateNestedSubgrids,
  isSubgrid,
  spreadContribution,
  subgridSpansFromStyle
} from './subgrid.js';
import {placeSubgridItems} from './subgrid-placement.js';
import {templateKind} from './track-extraction.js';
import {Logger, sum} from './util.js';

import type {
  NodeId,
  GridAxis,
  LineNames,
  Size,
  AvailableSize,
  TrackSizingFunction,
  TrackSizingContribution
} from './grid-types.js';
import type {GridLayoutHost, GridTree} from './grid-tree.js';
import type {ParentGridContext} from './grid-context.js';
import type {MasonryLayout} from './masonry.js';
import type {SubgridTrackInheritance} from './subgrid.js';
import type {SubgridItemPlacement} from './subgrid-placement.js';
import type {TreeLogOptions} from './util.js';

/**
 * Per-node state in a dense array indexed by node id
 */
export class NodeSlab<T> {
  private items: (T | undefined)[];
  private count: number;

  constructor() {
    this.items = [];
    this.count = 0;
  }

  get(id: NodeId): T | undefined {
    return this.items[id];
  }

  set(id: NodeId, value: T) {
    if (this.items[id] === undefined) this.count += 1;
    this.items[id] = value;
  }

  has(id: NodeId) {
    return this.items[id] !== undefined;
  }

  delete(id: NodeId) {
    if (this.items[id] !== undefined) {
      this.count -= 1;
      this.items[id] = undefined;
    }
  }

  get size() {
    return this.count;
  }

  *entries(): Generator<[NodeId, T]> {
    for (let id = 0; id < this.items.length; id++) {
      const item = this.items[id];
      if (item !== undefined) yield [id, item];
    }
  }
}

export type LayoutPass = 1 | 2 | 3 | 4;

const NEXT_PASS: Record<LayoutPass, LayoutPass> = {1: 2, 2: 3, 3: 4, 4: 4};

export interface LayoutPassState {
  currentPass: LayoutPass;
  passesCompleted: [boolean, boolean, boolean, boolean];
  dependencies: NodeId[];
  requiresParentRecompute: boolean;
  hasSizeChanges: boolean;
}

/**
 * Line name to the 1-based lines of the subgrid that carry it
 */
export type LineNameMap = Map<string, number[]>;

export interface SubgridLayoutState {
  parentId: NodeId;
  inheritance: SubgridTrackInheritance;
  /**
   * What replaces `subgrid` in grid-template-rows/columns, null for axes that
   * keep their own template
   */
  replacedTemplates: {rows: TrackSizingFunction[] | null, columns: TrackSizingFunction[] | null};
  lineNameMap: {rows: LineNameMap, columns: LineNameMap};
  /**
   * In the parent grid's track indices
   */
  sizeContributions: TrackSizingContribution[];
}

export interface ContentSizes {
  minContent: Size;
  maxContent: Size;
}

export interface IntrinsicSizingState {
  contentContributions: Map<NodeId, ContentSizes>;
  passes: number;
  converged: boolean;
}

export interface AutoPlacementState {
  placements: SubgridItemPlacement[];
}

export interface TrackSizes {
  rows: number[];
  columns: number[];
}

export interface SubgridLayoutResult {
  subgridId: NodeId;
  trackSizes: TrackSizes;
  placements: SubgridItemPlacement[];
  contributions: TrackSizingContribution[];
}

function newPassState(): LayoutPassState {
  return {
    currentPass: 1,
    passesCompleted: [false, false, false, false],
    dependencies: [],
    requiresParentRecompute: false,
    hasSizeChanges: false
  };
}

/**
 * Builds the line name map of an axis that gets line names written into it.
 * Only track lists can carry them; a masonry axis has no lines and `none` has
 * no template to write into.
 */
export function lineNamesForTemplate(
  tree: GridTree,
  node: NodeId,
  axis: GridAxis,
  names: LineNames
): LineNameMap {
  const kind = templateKind(tree, node, axis);

  if (kind !== 'tracks' && kind !== 'subgrid') {
    throw new SubgridError({kind: 'line-name-write-unsupported', nodeId: node, axis, template: kind});
  }

  const map: LineNameMap = new Map();
  for (let i = 0; i < names.length; i++) {
    for (const name of names[i]) {
      const lines = map.get(name);
      if (lines) {
        lines.push(i + 1);
      } else {
        map.set(name, [i + 1]);
      }
    }
  }

  return map;
}

function initialTrackSizes(tracks: TrackSizingFunction[], containerSize: number | null) {
  return tracks.map(track => fixedTrackSize(track, containerSize) ?? 0);
}

/**
 * Runs subgrid layout as a sequence of passes over a registry of per-node
 * state. One coordinator lives for one layout of the document and is thrown
 * away afterwards.
 */
export class GridLayoutCoordinator {
  public host: GridLayoutHost;
  public cache: GridContextCache;
  public mapper: LineNameInheritanceMapper;
  public layoutPasses: NodeSlab<LayoutPassState>;
  public subgridStates: NodeSlab<SubgridLayoutState>;
  public autoPlacementStates: NodeSlab<AutoPlacementState>;
  public intrinsicSizingStates: NodeSlab<IntrinsicSizingState>;
  public masonryStates: NodeSlab<MasonryLayout>;
  /**
   * Last known track sizes of grids that have subgrids in them
   */
  public trackSizes: NodeSlab<TrackSizes>;

  constructor(host: GridLayoutHost, cache: GridContextCache = new GridContextCache()) {
    this.host = host;
    this.cache = cache;
    this.mapper = new LineNameInheritanceMapper();
    this.layoutPasses = new NodeSlab();
    this.subgridStates = new NodeSlab();
    this.autoPlacementStates = new NodeSlab();
    this.intrinsicSizingStates = new NodeSlab();
    this.masonryStates = new NodeSlab();
    this.trackSizes = new NodeSlab();
  }

  private passState(node: NodeId) {
    let state = this.layoutPasses.get(node);
    if (!state) {
      state = newPassState();
      this.layoutPasses.set(node, state);
    }
    return state;
  }

  private completePass(node: NodeId, pass: LayoutPass) {
    const state = this.passState(node);
    state.passesCompleted[pass - 1] = true;
    if (state.currentPass === pass) state.currentPass = NEXT_PASS[pass];
  }

  private requireSubgridState(subgridId: NodeId) {
    const state = this.subgridStates.get(subgridId);
    if (!state) {
      throw SubgridError.coordinateMappingFailed(
        `Track inheritance was not set up for subgrid ${subgridId}`
      );
    }
    return state;
  }

  /**
   * Resolves the parent grid of `subgridId` through the cache
   */
  parentContextOf(subgridId: NodeId): ParentGridContext {
    const parent = this.cache.getOrComputeParentContext(this.host, subgridId);
    if (!parent) throw new SubgridError({kind: 'no-parent-grid', nodeId: subgridId});
    return parent;
  }

  /**
   * Records the track sizes the host's grid algorithm last gave a grid
   */
  setTrackSizes(gridId: NodeId, sizes: TrackSizes) {
    this.trackSizes.set(gridId, {rows: sizes.rows.slice(), columns: sizes.columns.slice()});
  }

  getTrackSizes(gridId: NodeId): TrackSizes | undefined {
    return this.trackSizes.get(gridId);
  }

  private parentTrackSizes(parent: ParentGridContext) {
    let sizes = this.trackSizes.get(parent.containerId);
    if (!sizes) {
      sizes = {
        rows: initialTrackSizes(parent.rowTracks, parent.size.height),
        columns: initialTrackSizes(parent.columnTracks, parent.size.width)
      };
      this.trackSizes.set(parent.containerId, sizes);
    }
    return sizes;
  }

  /**
   * Pass 1: works out the subgrid's tracks and line names from its parent's
   */
  setupTrackInheritance(subgridId: NodeId, parent: ParentGridContext): SubgridTrackInheritance {
    const own = checkParentGridContainer(this.host, subgridId);
    if (!own || !own.hasSubgridRows && !own.hasSubgridColumns) {
      throw SubgridError.notSupported(`node ${subgridId} is not a subgrid`);
    }

    const spans = subgridSpansFromStyle(this.host, subgridId, parent, {
      rows: own.hasSubgridRows,
      columns: own.hasSubgridColumns
    });
    const inheritance = buildSubgridTrackInheritance(parent, subgridId, spans, own, this.mapper);

    this.subgridStates.set(subgridId, {
      parentId: parent.containerId,
      inheritance,
      replacedTemplates: {
        rows: inheritance.usesSubgridRows ? inheritance.rowTracks : null,
        columns: inheritance.usesSubgridColumns ? inheritance.columnTracks : null
      },
      lineNameMap: {
        rows: inheritance.usesSubgridRows
          ? lineNamesForTemplate(this.host, subgridId, 'row', inheritance.rowLineNames)
          : new Map(),
        columns: inheritance.usesSubgridColumns
          ? lineNamesForTemplate(this.host, subgridId, 'column', inheritance.columnLineNames)
          : new Map()
      },
      sizeContributions: []
    });

    const state = this.passState(subgridId);
    if (!state.dependencies.includes(parent.containerId)) {
      state.dependencies.push(parent.containerId);
    }
    this.completePass(subgridId, 1);

    return inheritance;
  }

  /**
   * Pass 2: measures the subgrid's items at min-content and max-content
   */
  collectIntrinsicSizeContributions(subgridId: NodeId): Map<NodeId, ContentSizes> {
    this.requireSubgridState(subgridId);

    const contributions = new Map<NodeId, ContentSizes>();

    for (const item of this.host.children(subgridId)) {
      const min = this.host.measure(item, {width: 'min-content', height: 'min-content'});
      const max = this.host.measure(item, {width: 'max-content', height: 'max-content'});
      contributions.set(item, {
        minContent: {width: min.width, height: min.height},
        maxContent: {width: max.width, height: max.height}
      });
    }

    this.intrinsicSizingStates.set(subgridId, {
      contentContributions: contributions,
      passes: 0,
      converged: false
    });
    this.completePass(subgridId, 2);

    return contributions;
  }

  /**
   * Pass 3: places the subgrid's items into its inherited tracks
   */
  coordinateAutoPlacement(subgridId: NodeId): SubgridItemPlacement[] {
    const {inheritance} = this.requireSubgridState(subgridId);
    const placements = placeSubgridItems(this.host, subgridId, inheritance, {
      rows: Math.max(1, inheritance.rowTracks.length),
      columns: Math.max(1, inheritance.columnTracks.length)
    });

    this.autoPlacementStates.set(subgridId, {placements});
    this.completePass(subgridId, 3);

    return placements;
  }

  private contributionsFor(subgridId: NodeId, columnSizes: number[] | null) {
    const state = this.requireSubgridState(subgridId);
    const {inheritance} = state;
    const placements = this.autoPlacementStates.get(subgridId)?.placements ??
      this.coordinateAutoPlacement(subgridId);
    const measured = this.intrinsicSizingStates.get(subgridId)?.contentContributions ??
      this.collectIntrinsicSizeContributions(subgridId);
    const parent = this.parentContextOf(subgridId);
    const local: TrackSizingContribution[] = [];
    const mapped: TrackSizingContribution[] = [];

    for (const p of placements) {
      if (isSubgrid(this.host, p.itemId)) {
        const nested = coordinateNestedSubgrids(this.host, p.itemId, inheritance, inheritance, {
          spans: childSpans(this.host, p),
          parentSubgridId: subgridId,
          depth: 2,
          mapper: this.mapper
        });
        local.push(...nested.contributions);
        continue;
      }

      const sizes = measured.get(p.itemId);
      if (!sizes) continue;

      let height = sizes.maxContent.height;

      // rows depend on how wide the items end up
      if (columnSizes && inheritance.usesSubgridColumns && p.parentColumnStart != null &&
        p.parentColumnEnd != null) {
        const width = parent.columnGap * (p.parentColumnEnd - p.parentColumnStart - 1) +
          sum(columnSizes.slice(p.parentColumnStart, p.parentColumnEnd));
        height = this.host.measure(p.itemId, {width, height: 'max-content'}).height;
      }

      if (inheritance.usesSubgridRows) {
        local.push(...spreadContribution(
          p.itemId, 'row', p.localRowStart, p.localRowEnd, sizes.minContent.height, height
        ));
      }

      if (inheritance.usesSubgridColumns) {
        local.push(...spreadContribution(
          p.itemId,
          'column',
          p.localColumnStart,
          p.localColumnEnd,
          sizes.minContent.width,
          sizes.maxContent.width
        ));
      }
    }

    const t = inheritance.coordinateTransform;

    for (const c of local) {
      const subgridded = c.axis === 'row' ? inheritance.usesSubgridRows : inheritance.usesSubgridColumns;
      if (!subgridded) continue;
      const offset = c.axis === 'row' ? t.rowOffset : t.columnOffset;
      const count = c.axis === 'row' ? parent.rowTracks.length : parent.columnTracks.length;
      const trackIndex = c.trackIndex + offset;

      if (trackIndex >= count) {
        throw SubgridError.coordinateMappingFailed(
          `${c.axis === 'row' ? 'Row' : 'Column'} track index ${trackIndex} ` +
          `exceeds parent grid track count ${count}`
        );
      }

      mapped.push({...c, trackIndex});
    }

    state.sizeContributions = mapped;
    return mapped;
  }

  private applyContributions(
    subgridId: NodeId,
    contributions: TrackSizingContribution[]
  ) {
    const parent = this.parentContextOf(subgridId);
    const known = this.parentTrackSizes(parent);
    const next: TrackSizes = {rows: known.rows.slice(), columns: known.columns.slice()};
    let delta = 0;

    for (const c of contributions) {
      const sizes = c.axis === 'row' ? next.rows : next.columns;
      const current = sizes[c.trackIndex] ?? 0;
      const required = Math.max(c.minSize, c.maxSize);
      if (required > current) {
        delta = Math.max(delta, required - current);
        sizes[c.trackIndex] = required;
      }
    }

    this.trackSizes.set(parent.containerId, next);
    return {sizes: next, delta};
  }

  /**
   * Pass 4: maps the items' sizes into the parent's tracks and grows the
   * parent's last known track sizes to fit them. Returns true if any grew, in
   * which case the parent grid has to be sized again.
   */
  coordinateBidirectionalSizing(subgridId: NodeId): boolean {
    const known = this.parentTrackSizes(this.parentContextOf(subgridId));
    const contributions = this.contributionsFor(subgridId, known.columns);
    const {delta} = this.applyContributions(subgridId, contributions);
    const state = this.passState(subgridId);
    const changed = delta >= environment.convergenceTolerance;

    if (changed) {
      state.requiresParentRecompute = true;
      state.hasSizeChanges = true;
    }

    this.completePass(subgridId, 4);
    return changed;
  }

  /**
   * Repeats pass 4 until the parent's track sizes stop moving. Row sizes can
   * depend on column sizes, so this can take more than one pass.
   */
  runIntrinsicSizing(subgridId: NodeId): TrackSizes {
    const max = environment.maxIntrinsicSizingPasses;

    for (let pass = 1; pass <= max; pass++) {
      const known = this.parentTrackSizes(this.parentContextOf(subgridId));
      const contributions = this.contributionsFor(subgridId, known.columns);
      const {sizes, delta} = this.applyContributions(subgridId, contributions);
      const passState = this.passState(subgridId);
      const state = this.intrinsicSizingStates.get(subgridId);

      if (state) state.passes = pass;

      if (delta >= environment.convergenceTolerance) {
        passState.requiresParentRecompute = true;
        passState.hasSizeChanges = true;
      } else {
        if (state) state.converged = true;
        this.completePass(subgridId, 4);
        return sizes;
      }
    }

    environment.log(`Intrinsic sizing of subgrid ${subgridId} did not converge after ${max} passes`);
    throw new SubgridError({
      kind: 'coordination-failed',
      details: `Intrinsic sizing did not converge after ${max} passes`
    });
  }

  /**
   * Runs all four passes for a subgrid, finding its parent through the cache
   */
  processSubgrid(subgridId: NodeId): SubgridLayoutResult {
    this.setupTrackInheritance(subgridId, this.parentContextOf(subgridId));
    this.collectIntrinsicSizeContributions(subgridId);
    this.coordinateAutoPlacement(subgridId);
    this.runIntrinsicSizing(subgridId);
    return this.finalizeLayout(subgridId);
  }

  /**
   * The subgrid's track sizes, taken out of its parent's, and its placements
   */
  finalizeLayout(subgridId: NodeId): SubgridLayoutResult {
    const state = this.requireSubgridState(subgridId);
    const {inheritance} = state;
    const parent = this.parentContextOf(subgridId);
    const known = this.parentTrackSizes(parent);
    const t = inheritance.coordinateTransform;

    const rows = inheritance.usesSubgridRows
      ? known.rows.slice(t.rowOffset, t.rowOffset + inheritance.rowTracks.length)
      : initialTrackSizes(inheritance.rowTracks, null);
    const columns = inheritance.usesSubgridColumns
      ? known.columns.slice(t.columnOffset, t.columnOffset + inheritance.columnTracks.length)
      : initialTrackSizes(inheritance.columnTracks, null);

    const passState = this.passState(subgridId);
    passState.passesCompleted = [true, true, true, true];
    passState.currentPass = 4;
    passState.requiresParentRecompute = false;

    return {
      subgridId,
      trackSizes: {rows, columns},
      placements: this.autoPlacementStates.get(subgridId)?.placements ?? [],
      contributions: state.sizeContributions
    };
  }

  /**
   * Lays out a masonry container and keeps the result
   */
  layoutMasonry(container: NodeId, available: AvailableSize): MasonryLayout {
    const layout = layoutMasonry(this.host, container, available);
    this.masonryStates.set(container, layout);
    this.completePass(container, 4);
    return layout;
  }

  log(options?: TreeLogOptions, log?: Logger) {
    const flush = !log;

    log ||= new Logger();

    log.bold();
    log.text('Grid layout coordinator');
    log.reset();
    log.text('\n');
    log.pushIndent();

    for (const [id, state] of this.layoutPasses.entries()) {
      const done = state.passesCompleted.filter(Boolean).length;
      log.text(`#${id} pass ${state.currentPass} (${done}/4 done)`);
      if (state.requiresParentRecompute) {
        log.dim();
        log.text(' parent recompute');
        log.reset();
      }
      log.text('\n');

      const subgrid = this.subgridStates.get(id);
      if (subgrid) {
        log.pushIndent();
        log.text(`parent #${subgrid.parentId}, ` +
          `${subgrid.inheritance.rowTracks.length}x${subgrid.inheritance.columnTracks.length} tracks\n`);
        if (options?.lineNames) {
          for (const [name, lines] of subgrid.lineNameMap.columns) {
            log.text(`column line ${name}: ${lines.join(', ')}\n`);
          }
          for (const [name, lines] of subgrid.lineNameMap.rows) {
            log.text(`row line ${name}: ${lines.join(', ')}\n`);
          }
        }
        if (options?.contributions) {
          for (const c of subgrid.sizeContributions) {
            log.text(`item ${c.itemId} ${c.axis} ${c.trackIndex}: ${c.minSize}/${c.maxSize}\n`);
          }
        }
        log.popIndent();
      }

      const masonry = this.masonryStates.get(id);
      if (masonry) {
        log.pushIndent();
        log.text(`masonry ${masonry.config.masonryAxis}, tracks ${masonry.trackSizes.join(' ')}\n`);
        log.popIndent();
      }
    }

    log.popIndent();

    if (flush) log.flush();
  }
}
