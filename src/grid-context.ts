import {environment} from './environment.js';
import {GridContextError, TrackExtractionError} from './grid-errors.js';
import {resolveLengthPercentage} from './grid-types.js';
import {extractTracks, extractLineNames, templateKind} from './track-extraction.js';
import {Logger} from './util.js';

import type {NodeId, GridAxis, LineNames, TrackSizingFunction} from './grid-types.js';
import type {GridTree, Display} from './grid-tree.js';

export interface ParentGridContext {
  containerId: NodeId;
  rowTracks: TrackSizingFunction[];
  columnTracks: TrackSizingFunction[];
  rowLineNames: LineNames;
  columnLineNames: LineNames;
  hasSubgridRows: boolean;
  hasSubgridColumns: boolean;
  rowTrackCount: number;
  columnTrackCount: number;
  rowGap: number;
  columnGap: number;
  /**
   * The parent's content box size, per axis null when not yet resolved
   */
  size: {width: number | null, height: number | null};
}

const GRID_DISPLAYS: ReadonlySet<Display> = new Set<Display>([
  'grid',
  'inline-grid',
  'masonry',
  'inline-masonry'
]);

const UNRESOLVED_SIZE = {width: null, height: null};

/**
 * Builds the grid context for `node` if it is a grid container that declares
 * row or column tracks. Returns null for anything else.
 */
export function checkParentGridContainer(
  tree: GridTree,
  node: NodeId,
  size: {width: number | null, height: number | null} = UNRESOLVED_SIZE
): ParentGridContext | null {
  const style = tree.gridContainerStyle(node);
  if (!style || !GRID_DISPLAYS.has(style.display)) return null;

  const rowKind = templateKind(tree, node, 'row');
  const columnKind = templateKind(tree, node, 'column');
  if (rowKind === 'none' && columnKind === 'none') return null;

  const rowGap = resolveLengthPercentage(style.rowGap, size.height);
  const columnGap = resolveLengthPercentage(style.columnGap, size.width);

  const axisTracks = (axis: GridAxis) => {
    const kind = axis === 'row' ? rowKind : columnKind;
    // a subgridded axis gets its tracks from further up, masonry has none
    if (kind !== 'tracks') return [];
    try {
      return extractTracks(tree, node, axis, {
        containerSize: axis === 'row' ? size.height : size.width,
        gap: axis === 'row' ? rowGap : columnGap
      }).tracks;
    } catch (e) {
      if (e instanceof TrackExtractionError) throw new GridContextError(node, e);
      throw e;
    }
  };

  const rowTracks = axisTracks('row');
  const columnTracks = axisTracks('column');

  return {
    containerId: node,
    rowTracks,
    columnTracks,
    rowLineNames: extractLineNames(style.gridTemplateRowNames, rowTracks.length),
    columnLineNames: extractLineNames(style.gridTemplateColumnNames, columnTracks.length),
    hasSubgridRows: rowKind === 'subgrid',
    hasSubgridColumns: columnKind === 'subgrid',
    rowTrackCount: rowTracks.length,
    columnTrackCount: columnTracks.length,
    rowGap,
    columnGap,
    size: {width: size.width, height: size.height}
  };
}

export interface GridContextCacheStats {
  hits: number;
  misses: number;
  /**
   * Number of times the tree was asked for a node's children while searching
   * for a parent
   */
  traversals: number;
  hitRatio: number;
  parentEntries: number;
  contextEntries: number;
  generation: number;
}

/**
 * Memoizes parent lookups and parent grid contexts. One of these belongs to
 * each layout context; it is never shared between documents.
 *
 * Parents are found without a parent pointer. Hosts allocate ids roughly in
 * tree order, so a node's parent is usually a little below it: a bounded
 * downward scan is tried first, then a bounded breadth-first search from the
 * low-id roots. Every children() call made along the way caches the parent of
 * each child it returns, so siblings of a node that was already looked up are
 * found in O(1).
 */
export class GridContextCache {
  private parents: Map<NodeId, NodeId | null>;
  private contexts: Map<NodeId, ParentGridContext | null>;
  private generation: number;
  private hits: number;
  private misses: number;
  private traversals: number;

  constructor() {
    this.parents = new Map();
    this.contexts = new Map();
    this.generation = 0;
    this.hits = 0;
    this.misses = 0;
    this.traversals = 0;
  }

  private childrenOf(tree: GridTree, node: NodeId) {
    const children = tree.children(node);
    this.traversals += 1;
    for (const child of children) this.parents.set(child, node);
    return children;
  }

  private findParentHeuristic(tree: GridTree, node: NodeId): NodeId | null {
    const limit = Math.max(0, node - environment.heuristicScanLimit);

    for (let candidate = node - 1; candidate >= limit; candidate--) {
      if (this.childrenOf(tree, candidate).includes(node)) return candidate;
    }

    return null;
  }

  private findParentBfs(tree: GridTree, node: NodeId): NodeId | null {
    const visited = new Set<NodeId>();
    const queue: NodeId[] = [];

    for (let root = 0; root < environment.bfsRootCount; root++) {
      if (root !== node) queue.push(root);
    }

    for (let i = 0; i < queue.length && visited.size < environment.bfsVisitLimit; i++) {
      const current = queue[i];
      if (visited.has(current)) continue;
      visited.add(current);

      for (const child of this.childrenOf(tree, current)) {
        if (child === node) return current;
        if (!visited.has(child)) queue.push(child);
      }
    }

    return null;
  }

  /**
   * Finds the parent of `node`, or null if it is a root (or too far away to be
   * found within the configured limits)
   */
  findParent(tree: GridTree, node: NodeId): NodeId | null {
    const cached = this.parents.get(node);
    if (cached !== undefined) return cached;

    const parent = this.findParentHeuristic(tree, node) ?? this.findParentBfs(tree, node);
    this.parents.set(node, parent);
    return parent;
  }

  /**
   * The grid context of `node`'s parent, or null if the parent is not a grid
   * container (or there is no parent). Both outcomes are cached.
   */
  getOrComputeParentContext(tree: GridTree, node: NodeId): ParentGridContext | null {
    const knownParent = this.parents.get(node);

    if (knownParent === null) {
      this.hits += 1;
      return null;
    }

    if (knownParent !== undefined) {
      const context = this.contexts.get(knownParent);
      if (context !== undefined) {
        this.hits += 1;
        return context;
      }
    }

    this.misses += 1;

    const parent = this.findParent(tree, node);
    if (parent == null) return null;

    // the parent stays cached even if extraction fails
    const context = checkParentGridContainer(tree, parent);
    this.contexts.set(parent, context);
    this.enforceSizeLimits();
    return context;
  }

  invalidate() {
    this.parents.clear();
    this.contexts.clear();
  }

  /**
   * Hosts bump a generation number whenever the tree's structure changes. The
   * cache is dropped when it sees a new one.
   */
  invalidateOnTreeChange(generation: number) {
    if (generation !== this.generation) {
      this.invalidate();
      this.generation = generation;
    }
  }

  /**
   * Forgets everything about `root` and its descendants, for when the host
   * replaced or restyled a subtree
   */
  invalidateSubtree(tree: GridTree, root: NodeId) {
    const stack = [root];
    while (stack.length) {
      const node = stack.pop();
      if (node === undefined) break;
      this.parents.delete(node);
      this.contexts.delete(node);
      stack.push(...tree.children(node));
    }
  }

  enforceSizeLimits() {
    if (this.parents.size > environment.parentCacheLimit) this.parents.clear();
    if (this.contexts.size > environment.contextCacheLimit) this.contexts.clear();
  }

  stats(): GridContextCacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      traversals: this.traversals,
      hitRatio: total ? this.hits / total : 0,
      parentEntries: this.parents.size,
      contextEntries: this.contexts.size,
      generation: this.generation
    };
  }

  report(log?: Logger) {
    const flush = !log;
    const stats = this.stats();

    log ||= new Logger();

    log.bold();
    log.text('Grid context cache');
    log.reset();
    log.text(` (generation ${stats.generation})\n`);
    log.pushIndent();
    log.text(`hits: ${stats.hits}, misses: ${stats.misses}, ` +
      `ratio: ${(stats.hitRatio * 100).toFixed(1)}%\n`);
    log.text(`traversals: ${stats.traversals}\n`);
    log.text(`entries: ${stats.parentEntries} parents, ${stats.contextEntries} contexts\n`);
    log.popIndent();

    if (flush) log.flush();
  }
}

export function resolveParentGridContext(
  tree: GridTree,
  node: NodeId,
  cache: GridContextCache
): ParentGridContext | null {
  return cache.getOrComputeParentContext(tree, node);
}

/**
 * The parents that could be `node`'s grid container. Grid items are always
 * direct children of their container, so this is at most one node.
 */
export function findPotentialParentsConstrained(
  tree: GridTree,
  node: NodeId,
  cache: GridContextCache
): NodeId[] {
  const parent = cache.findParent(tree, node);
  return parent == null ? [] : [parent];
}
