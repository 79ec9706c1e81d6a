import {Logger} from './util.js';

// !!! NOTE !!! if you change anything below, change DESIGN.md too
export interface Environment {
  /**
   * Subgrids nested deeper than this are rejected with an
   * ExcessiveNestingDepth error instead of being coordinated.
   */
  maxSubgridNestingDepth: number;
  /**
   * Upper bound for repeat() counts, including the count computed for
   * auto-fill and auto-fit. Also the largest masonry track count accepted.
   */
  maxRepetitions: number;
  /**
   * The number of repetitions used for auto-fill and auto-fit when the
   * container size or the repeated track sizes are not definite.
   */
  autoRepeatFallbackCount: number;
  /**
   * How many ids below a node the id-order heuristic scans for its parent
   * before handing over to the breadth-first fallback.
   */
  heuristicScanLimit: number;
  /**
   * The breadth-first fallback starts from node ids 0 through this number
   * minus one, which is where hosts allocate document roots.
   */
  bfsRootCount: number;
  /**
   * Maximum nodes the breadth-first fallback visits before giving up.
   */
  bfsVisitLimit: number;
  /**
   * GridContextCache.enforceSizeLimits() clears the parent map once it holds
   * more entries than this...
   */
  parentCacheLimit: number;
  /**
   * ...and the context map once it holds more than this.
   */
  contextCacheLimit: number;
  /**
   * Intrinsic sizing gives up with a CoordinationFailed error after this many
   * passes without converging.
   */
  maxIntrinsicSizingPasses: number;
  /**
   * Two passes have converged when no track size moved by this much.
   */
  convergenceTolerance: number;
  /**
   * Dense masonry packing only reuses a gap when the tracks under it add up to
   * the normal placement's size within this tolerance.
   */
  gapMatchTolerance: number;
  /**
   * Receives diagnostics such as a subgrid falling back to standard grid or a
   * sizing pass that failed to converge. Nothing here is fatal.
   */
  log(message: string): void;
}

export const defaultEnvironment: Environment = {
  maxSubgridNestingDepth: 10,
  maxRepetitions: 1000,
  autoRepeatFallbackCount: 3,
  heuristicScanLimit: 256,
  bfsRootCount: 10,
  bfsVisitLimit: 1000,
  parentCacheLimit: 1024,
  contextCacheLimit: 256,
  maxIntrinsicSizingPasses: 5,
  convergenceTolerance: 0.1,
  gapMatchTolerance: 0.1,
  log(message: string) {
    const log = new Logger();
    log.dim();
    log.text('[gridflow] ');
    log.reset();
    log.text(message);
    log.flush();
  }
};

export const environment = {...defaultEnvironment};
