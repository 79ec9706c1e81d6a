import type {NodeId, GridAxis, AbstractAxis} from './grid-types.js';

export type SubgridErrorDetail =
  | {kind: 'no-parent-grid', nodeId: NodeId}
  | {kind: 'invalid-track-inheritance', trackType: string}
  | {kind: 'line-name-mapping-failed', sourceLine: string, targetLine: string, reason: string}
  | {kind: 'not-supported', reason: string}
  | {kind: 'track-count-mismatch', expected: number, actual: number}
  | {kind: 'excessive-nesting-depth', depth: number, maxDepth: number}
  | {kind: 'coordinate-mapping-failed', details: string}
  | {kind: 'coordination-failed', details: string}
  | {kind: 'line-name-write-unsupported', nodeId: NodeId, axis: GridAxis, template: string};

function describeSubgridError(d: SubgridErrorDetail): string {
  switch (d.kind) {
    case 'no-parent-grid':
      return `No parent grid container found for subgrid at node ${d.nodeId}`;
    case 'invalid-track-inheritance':
      return `Invalid track inheritance: cannot inherit ${d.trackType} tracks from parent grid`;
    case 'line-name-mapping-failed':
      return `Line name mapping failed: ${d.sourceLine} -> ${d.targetLine} mapping error: ${d.reason}`;
    case 'not-supported':
      return `Subgrid not supported: ${d.reason} (fallback to standard grid)`;
    case 'track-count-mismatch':
      return `Track count mismatch: expected ${d.expected} tracks, found ${d.actual} in parent grid`;
    case 'excessive-nesting-depth':
      return `Nested subgrid depth ${d.depth} exceeds maximum allowed depth ${d.maxDepth}`;
    case 'coordinate-mapping-failed':
      return `Subgrid coordinate mapping failed: ${d.details}`;
    case 'coordination-failed':
      return `Subgrid coordination failed: ${d.details}`;
    case 'line-name-write-unsupported':
      return `Cannot write ${d.axis} line names into a ${d.template} template ` +
        `at node ${d.nodeId}`;
  }
}

export class SubgridError extends Error {
  readonly detail: SubgridErrorDetail;

  constructor(detail: SubgridErrorDetail) {
    super(describeSubgridError(detail));
    this.name = 'SubgridError';
    this.detail = detail;
  }

  static notSupported(reason: string) {
    return new SubgridError({kind: 'not-supported', reason});
  }

  static lineMappingFailed(sourceLine: string, targetLine: string, reason: string) {
    return new SubgridError({
      kind: 'line-name-mapping-failed',
      sourceLine,
      targetLine,
      reason
    });
  }

  static invalidCssIdentifier(name: string, lineIndex: number, reason: string) {
    return SubgridError.lineMappingFailed(name, `line ${lineIndex + 1}`, reason);
  }

  static invalidLineNameSpan(start: number, end: number, parentLineCount: number) {
    return SubgridError.lineMappingFailed(
      `span ${start}..${end}`,
      `parent lines [0..${parentLineCount}]`,
      'Subgrid span exceeds parent grid line count'
    );
  }

  static coordinateMappingFailed(details: string) {
    return new SubgridError({kind: 'coordinate-mapping-failed', details});
  }
}

export type MasonryErrorDetail =
  | {kind: 'invalid-track-count', trackCount: number, min: number, max: number}
  | {kind: 'placement-failed', trackIndex: number, reason: string}
  | {kind: 'content-sizing-failed', itemNodeId: NodeId, reason: string}
  | {kind: 'track-span-exceeds-available', span: number, availableTracks: number}
  | {kind: 'invalid-axis-configuration', axis: AbstractAxis, reason: string};

function describeMasonryError(d: MasonryErrorDetail): string {
  switch (d.kind) {
    case 'invalid-track-count':
      return `Invalid masonry track count ${d.trackCount}: must be between ${d.min} and ${d.max}`;
    case 'placement-failed':
      return `Masonry item placement failed at track ${d.trackIndex}: ${d.reason}`;
    case 'content-sizing-failed':
      return `Content sizing failed for masonry item ${d.itemNodeId}: ${d.reason}`;
    case 'track-span-exceeds-available':
      return `Masonry track span ${d.span} exceeds available tracks ${d.availableTracks}`;
    case 'invalid-axis-configuration':
      return `Masonry axis ${d.axis} configuration invalid: ${d.reason}`;
  }
}

export class MasonryError extends Error {
  readonly detail: MasonryErrorDetail;

  constructor(detail: MasonryErrorDetail) {
    super(describeMasonryError(detail));
    this.name = 'MasonryError';
    this.detail = detail;
  }

  static placementFailed(trackIndex: number, reason: string) {
    return new MasonryError({kind: 'placement-failed', trackIndex, reason});
  }

  static invalidAxis(axis: AbstractAxis, reason: string) {
    return new MasonryError({kind: 'invalid-axis-configuration', axis, reason});
  }
}

export type TrackExtractionErrorDetail =
  | {kind: 'extraction-failed', reason: string}
  | {kind: 'subgrid-inheritance-required'}
  | {kind: 'masonry-axis-has-no-tracks'}
  | {kind: 'invalid-track-size', value: string};

function describeTrackExtractionError(d: TrackExtractionErrorDetail): string {
  switch (d.kind) {
    case 'extraction-failed':
      return `Track extraction failed: ${d.reason}`;
    case 'subgrid-inheritance-required':
      return 'Subgrid tracks must be inherited from the parent grid';
    case 'masonry-axis-has-no-tracks':
      return 'The masonry axis has no explicit tracks';
    case 'invalid-track-size':
      return `Invalid track size: ${d.value}`;
  }
}

export class TrackExtractionError extends Error {
  readonly detail: TrackExtractionErrorDetail;

  constructor(detail: TrackExtractionErrorDetail) {
    super(describeTrackExtractionError(detail));
    this.name = 'TrackExtractionError';
    this.detail = detail;
  }
}

/**
 * Thrown by parent grid context resolution. The cause is always the
 * TrackExtractionError that made the parent's tracks unusable.
 */
export class GridContextError extends Error {
  readonly kind = 'track-extraction-failed';
  readonly nodeId: NodeId;
  override readonly cause: TrackExtractionError;

  constructor(nodeId: NodeId, cause: TrackExtractionError) {
    super(`Track extraction failed for grid container ${nodeId}: ${cause.message}`);
    this.name = 'GridContextError';
    this.nodeId = nodeId;
    this.cause = cause;
  }
}

export type GridPreprocessingErrorDetail =
  | {kind: 'subgrid', error: SubgridError}
  | {kind: 'masonry', error: MasonryError}
  | {kind: 'track-extraction-failed', reason: string}
  | {kind: 'parent-context-resolution-failed', nodeId: NodeId, reason: string}
  | {kind: 'preprocessing-failed', operation: string, nodeId: NodeId, details: string};

function describeGridPreprocessingError(d: GridPreprocessingErrorDetail): string {
  switch (d.kind) {
    case 'subgrid':
      return `Subgrid preprocessing failed: ${d.error.message}`;
    case 'masonry':
      return `Masonry preprocessing failed: ${d.error.message}`;
    case 'track-extraction-failed':
      return `Grid track extraction failed: ${d.reason}`;
    case 'parent-context-resolution-failed':
      return `Parent grid context resolution failed for node ${d.nodeId}: ${d.reason}`;
    case 'preprocessing-failed':
      return `Grid preprocessing failed: ${d.operation} at node ${d.nodeId} - ${d.details}`;
  }
}

/**
 * Everything gridflow throws at the host layout engine ends up as one of
 * these. The host is expected to lay the subtree out as a standard grid (or
 * as a block) when it catches one.
 */
export class GridPreprocessingError extends Error {
  readonly detail: GridPreprocessingErrorDetail;

  constructor(detail: GridPreprocessingErrorDetail, cause?: Error) {
    super(describeGridPreprocessingError(detail), cause ? {cause} : undefined);
    this.name = 'GridPreprocessingError';
    this.detail = detail;
  }

  static trackExtractionFailed(reason: string) {
    return new GridPreprocessingError({kind: 'track-extraction-failed', reason});
  }

  static parentContextFailed(nodeId: NodeId, reason: string) {
    return new GridPreprocessingError({
      kind: 'parent-context-resolution-failed',
      nodeId,
      reason
    });
  }

  static preprocessingFailed(operation: string, nodeId: NodeId, details: string) {
    return new GridPreprocessingError({
      kind: 'preprocessing-failed',
      operation,
      nodeId,
      details
    });
  }

  static fromSubgrid(error: SubgridError) {
    return new GridPreprocessingError({kind: 'subgrid', error}, error);
  }

  static fromMasonry(error: MasonryError) {
    return new GridPreprocessingError({kind: 'masonry', error}, error);
  }

  static fromTrackExtraction(error: TrackExtractionError) {
    return new GridPreprocessingError(
      {kind: 'track-extraction-failed', reason: error.message},
      error
    );
  }

  static fromGridContext(error: GridContextError) {
    return new GridPreprocessingError({
      kind: 'parent-context-resolution-failed',
      nodeId: error.nodeId,
      reason: error.message
    }, error);
  }

  /**
   * Wraps any of gridflow's own errors. Anything else is a bug and is
   * rethrown.
   */
  static wrap(e: unknown): GridPreprocessingError {
    if (e instanceof GridPreprocessingError) return e;
    if (e instanceof SubgridError) return GridPreprocessingError.fromSubgrid(e);
    if (e instanceof MasonryError) return GridPreprocessingError.fromMasonry(e);
    if (e instanceof TrackExtractionError) {
      return GridPreprocessingError.fromTrackExtraction(e);
    }
    if (e instanceof GridContextError) {
      return GridPreprocessingError.fromGridContext(e);
    }
    throw e;
  }
}
