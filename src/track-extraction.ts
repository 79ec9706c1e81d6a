import {environment} from './environment.js';
import {TrackExtractionError} from './grid-errors.js';
import {fixedTrackSize, isTrackList} from './grid-types.js';

import type {
  NodeId,
  GridAxis,
  GridTemplate,
  LineNames,
  TrackBreadth,
  TrackListComponent,
  TrackSizingFunction,
  TrackSpan
} from './grid-types.js';
import type {GridTree, ResolvedGridTemplate} from './grid-tree.js';

export interface RepeatContext {
  /**
   * Content-box size of the container on the axis being expanded, if definite
   */
  containerSize: number | null;
  gap: number;
}

export interface ExpandedTrackList {
  tracks: TrackSizingFunction[];
  /**
   * Expanded track indices that came from a repeat(auto-fit, ...), if any
   */
  autoFitRange: TrackSpan | null;
}

const INDEFINITE: RepeatContext = {containerSize: null, gap: 0};

function validateBreadth(b: TrackBreadth) {
  switch (b.type) {
    case 'length':
    case 'percent':
    case 'fr':
      if (!Number.isFinite(b.value) || b.value < 0) {
        throw new TrackExtractionError({
          kind: 'invalid-track-size',
          value: `${b.value}${b.type === 'length' ? 'px' : b.type === 'percent' ? '%' : 'fr'}`
        });
      }
  }
}

function validateTrack(track: TrackSizingFunction) {
  validateBreadth(track.min);
  validateBreadth(track.max);
  if (track.min.type === 'fr') {
    // fr is only valid as a maximum
    throw new TrackExtractionError({
      kind: 'invalid-track-size',
      value: `minmax(${track.min.value}fr, ...)`
    });
  }
}

/**
 * The number of times an auto-fill or auto-fit repeat is repeated: as many as
 * fit in the container without overflowing, but at least once
 */
function autoRepeatCount(
  components: TrackListComponent[],
  repeatTracks: TrackSizingFunction[],
  ctx: RepeatContext
) {
  if (ctx.containerSize == null) return environment.autoRepeatFallbackCount;

  let otherSize = 0;
  let otherCount = 0;
  for (const c of components) {
    if (c.type === 'single') {
      otherSize += fixedTrackSize(c.track, ctx.containerSize) ?? 0;
      otherCount += 1;
    }
  }

  let repeatSize = 0;
  for (const track of repeatTracks) {
    const size = fixedTrackSize(track, ctx.containerSize);
    if (size == null) return environment.autoRepeatFallbackCount;
    repeatSize += size;
  }

  const perRepetition = repeatSize + repeatTracks.length * ctx.gap;
  if (perRepetition <= 0) return environment.autoRepeatFallbackCount;

  const free = ctx.containerSize - otherSize - (otherCount - 1) * ctx.gap;
  return Math.max(1, Math.floor(free / perRepetition));
}

/**
 * Expands repeat() into a flat list of tracks
 */
export function expandTrackList(
  components: TrackListComponent[],
  ctx: RepeatContext = INDEFINITE
): ExpandedTrackList {
  const tracks: TrackSizingFunction[] = [];
  let autoFitRange: TrackSpan | null = null;

  for (const c of components) {
    if (c.type === 'single') {
      validateTrack(c.track);
      tracks.push(c.track);
      continue;
    }

    if (c.tracks.length === 0) {
      throw new TrackExtractionError({
        kind: 'extraction-failed',
        reason: 'repeat() with an empty track list'
      });
    }

    for (const track of c.tracks) validateTrack(track);

    let count: number;
    if (typeof c.count === 'number') {
      if (!Number.isInteger(c.count) || c.count < 1) {
        throw new TrackExtractionError({
          kind: 'extraction-failed',
          reason: `repeat() count must be a positive integer, got ${c.count}`
        });
      }
      count = c.count;
    } else {
      count = autoRepeatCount(components, c.tracks, ctx);
    }

    count = Math.min(count, environment.maxRepetitions);

    const start = tracks.length;
    for (let i = 0; i < count; i++) tracks.push(...c.tracks);

    if (c.count === 'auto-fit') autoFitRange = {start, end: tracks.length};
  }

  return {tracks, autoFitRange};
}

/**
 * Extracts tracks from a declared template. Subgrid and masonry axes don't
 * have tracks of their own, so asking for them is an error.
 */
export function extractTracksFromTemplateList(
  template: GridTemplate | null,
  ctx: RepeatContext = INDEFINITE
): ExpandedTrackList {
  if (template == null) return {tracks: [], autoFitRange: null};

  if (template === 'subgrid') {
    throw new TrackExtractionError({kind: 'subgrid-inheritance-required'});
  }

  if (template === 'masonry') {
    throw new TrackExtractionError({kind: 'masonry-axis-has-no-tracks'});
  }

  return expandTrackList(template, ctx);
}

export function extractTracksFromResolvedTemplate(
  template: ResolvedGridTemplate,
  ctx: RepeatContext = INDEFINITE
): ExpandedTrackList {
  switch (template.type) {
    case 'none':
      return {tracks: [], autoFitRange: null};
    case 'subgrid':
      throw new TrackExtractionError({kind: 'subgrid-inheritance-required'});
    case 'masonry':
      throw new TrackExtractionError({kind: 'masonry-axis-has-no-tracks'});
    case 'tracks':
      return expandTrackList(template.components, ctx);
  }
}

export type AxisTemplateKind = 'none' | 'subgrid' | 'masonry' | 'tracks';

/**
 * What kind of template a node has on an axis, preferring resolved style
 */
export function templateKind(tree: GridTree, node: NodeId, axis: GridAxis): AxisTemplateKind {
  const resolved = tree.resolvedGridTemplate?.(node, axis);
  if (resolved) return resolved.type;

  const style = tree.gridContainerStyle(node);
  const template = axis === 'row' ? style?.gridTemplateRows : style?.gridTemplateColumns;
  if (template == null) return 'none';
  if (isTrackList(template)) return 'tracks';
  return template;
}

/**
 * Extracts a node's tracks on one axis. Uses the host's resolved style when it
 * offers it and falls back to the declared template otherwise.
 */
export function extractTracks(
  tree: GridTree,
  node: NodeId,
  axis: GridAxis,
  ctx: RepeatContext = INDEFINITE
): ExpandedTrackList {
  const resolved = tree.resolvedGridTemplate?.(node, axis);
  if (resolved) return extractTracksFromResolvedTemplate(resolved, ctx);

  const style = tree.gridContainerStyle(node);
  if (!style) return {tracks: [], autoFitRange: null};

  return extractTracksFromTemplateList(
    axis === 'row' ? style.gridTemplateRows : style.gridTemplateColumns,
    ctx
  );
}

/**
 * Copies line names so the context never aliases the host's style. Lines past
 * the end of the declaration get an empty list.
 */
export function extractLineNames(names: LineNames, trackCount: number): LineNames {
  const lines = Math.max(names.length, trackCount + 1);
  const ret: LineNames = [];
  for (let i = 0; i < lines; i++) ret.push(names[i] ? names[i].slice() : []);
  return ret;
}
