import {describe, it, expect} from 'vitest';
import {
  MasonryTrackState,
  alignItemWithinArea,
  calculateContainerSizeFromPlacements,
  calculateMasonryConfig,
  calculateTrackIntrinsicSizeWithSpanning,
  collapseAutoFitTracks,
  collectMasonryItems,
  createSolverAvailableSpace,
  createSolverGridStyleForMasonry,
  createSolverItemStyleForMasonry,
  createVirtualPlacementsForSpanningItems,
  detectCompatibleGaps,
  gridAreaToLayout,
  layoutMasonry,
  shouldStretch
} from '../src/masonry.js';
import {MasonryError} from '../src/grid-errors.js';
import {auto, length, repeat} from '../src/grid-types.js';
import {Logger} from '../src/util.js';
import {FakeTree} from './fixtures.js';

import type {GridContainerStyle} from '../src/grid-tree.js';
import type {AvailableSize} from '../src/grid-types.js';
import type {GridItemInfo, MasonryItemContribution, PlacedMasonryItem} from '../src/masonry.js';

const MAX_CONTENT: AvailableSize = {width: 'max-content', height: 'max-content'};

function masonryError(fn: () => unknown) {
  try {
    fn();
  } catch (e) {
    if (e instanceof MasonryError) return e.detail;
    throw e;
  }
  throw new Error('expected a MasonryError');
}

function container(style: Partial<GridContainerStyle>) {
  const tree = new FakeTree();
  const node = tree.add(null, {container: style});
  return {tree, node};
}

function info(nodeId: number, gridAxisStart: number | null = null): GridItemInfo {
  return {nodeId, order: 0, rowSpan: 1, columnSpan: 1, gridAxisStart};
}

function contribution(nodeId: number, span: number, size: number, start: number | null = null) {
  const ret: MasonryItemContribution = {item: info(nodeId, start), span, size};
  return ret;
}

function placed(nodeId: number, start: number, end: number, position: number, size: number) {
  const ret: PlacedMasonryItem = {
    nodeId,
    area: {gridAxisStart: start, gridAxisEnd: end, masonryAxisPosition: position, masonryAxisSize: size}
  };
  return ret;
}

describe('Masonry', () => {
  describe('calculateMasonryConfig', () => {
    it('reads a masonry rows container', () => {
      const {tree, node} = container({
        gridTemplateRows: 'masonry',
        gridTemplateColumns: [repeat(3, [length(100)])],
        columnGap: 10,
        rowGap: 5,
        fontSize: 20,
        gridAutoFlow: {direction: 'row', dense: true}
      });

      expect(calculateMasonryConfig(tree, node, MAX_CONTENT)).toEqual({
        masonryAxis: 'block',
        gridAxis: 'inline',
        tracks: [length(100), length(100), length(100)],
        trackCount: 3,
        itemTolerance: 20,
        densePacking: true,
        autoFitRange: null,
        lineNames: [[], [], [], []],
        gridAxisGap: 10,
        masonryAxisGap: 5
      });
    });

    it('infers the masonry axis', () => {
      const axis = (style: Partial<GridContainerStyle>) => {
        const {tree, node} = container(style);
        return calculateMasonryConfig(tree, node, MAX_CONTENT).masonryAxis;
      };

      expect(axis({gridTemplateColumns: 'masonry', gridTemplateRows: [repeat(2, [auto()])]}))
        .toBe('inline');
      expect(axis({gridTemplateColumns: [repeat(2, [auto()])]})).toBe('block');
      expect(axis({gridTemplateRows: [repeat(2, [auto()])]})).toBe('inline');
      expect(axis({display: 'masonry'})).toBe('block');
    });

    it('gives a grid axis without a template one auto track', () => {
      const {tree, node} = container({display: 'masonry'});
      const config = calculateMasonryConfig(tree, node, MAX_CONTENT);

      expect(config.tracks).toEqual([auto()]);
      expect(config.trackCount).toBe(1);
    });

    it('rejects two masonry axes', () => {
      const {tree, node} = container({gridTemplateRows: 'masonry', gridTemplateColumns: 'masonry'});

      expect(masonryError(() => calculateMasonryConfig(tree, node, MAX_CONTENT))).toEqual({
        kind: 'invalid-axis-configuration',
        axis: 'block',
        reason: 'rows and columns cannot both be masonry'
      });
    });

    it('rejects a grid without a masonry axis', () => {
      const {tree, node} = container({
        gridTemplateRows: [repeat(2, [auto()])],
        gridTemplateColumns: [repeat(2, [auto()])]
      });

      expect(masonryError(() => calculateMasonryConfig(tree, node, MAX_CONTENT))).toEqual({
        kind: 'invalid-axis-configuration',
        axis: 'block',
        reason: 'no axis is masonry'
      });
    });

    it('rejects an empty track list', () => {
      const {tree, node} = container({gridTemplateRows: 'masonry', gridTemplateColumns: []});

      expect(masonryError(() => calculateMasonryConfig(tree, node, MAX_CONTENT))).toEqual({
        kind: 'invalid-track-count',
        trackCount: 0,
        min: 1,
        max: 1000
      });
    });

    it('records the auto-fit tracks', () => {
      const {tree, node} = container({
        gridTemplateRows: 'masonry',
        gridTemplateColumns: [repeat('auto-fit', [length(100)])]
      });
      const config = calculateMasonryConfig(tree, node, {width: 350, height: 'max-content'});

      expect(config.trackCount).toBe(3);
      expect(config.autoFitRange).toEqual({start: 0, end: 3});
    });

    it('uses 16px as the tolerance without a usable font size', () => {
      const {tree, node} = container({gridTemplateRows: 'masonry', fontSize: 0});
      expect(calculateMasonryConfig(tree, node, MAX_CONTENT).itemTolerance).toBe(16);
    });
  });

  describe('collectMasonryItems', () => {
    it('collects in-flow items in order', () => {
      const {tree, node} = container({
        gridTemplateRows: 'masonry',
        gridTemplateColumns: [repeat(3, [auto()])]
      });
      const a = tree.add(node, {item: {order: 2}});
      tree.add(node, {container: {display: 'none'}});
      const b = tree.add(node, {item: {gridColumn: {start: {span: 5}, end: 'auto'}}});
      const c = tree.add(node, {item: {order: -1, gridColumn: {start: 2, end: 'auto'}}});
      const d = tree.add(node, {item: {gridColumn: {start: -1, end: 'auto'}}});

      const config = calculateMasonryConfig(tree, node, MAX_CONTENT);
      const items = collectMasonryItems(tree, node, config);

      expect(items.map(i => [i.nodeId, i.columnSpan, i.gridAxisStart])).toEqual([
        [c, 1, 1],
        [b, 3, null],
        [d, 1, 2],
        [a, 1, null]
      ]);
    });

    it('counts negative lines from the end', () => {
      const {tree, node} = container({
        gridTemplateRows: 'masonry',
        gridTemplateColumns: [repeat(3, [auto()])]
      });
      const wide = tree.add(node, {item: {gridColumn: {start: 1, end: -1}}});
      const last = tree.add(node, {item: {gridColumn: {start: -2, end: -1}}});

      const items = collectMasonryItems(tree, node, calculateMasonryConfig(tree, node, MAX_CONTENT));

      expect(items.map(i => [i.nodeId, i.columnSpan, i.gridAxisStart])).toEqual([
        [wide, 3, 0],
        [last, 1, 2]
      ]);
    });

    it('resolves named lines on the grid axis', () => {
      const {tree, node} = container({
        gridTemplateRows: 'masonry',
        gridTemplateColumns: [repeat(4, [auto()])],
        gridTemplateColumnNames: [['edge'], ['content-start'], [], ['content-end'], ['edge']]
      });
      const named = tree.add(node, {
        item: {gridColumn: {start: {line: 'content-start'}, end: {line: 'content-end'}}}
      });
      const unknown = tree.add(node, {item: {gridColumn: {start: {line: 'sidebar'}, end: 'auto'}}});

      const config = calculateMasonryConfig(tree, node, MAX_CONTENT);
      const items = collectMasonryItems(tree, node, config);

      expect(config.lineNames[1]).toEqual(['content-start']);
      expect(items.map(i => [i.nodeId, i.columnSpan, i.gridAxisStart])).toEqual([
        [named, 2, 1],
        [unknown, 1, null]
      ]);
    });

    it('takes the masonry axis span from the item', () => {
      const {tree, node} = container({
        gridTemplateRows: 'masonry',
        gridTemplateColumns: [repeat(2, [auto()])]
      });
      const item = tree.add(node, {item: {gridRow: {start: {span: 2}, end: 'auto'}}});

      const [info] = collectMasonryItems(tree, node, calculateMasonryConfig(tree, node, MAX_CONTENT));

      expect([info.nodeId, info.rowSpan, info.columnSpan]).toEqual([item, 2, 1]);
    });
  });

  describe('track sizing', () => {
    it('places a spanning item at every start it could have', () => {
      const virtual = createVirtualPlacementsForSpanningItems([contribution(1, 2, 100)], 4, 10);

      expect(virtual.map(v => v.virtualTrackStart)).toEqual([0, 1, 2]);
      expect(virtual.every(v => v.intrinsicContribution === 45)).toBe(true);
      expect(virtual.reduce((total, v) => total + v.placementWeight, 0)).toBeCloseTo(1);
    });

    it('ignores single-track items', () => {
      expect(createVirtualPlacementsForSpanningItems([contribution(1, 1, 100)], 4, 0)).toEqual([]);
    });

    it('rejects spans wider than the grid', () => {
      expect(masonryError(() => {
        createVirtualPlacementsForSpanningItems([contribution(1, 5, 100)], 4, 0);
      })).toEqual({kind: 'track-span-exceeds-available', span: 5, availableTracks: 4});
    });

    it('sizes tracks for single and spanning items', () => {
      const items = [contribution(1, 1, 100, 0), contribution(2, 2, 60)];
      const virtual = createVirtualPlacementsForSpanningItems(items, 3, 0);
      const sizes = [0, 1, 2].map(i => calculateTrackIntrinsicSizeWithSpanning(items, virtual, i));

      expect(sizes).toEqual([100, 30, 30]);
    });

    it('never shrinks a track when an item is added', () => {
      const items = [contribution(1, 1, 40), contribution(2, 3, 90)];
      const more = [...items, contribution(3, 2, 10)];
      const before = createVirtualPlacementsForSpanningItems(items, 3, 0);
      const after = createVirtualPlacementsForSpanningItems(more, 3, 0);

      for (let i = 0; i < 3; i++) {
        expect(calculateTrackIntrinsicSizeWithSpanning(more, after, i))
          .toBeGreaterThanOrEqual(calculateTrackIntrinsicSizeWithSpanning(items, before, i));
      }
    });

    it('builds solver input for the grid axis', () => {
      expect(createSolverGridStyleForMasonry([auto()], 'block', 8)).toEqual({
        display: 'grid',
        gridTemplateRows: [],
        gridTemplateColumns: [auto()],
        rowGap: 0,
        columnGap: 8
      });
      expect(createSolverItemStyleForMasonry(2, 40, 'inline')).toEqual({
        display: 'block',
        width: 0,
        height: 40,
        gridRow: {start: 2, span: 1},
        gridColumn: null
      });
      expect(createSolverAvailableSpace(300, 'block')).toEqual({width: 300, height: 'max-content'});
    });
  });

  describe('MasonryTrackState', () => {
    it('picks the first track when all are equal', () => {
      const state = new MasonryTrackState(3);
      expect(state.findShortestTrackWithTolerance()).toBe(0);
    });

    it('treats tracks within the tolerance as equally short', () => {
      const state = new MasonryTrackState(3, 16);
      state.trackPositions = [10, 0, 30];
      expect(state.findShortestTrackWithTolerance()).toBe(0);
    });

    it('prefers the last placed track or one after it', () => {
      const state = new MasonryTrackState(3, 16);
      state.lastPlacedTrack = 2;
      expect(state.findShortestTrackWithTolerance()).toBe(2);
    });

    it('falls back to the cursor', () => {
      const state = new MasonryTrackState(3, 16);
      state.trackPositions = [0, 0, 100];
      state.lastPlacedTrack = 2;
      state.placementCursor = 1;
      expect(state.findShortestTrackWithTolerance()).toBe(1);
    });

    it('falls back to the earliest candidate', () => {
      const state = new MasonryTrackState(3, 16);
      state.trackPositions = [0, 0, 100];
      state.lastPlacedTrack = 2;
      state.placementCursor = 2;
      expect(state.findShortestTrackWithTolerance()).toBe(0);
    });

    it('moves on after placing', () => {
      const state = new MasonryTrackState(3, 16);
      state.placeItemWithTracking(0, 100, 1);

      expect(state.trackPositions).toEqual([100, 0, 0]);
      expect(state.trackItemCounts).toEqual([1, 0, 0]);
      expect(state.placementCursor).toBe(1);
      expect(state.findShortestTrackWithTolerance()).toBe(1);
    });

    it('places spanning items below the tallest spanned track', () => {
      const state = new MasonryTrackState(3, 16, 5);
      state.trackPositions = [0, 40, 10];

      expect(state.placementPosition(1, 2)).toBe(40);
      state.placeItem(1, 20, 2);
      expect(state.trackPositions).toEqual([0, 65, 65]);
    });

    it('rejects tracks past the end', () => {
      const state = new MasonryTrackState(2);

      expect(masonryError(() => state.placeItem(2, 20, 1))).toEqual({
        kind: 'placement-failed',
        trackIndex: 2,
        reason: 'tracks 2 to 3 are outside of the 2 tracks'
      });
      expect(masonryError(() => state.placeItem(1, 20, 2)).kind).toBe('placement-failed');
      expect(state.trackPositions).toEqual([0, 0]);
    });

    it('finds a higher start for a spanning item', () => {
      const state = new MasonryTrackState(4, 16);
      state.trackPositions = [0, 50, 0, 0];

      expect(state.findDensePlacement(2)).toBe(2);
      expect(state.findDensePlacement(5)).toBe(null);
      expect(state.findDensePlacement(0)).toBe(null);
    });

    it('keeps the normal start when it is as high', () => {
      const state = new MasonryTrackState(3, 16);
      state.trackPositions = [100, 0, 0];
      expect(state.findDensePlacement(2)).toBe(null);
    });

    it('logs its tracks', () => {
      const state = new MasonryTrackState(2, 16);
      const log = new Logger();
      state.placeItemWithTracking(0, 10, 1);
      state.log(log);

      expect(log.plain()).toBe(
        'Masonry tracks (tolerance 16)\n' +
        '  0: 10 (1 items)\n' +
        '  1: 0 (0 items)\n'
      );
    });
  });

  describe('detectCompatibleGaps', () => {
    it('finds gaps above the normal position', () => {
      const state = new MasonryTrackState(3, 16);
      state.trackPositions = [100, 90, 300];

      expect(detectCompatibleGaps(state, [100, 100, 100], 1, 50, 100, 16)).toEqual([
        {trackIndex: 1, gapPosition: 90, gapSize: 210, trackTotalSize: 100, span: 1}
      ]);
    });

    it('skips gaps whose tracks are a different size', () => {
      const state = new MasonryTrackState(3, 16);
      state.trackPositions = [100, 90, 300];

      expect(detectCompatibleGaps(state, [100, 80, 100], 1, 50, 100, 16)).toEqual([]);
    });

    it('skips gaps too small for the item', () => {
      const state = new MasonryTrackState(3, 16);
      state.trackPositions = [100, 90, 120];

      // the gap is 30, the item needs 50 less 16 of tolerance
      expect(detectCompatibleGaps(state, [100, 100, 100], 1, 50, 100, 16)).toEqual([]);
    });
  });

  describe('collapseAutoFitTracks', () => {
    it('collapses empty auto-fit tracks', () => {
      const items = [placed(1, 0, 2, 0, 10)];

      expect(collapseAutoFitTracks(items, [100, 100, 100, 100], {start: 0, end: 4}))
        .toEqual([100, 100, 0, 0]);
      expect(collapseAutoFitTracks([placed(1, 0, 1, 0, 10)], [100, 100, 100, 100], {start: 1, end: 3}))
        .toEqual([100, 0, 0, 100]);
    });
  });

  describe('gridAreaToLayout', () => {
    it('adds up tracks and gaps', () => {
      const area = placed(1, 1, 3, 40, 30).area;

      expect(gridAreaToLayout(area, 'block', [100, 50, 70], 10)).toEqual({
        location: {x: 110, y: 40},
        size: {width: 130, height: 30}
      });
      expect(gridAreaToLayout(area, 'inline', [100, 50, 70], 10)).toEqual({
        location: {x: 40, y: 110},
        size: {width: 30, height: 130}
      });
    });

    it('uses the mean of the known sizes for unknown ones', () => {
      const sizes = [100, NaN, 50];

      expect(gridAreaToLayout(placed(1, 2, 3, 0, 10).area, 'block', sizes, 0).location.x).toBe(175);
      expect(gridAreaToLayout(placed(1, 1, 2, 0, 10).area, 'block', sizes, 0).size.width).toBe(75);
    });

    it('uses 0 when no size is known', () => {
      expect(gridAreaToLayout(placed(1, 1, 2, 0, 10).area, 'block', [-1, Infinity], 0)).toEqual({
        location: {x: 0, y: 0},
        size: {width: 0, height: 10}
      });
    });
  });

  describe('calculateContainerSizeFromPlacements', () => {
    it('covers every item', () => {
      const items = [placed(1, 0, 1, 0, 100), placed(2, 1, 3, 20, 50)];

      expect(calculateContainerSizeFromPlacements(items, 'block', MAX_CONTENT, [100, 100, 100], 0))
        .toEqual({width: 300, height: 100});
    });

    it('is at least the available size', () => {
      const items = [placed(1, 0, 1, 0, 100)];

      expect(calculateContainerSizeFromPlacements(
        items,
        'block',
        {width: 500, height: 'max-content'},
        [100],
        0
      )).toEqual({width: 500, height: 100});
    });
  });

  describe('alignment', () => {
    it('aligns within the area', () => {
      expect(alignItemWithinArea(10, 110, 'center', 40, 0)).toBe(40);
      expect(alignItemWithinArea(10, 110, 'end', 40, 0)).toBe(70);
      expect(alignItemWithinArea(10, 110, 'baseline', 40, 5)).toBe(15);
      expect(alignItemWithinArea(10, 110, 'stretch', 40, 0)).toBe(10);
    });

    it('stretches by default', () => {
      expect(shouldStretch(null)).toBe(true);
      expect(shouldStretch('stretch')).toBe(true);
      expect(shouldStretch('center')).toBe(false);
    });
  });

  describe('layoutMasonry', () => {
    it('lays out a masonry rows container', () => {
      const {tree, node} = container({
        gridTemplateRows: 'masonry',
        gridTemplateColumns: [repeat(3, [auto()])]
      });
      const a = tree.add(node, {size: {width: 100, height: 50}, item: {gridColumn: {start: 1, end: 'auto'}}});
      const b = tree.add(node, {size: {width: 60, height: 40}, item: {gridColumn: {start: {span: 2}, end: 'auto'}}});
      const c = tree.add(node, {size: {width: 30, height: 20}});

      const layout = layoutMasonry(tree, node, MAX_CONTENT);

      expect(layout.trackSizes).toEqual([100, 30, 30]);
      expect(layout.items.map(i => [i.nodeId, i.location, i.size])).toEqual([
        [a, {x: 0, y: 0}, {width: 100, height: 50}],
        [b, {x: 100, y: 0}, {width: 60, height: 40}],
        [c, {x: 100, y: 40}, {width: 30, height: 20}]
      ]);
      expect(layout.size).toEqual({width: 160, height: 60});
    });

    it('stretches a 1 / -1 item over every track', () => {
      const {tree, node} = container({
        gridTemplateRows: 'masonry',
        gridTemplateColumns: [repeat(3, [length(100)])]
      });
      tree.add(node, {size: {width: 250, height: 40}, item: {gridColumn: {start: 1, end: -1}}});

      const layout = layoutMasonry(tree, node, MAX_CONTENT);

      expect(layout.items[0].area).toEqual({
        gridAxisStart: 0,
        gridAxisEnd: 3,
        masonryAxisPosition: 0,
        masonryAxisSize: 40
      });
      expect(layout.items[0].size).toEqual({width: 300, height: 40});
    });

    it('rejects sizes that are not usable lengths', () => {
      const {tree, node} = container({
        gridTemplateRows: 'masonry',
        gridTemplateColumns: [repeat(2, [length(100)])]
      });
      const wide = tree.add(node, {size: {width: Infinity, height: 10}});

      expect(masonryError(() => layoutMasonry(tree, node, MAX_CONTENT))).toEqual({
        kind: 'content-sizing-failed',
        itemNodeId: wide,
        reason: 'measured width Infinity is not a usable length'
      });

      const other = container({
        gridTemplateRows: 'masonry',
        gridTemplateColumns: [repeat(2, [length(100)])]
      });
      const tall = other.tree.add(other.node, {size: {width: 50, height: NaN}});

      expect(masonryError(() => layoutMasonry(other.tree, other.node, MAX_CONTENT))).toEqual({
        kind: 'content-sizing-failed',
        itemNodeId: tall,
        reason: 'measured height NaN is not a usable length'
      });
    });

    it('lays out a masonry columns container', () => {
      const {tree, node} = container({
        gridTemplateColumns: 'masonry',
        gridTemplateRows: [repeat(2, [length(50)])]
      });
      const x = tree.add(node, {size: {width: 80, height: 10}});
      const y = tree.add(node, {size: {width: 80, height: 10}});

      const layout = layoutMasonry(tree, node, MAX_CONTENT);

      expect(layout.items.map(i => [i.nodeId, i.location, i.size])).toEqual([
        [x, {x: 0, y: 0}, {width: 80, height: 50}],
        [y, {x: 0, y: 50}, {width: 80, height: 50}]
      ]);
      expect(layout.size).toEqual({width: 80, height: 100});
    });

    it('collapses empty auto-fit tracks', () => {
      const {tree, node} = container({
        gridTemplateRows: 'masonry',
        gridTemplateColumns: [repeat('auto-fit', [length(100)])]
      });
      tree.add(node, {size: {width: 50, height: 20}});

      const layout = layoutMasonry(tree, node, {width: 350, height: 'max-content'});

      expect(layout.trackSizes).toEqual([100, 0, 0]);
      expect(layout.items[0].size).toEqual({width: 100, height: 20});
      expect(layout.size).toEqual({width: 350, height: 20});
    });

    it('stacks items with the row gap between them', () => {
      const {tree, node} = container({
        gridTemplateRows: 'masonry',
        gridTemplateColumns: [repeat(1, [length(100)])],
        rowGap: 8
      });
      tree.add(node, {size: {width: 100, height: 20}});
      tree.add(node, {size: {width: 100, height: 30}});

      const layout = layoutMasonry(tree, node, MAX_CONTENT);

      expect(layout.items.map(i => i.location.y)).toEqual([0, 28]);
      expect(layout.size.height).toBe(58);
    });

    it('aligns baselines in the same track', () => {
      const {tree, node} = container({
        gridTemplateRows: 'masonry',
        gridTemplateColumns: [repeat(2, [length(100)])]
      });
      tree.add(node, {
        size: {width: 100, height: 40},
        firstBaseline: 10,
        item: {alignSelf: 'baseline', gridColumn: {start: 1, end: 'auto'}}
      });
      tree.add(node, {
        size: {width: 100, height: 40},
        firstBaseline: 30,
        item: {alignSelf: 'baseline', gridColumn: {start: 1, end: 'auto'}}
      });

      const layout = layoutMasonry(tree, node, MAX_CONTENT);

      expect(layout.items.map(i => i.baselineShim)).toEqual([20, 0]);
      expect(layout.items.map(i => i.location.y)).toEqual([20, 40]);
    });
  });
});
