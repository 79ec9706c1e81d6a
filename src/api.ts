export {environment, defaultEnvironment} from './environment.js';

export type {Environment} from './environment.js';

export {
  otherAxis,
  otherGridAxis,
  isTrackList,
  length,
  percent,
  fr,
  auto,
  minmax,
  single,
  repeat,
  fixedTrackSize,
  resolveLengthPercentage,
  identityTransform,
  offsetTransform,
  spanLength,
  definite,
  ZERO_EDGES
} from './grid-types.js';

export type {
  NodeId,
  GridAxis,
  AbstractAxis,
  Percentage,
  LengthPercentage,
  TrackBreadth,
  TrackSizingFunction,
  RepeatCount,
  TrackListComponent,
  GridTemplate,
  LineNames,
  CoordinateTransform,
  TrackSpan,
  GridPosition,
  TrackSizingContribution,
  Size,
  Point,
  AvailableSpace,
  AvailableSize,
  SelfAlignment,
  Edges
} from './grid-types.js';

export type {
  Display,
  GridAutoFlow,
  GridContainerStyle,
  GridPlacement,
  GridLineRange,
  GridItemStyle,
  ResolvedGridTemplate,
  GridTree,
  MeasuredBox,
  FontMetrics,
  SolverGridStyle,
  SolverItemStyle,
  GridLayoutHost
} from './grid-tree.js';

export {
  SubgridError,
  MasonryError,
  TrackExtractionError,
  GridContextError,
  GridPreprocessingError
} from './grid-errors.js';

export type {
  SubgridErrorDetail,
  MasonryErrorDetail,
  TrackExtractionErrorDetail,
  GridPreprocessingErrorDetail
} from './grid-errors.js';

export {
  expandTrackList,
  extractTracksFromTemplateList,
  extractTracksFromResolvedTemplate,
  templateKind,
  extractTracks,
  extractLineNames
} from './track-extraction.js';

export type {RepeatContext, ExpandedTrackList, AxisTemplateKind} from './track-extraction.js';

export {
  checkParentGridContainer,
  GridContextCache,
  resolveParentGridContext,
  findPotentialParentsConstrained
} from './grid-context.js';

export type {ParentGridContext, GridContextCacheStats} from './grid-context.js';

export {validateCssIdentifier, LineNameInheritanceMapper} from './line-names.js';

export type {LineSpan, LineNameInheritanceLevel} from './line-names.js';

export {
  buildSubgridTrackInheritance,
  subgridSpansFromStyle,
  NestedSubgridCoordination,
  isSubgrid,
  spreadContribution,
  coordinateNestedSubgrids,
  childSpans
} from './subgrid.js';

export type {
  EffectiveTracks,
  SubgridSpans,
  SubgridTrackInheritance,
  TrackInheritanceLevel,
  CoordinateNestedSubgridsOptions
} from './subgrid.js';

export {
  resolveItemPlacement,
  AutoPlacementCursor,
  OccupiedRange,
  TrackAvailability,
  SubgridPlacementState,
  placeSubgridItems
} from './subgrid-placement.js';

export type {
  PlacementMethod,
  ResolvedPlacement,
  SubgridItemPlacement,
  SubgridGridSize
} from './subgrid-placement.js';

export {
  gridAxisFromMasonry,
  gridAxisTracks,
  calculateMasonryConfig,
  collectMasonryItems,
  gridAxisSpan,
  createVirtualPlacementsForSpanningItems,
  calculateTrackIntrinsicSizeWithSpanning,
  createSolverGridStyleForMasonry,
  createSolverItemStyleForMasonry,
  createSolverAvailableSpace,
  sizeMasonryTracks,
  MasonryTrackState,
  detectCompatibleGaps,
  collapseAutoFitTracks,
  gridAreaToLayout,
  calculateContainerSizeFromPlacements,
  alignItemWithinArea,
  shouldStretch,
  layoutMasonry
} from './masonry.js';

export type {
  MasonryConfig,
  GridItemInfo,
  MasonryItemContribution,
  VirtualPlacement,
  GapOpportunity,
  GridArea,
  PlacedMasonryItem,
  MasonryItemLayout,
  MasonryLayout
} from './masonry.js';

export {
  shouldAlignBaseline,
  baselineFromFontMetrics,
  extractItemBaseline,
  calculateBaselineAdjustments
} from './masonry-baseline.js';

export type {MasonryItemBaseline, BaselineGroup, BaselineAdjustment} from './masonry-baseline.js';

export {NodeSlab, lineNamesForTemplate, GridLayoutCoordinator} from './coordinator.js';

export type {
  LayoutPass,
  LayoutPassState,
  LineNameMap,
  SubgridLayoutState,
  ContentSizes,
  IntrinsicSizingState,
  AutoPlacementState,
  TrackSizes,
  SubgridLayoutResult
} from './coordinator.js';

export {Logger} from './util.js';

export type {TreeLogOptions} from './util.js';
