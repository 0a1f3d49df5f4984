/**
 * Zoom Engine
 *
 * Resolves the zoom and viewport focal point for a paginated document view:
 * - Fit policies (page, content box, width/height, pan/column, free)
 * - Rotation and footer-aware fit ratios
 * - Render cache budget degradation
 * - Regional zoom centering for double-tap free zoom
 */

export {
  ModeTransitionController,
  createModeTransitionController,
  ZOOM_IN_FACTOR,
  ZOOM_OUT_FACTOR,
} from './mode-transition-controller';
export type {
  ZoomState,
  ZoomControllerConfig,
  ZoomDirection,
  PanFlag,
  SetModeOptions,
} from './mode-transition-controller';

export {
  ZOOM_MODES,
  DEFAULT_ZOOM_MODE,
  SPREAD_MODES,
  PINCH_MODES,
  isZoomMode,
  isContentAwareMode,
  isPannedMode,
  resolveZoomMode,
  scrollAdvisoryFor,
} from './zoom-mode';
export type { ZoomMode, ContentAwareMode, GestureDirection, ScrollAdvisoryKind } from './zoom-mode';

export { resolveEffectivePageSize, BBOX_REFERENCE_SCALE } from './bbox-resolver';
export type { EffectivePageSize } from './bbox-resolver';

export { normalizeRotation, isQuarterTurn, orientPageSize } from './rotation-adapter';
export type { Rotation } from './rotation-adapter';

export { calculateZoom, computeFitRatios, usableViewport, NO_FOOTER } from './zoom-calculator';
export type { FooterLayout, FitRatios, ZoomInputs } from './zoom-calculator';

export {
  limitZoomToCacheBudget,
  estimateBitmapCost,
  degradeStep,
  RenderCacheBudget,
  NO_VIABLE_ZOOM,
  DEFAULT_DEGRADE_POLICY,
} from './cache-budget-limiter';
export type {
  AdmissionPredicate,
  DegradeBand,
  DegradePolicy,
  CacheBudgetResult,
} from './cache-budget-limiter';

export {
  locateRegionalZoomCenter,
  fallbackZoomCenter,
  compensateMargin,
  marginInPixels,
} from './regional-center-locator';
export type { RegionalZoom, RegionalCenterContext, MarginSettings } from './regional-center-locator';

export {
  resolveZoomSettings,
  toPersistedSettings,
  recordSource,
  clampPanFactor,
  clampOverlap,
  panFactorBounds,
  DEFAULT_PAN_SETTINGS,
  DEFAULT_ZOOM_SETTINGS,
} from './zoom-settings';
export type {
  PersistedZoomSettings,
  ResolvedZoomSettings,
  SettingsSource,
  ZoomSettingKey,
  PanFactorBounds,
} from './zoom-settings';

export type { PanSettings, ZoomNotification, ZoomNotificationType, ZoomObserver } from './zoom-events';
export type { DocumentGeometry, ReflowCapability, ZoomSink } from './document-geometry';
export type { Point, Size, PageBox, ContentBlock, PagePosition } from './geometry';
export { isPositiveSize, fitsWithin } from './geometry';

export { MupdfDocumentGeometry, openMupdfGeometry } from './mupdf-document-geometry';
export type {
  MupdfDocument,
  MupdfPage,
  MupdfStructuredText,
  BlockWalker,
} from './mupdf-document-geometry';
