/**
 * Zoom modes
 *
 * A zoom mode is the fit policy that maps page content onto the viewport.
 * The set is closed: anything outside it is coerced to the configured
 * default before it reaches the engine.
 */

export const ZOOM_MODES = [
  'content',
  'contentwidth',
  'contentheight',
  'column',
  'pagewidth',
  'pageheight',
  'page',
  'pan',
  'free',
] as const;

export type ZoomMode = (typeof ZOOM_MODES)[number];

/** Mode used when nothing (or something unknown) is configured */
export const DEFAULT_ZOOM_MODE: ZoomMode = 'pagewidth';

/** Modes that fit against the used-content bounding box */
export type ContentAwareMode = Extract<
  ZoomMode,
  'content' | 'contentwidth' | 'contentheight' | 'column' | 'pan'
>;

const CONTENT_AWARE_MODES: ReadonlySet<ZoomMode> = new Set<ContentAwareMode>([
  'content',
  'contentwidth',
  'contentheight',
  'column',
  'pan',
]);

export function isZoomMode(value: unknown): value is ZoomMode {
  return typeof value === 'string' && (ZOOM_MODES as readonly string[]).includes(value);
}

export function isContentAwareMode(mode: ZoomMode): mode is ContentAwareMode {
  return CONTENT_AWARE_MODES.has(mode);
}

/** Pan and column modes multiply the width fit by the pan factor */
export function isPannedMode(mode: ZoomMode): boolean {
  return mode === 'pan' || mode === 'column';
}

/**
 * Coerce arbitrary input to a zoom mode, falling back to `fallback`.
 */
export function resolveZoomMode(value: unknown, fallback: ZoomMode = DEFAULT_ZOOM_MODE): ZoomMode {
  return isZoomMode(value) ? value : fallback;
}

// ─────────────────────────────────────────────────────────────────
// Gestures
// ─────────────────────────────────────────────────────────────────

export type GestureDirection = 'horizontal' | 'vertical' | 'diagonal';

/** Spreading two fingers zooms in on content */
export const SPREAD_MODES: Readonly<Record<GestureDirection, ZoomMode>> = {
  horizontal: 'contentwidth',
  vertical: 'contentheight',
  diagonal: 'content',
};

/** Pinching zooms back out to the page */
export const PINCH_MODES: Readonly<Record<GestureDirection, ZoomMode>> = {
  horizontal: 'pagewidth',
  vertical: 'pageheight',
  diagonal: 'page',
};

// ─────────────────────────────────────────────────────────────────
// Scroll-mode compatibility
// ─────────────────────────────────────────────────────────────────

/**
 * How a mode clashes with continuous (scroll) layout:
 * - paged: vertical shifts when turning pages
 * - panned: needs page view instead of scroll view
 */
export type ScrollAdvisoryKind = 'paged' | 'panned';

export function scrollAdvisoryFor(mode: ZoomMode): ScrollAdvisoryKind | null {
  switch (mode) {
    case 'page':
    case 'pageheight':
    case 'contentheight':
    case 'content':
      return 'paged';
    case 'column':
    case 'pan':
      return 'panned';
    default:
      return null;
  }
}
