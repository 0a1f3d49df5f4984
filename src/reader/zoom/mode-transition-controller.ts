/**
 * Mode Transition Controller
 *
 * Owns the zoom state of one open document view. Every trigger that can
 * change the fit (mode switch, page turn, rotation, resize, reflow,
 * gestures) lands here, and every one that matters runs the same pipeline:
 *
 *   BBoxResolver → RotationAdapter → ZoomCalculator → CacheBudgetLimiter
 *
 * Results go to the view through the ZoomSink and to any observers as
 * ZoomNotification objects, in the order they happen.
 *
 * The mode starts unset, so the first setMode() always fires even when it
 * names the default mode. After that, setting the current mode again is a
 * no-op.
 *
 * @example
 * ```typescript
 * const controller = createModeTransitionController(document, view, {
 *   viewport: { width: 1072, height: 1448 },
 *   footer: { visible: true, height: 32, reclaimHeight: false },
 * });
 *
 * controller.subscribe((n) => {
 *   if (n.type === 'ModeChanged') menu.refresh(n.mode);
 * });
 *
 * controller.applySettings(resolveZoomSettings([docSettings, globalSettings]));
 * controller.onPageChanged(12);
 * ```
 */

import { derived, writable, type Readable, type Writable } from 'svelte/store';
import { resolveEffectivePageSize } from './bbox-resolver';
import {
  DEFAULT_DEGRADE_POLICY,
  NO_VIABLE_ZOOM,
  RenderCacheBudget,
  limitZoomToCacheBudget,
  type AdmissionPredicate,
  type DegradePolicy,
} from './cache-budget-limiter';
import type { DocumentGeometry, ZoomSink } from './document-geometry';
import { isPositiveSize, type PageBox, type Point, type Size } from './geometry';
import {
  fallbackZoomCenter,
  locateRegionalZoomCenter,
  type MarginSettings,
} from './regional-center-locator';
import { normalizeRotation, type Rotation } from './rotation-adapter';
import {
  NO_FOOTER,
  calculateZoom,
  computeFitRatios,
  usableViewport,
  type FooterLayout,
} from './zoom-calculator';
import type { PanSettings, ZoomNotification, ZoomObserver } from './zoom-events';
import {
  DEFAULT_ZOOM_MODE,
  PINCH_MODES,
  SPREAD_MODES,
  isPannedMode,
  resolveZoomMode,
  scrollAdvisoryFor,
  type GestureDirection,
  type ZoomMode,
} from './zoom-mode';
import {
  DEFAULT_PAN_SETTINGS,
  clampOverlap,
  clampPanFactor,
  toPersistedSettings,
  type PersistedZoomSettings,
  type ResolvedZoomSettings,
} from './zoom-settings';

/** Multiplier for one zoom-in step; zoom-out uses 0.75 */
export const ZOOM_IN_FACTOR = 1.333333;
export const ZOOM_OUT_FACTOR = 0.75;

export type ZoomDirection = 'in' | 'out';

export type PanFlag = 'rightToLeft' | 'bottomToTop' | 'vertical';

export interface ZoomState {
  /** Null only until the first setMode() */
  readonly mode: ZoomMode | null;
  readonly zoom: number;
  /** Zoom before entering free zoom by gesture */
  readonly savedZoom: number | null;
  /** Mode to restore when flipping mode ends */
  readonly savedMode: ZoomMode | null;
  readonly currentPage: number;
  readonly rotation: Rotation;
  readonly viewport: Readonly<Size>;
  readonly pan: Readonly<PanSettings>;
  /** False when the last recompute found no zoom the render cache accepts */
  readonly renderable: boolean;
}

/**
 * Configuration for ModeTransitionController
 */
export interface ZoomControllerConfig {
  /** Viewport available for page rendering */
  viewport: Size;
  /** Mode that unknown or missing modes resolve to (default: pagewidth) */
  defaultMode?: ZoomMode;
  /** Pan/column settings (default: DEFAULT_PAN_SETTINGS) */
  pan?: Partial<PanSettings>;
  /** Footer strip (default: none) */
  footer?: FooterLayout;
  /** Page margin and screen density for regional zoom */
  margin?: MarginSettings;
  /** Render cache admission predicate (default: 100MB RenderCacheBudget) */
  cacheAccepts?: AdmissionPredicate;
  /** Degrade schedule for over-large zooms */
  degradePolicy?: DegradePolicy;
  /** Starting zoom (default: 1) */
  initialZoom?: number;
  /** Starting page (default: 1) */
  initialPage?: number;
  /** Starting rotation in degrees (default: 0) */
  rotation?: number;
  /** Check geometric preconditions with console.assert */
  debug?: boolean;
}

interface ResolvedControllerConfig {
  defaultMode: ZoomMode;
  footer: FooterLayout;
  margin: MarginSettings;
  cacheAccepts: AdmissionPredicate;
  degradePolicy: DegradePolicy;
  debug: boolean;
}

export interface SetModeOptions {
  /** Skip scroll-mode advisories (used when restoring settings) */
  silent?: boolean;
}

const DEFAULT_MARGIN: MarginSettings = { pageMargin: 0, dpi: 160 };

export class ModeTransitionController {
  private current: ZoomState;
  private readonly config: ResolvedControllerConfig;
  private readonly store: Writable<ZoomState>;
  private observers: Set<ZoomObserver> = new Set();

  /** Reactive snapshot of the zoom state */
  readonly state: Readable<ZoomState>;
  /** Reactive current mode */
  readonly mode: Readable<ZoomMode | null>;

  constructor(
    private readonly document: DocumentGeometry,
    private readonly sink: ZoomSink,
    config: ZoomControllerConfig
  ) {
    this.config = {
      defaultMode: config.defaultMode ?? DEFAULT_ZOOM_MODE,
      footer: config.footer ?? NO_FOOTER,
      margin: config.margin ?? DEFAULT_MARGIN,
      cacheAccepts: config.cacheAccepts ?? new RenderCacheBudget().asPredicate(),
      degradePolicy: config.degradePolicy ?? DEFAULT_DEGRADE_POLICY,
      debug: config.debug ?? false,
    };

    this.current = {
      mode: null,
      zoom: config.initialZoom ?? 1,
      savedZoom: null,
      savedMode: null,
      currentPage: config.initialPage ?? 1,
      rotation: normalizeRotation(config.rotation ?? 0),
      viewport: { ...config.viewport },
      pan: { ...DEFAULT_PAN_SETTINGS, ...config.pan },
      renderable: true,
    };

    this.store = writable(this.getState());
    this.state = { subscribe: this.store.subscribe };
    this.mode = derived(this.store, ($state) => $state.mode);
  }

  // ─────────────────────────────────────────────────────────────────
  // Read API
  // ─────────────────────────────────────────────────────────────────

  getState(): ZoomState {
    return {
      ...this.current,
      viewport: { ...this.current.viewport },
      pan: { ...this.current.pan },
    };
  }

  getZoom(): number {
    return this.current.zoom;
  }

  getMode(): ZoomMode | null {
    return this.current.mode;
  }

  // ─────────────────────────────────────────────────────────────────
  // Mode changes
  // ─────────────────────────────────────────────────────────────────

  /**
   * Switch fit policy. Unknown input resolves to the default mode.
   */
  setMode(mode: string | null | undefined, options: SetModeOptions = {}): void {
    const resolved = resolveZoomMode(mode, this.config.defaultMode);
    if (resolved === this.current.mode) {
      return;
    }
    this.transition(resolved, options, () => {
      this.recompute();
    });
  }

  /**
   * Step the zoom in or out and switch to free zoom. The stepped zoom goes
   * to the view as is; it does not pass the fit pipeline or the cache limit.
   */
  zoomBy(direction: ZoomDirection): void {
    const factor = direction === 'in' ? ZOOM_IN_FACTOR : ZOOM_OUT_FACTOR;
    const zoom = this.current.zoom * factor;
    console.log(`[ModeTransitionController] Zoom ${direction}, now at ${zoom}`);

    if (this.current.mode === 'free') {
      this.publishZoom(zoom);
      return;
    }

    // free mode fits the full page
    this.transition('free', {}, () => {
      this.publishBox(null);
      this.publishZoom(zoom);
    });
  }

  onSpread(direction: GestureDirection): void {
    this.setMode(SPREAD_MODES[direction]);
  }

  onPinch(direction: GestureDirection): void {
    this.setMode(PINCH_MODES[direction]);
  }

  /**
   * Double-tap: zoom into the content block under the finger, or back out
   * to the page when already zoomed. Returns the focal point when zooming in.
   */
  onToggleFreeZoom(gesture: Point): Point | null {
    if (this.current.mode === 'free') {
      this.setMode('page');
      return null;
    }

    const previousZoom = this.current.zoom;
    const region = locateRegionalZoomCenter(
      {
        document: this.document,
        sink: this.sink,
        viewport: this.current.viewport,
        margin: this.config.margin,
      },
      this.current.currentPage,
      gesture
    );
    this.update({ savedZoom: previousZoom, zoom: region.zoom });
    console.log('[ModeTransitionController] Zoom center:', region);

    this.setMode('free');
    if (!this.current.renderable) {
      return null;
    }

    const center =
      region.kind === 'block'
        ? region.center
        : fallbackZoomCenter(gesture, previousZoom, this.current.zoom);
    this.sink.setZoomCenter(center.x, center.y);
    return center;
  }

  // ─────────────────────────────────────────────────────────────────
  // Flipping mode
  // ─────────────────────────────────────────────────────────────────

  /**
   * Force a page-oriented fit while previewing pages. Only the first
   * entry saves the mode; nested entries keep it.
   */
  enterFlippingMode(mode: ZoomMode): void {
    if (this.current.savedMode === null) {
      this.update({ savedMode: this.current.mode ?? this.config.defaultMode });
    }
    this.setMode(mode === 'free' ? 'page' : mode);
  }

  /**
   * Leave flipping mode, restoring `mode` or else the saved mode.
   */
  exitFlippingMode(mode?: ZoomMode): void {
    const target = mode ?? this.current.savedMode ?? this.config.defaultMode;
    this.update({ savedMode: null });
    this.setMode(target);
  }

  // ─────────────────────────────────────────────────────────────────
  // Layout triggers
  // ─────────────────────────────────────────────────────────────────

  onPageChanged(page: number): void {
    this.update({ currentPage: page });
    this.recompute();
  }

  onRotationChanged(degrees: number): void {
    this.update({ rotation: normalizeRotation(degrees) });
    this.recompute();
  }

  /** Resize or restore of the view */
  onViewportChanged(viewport: Size): void {
    this.update({ viewport: { ...viewport } });
    this.recompute();
  }

  setFooter(footer: FooterLayout): void {
    this.config.footer = { ...footer };
    this.recompute();
  }

  /**
   * Re-lay-out a reflowable document at a new font size, then refit.
   */
  onReflow(fontSize: number): void {
    const reflow = this.document.reflow;
    if (reflow) {
      reflow.layoutDocument(reflow.convertFontSize(fontSize));
    }
    this.recompute();
    this.emit({ type: 'InitScrollState', mode: this.current.mode });
  }

  // ─────────────────────────────────────────────────────────────────
  // Pan settings
  // ─────────────────────────────────────────────────────────────────

  /**
   * Set the pan factor (zoom multiplier, or column count in column mode).
   * Column mode also pans vertically with no horizontal overlap.
   */
  setPanFactor(value: number): void {
    if (Number.isNaN(value)) {
      console.warn('[ModeTransitionController] Ignoring pan factor NaN');
      return;
    }
    const factor = clampPanFactor(value, this.current.mode);
    const changes: Partial<PanSettings> = { factor };
    if (this.current.mode === 'column') {
      changes.vertical = true;
      changes.overlapH = 0;
    }
    this.update({ pan: { ...this.current.pan, ...changes } });

    if (this.current.mode !== null && isPannedMode(this.current.mode)) {
      this.recompute();
    }
    this.emit({ type: 'PanSettingsChanged', changes });
    this.emit({ type: 'RequestRedraw' });
  }

  setPanOverlap(axis: 'horizontal' | 'vertical', percent: number): void {
    if (Number.isNaN(percent)) {
      console.warn(`[ModeTransitionController] Ignoring ${axis} overlap NaN`);
      return;
    }
    const value = clampOverlap(percent);
    const changes: Partial<PanSettings> =
      axis === 'horizontal' ? { overlapH: value } : { overlapV: value };
    this.update({ pan: { ...this.current.pan, ...changes } });
    this.emit({ type: 'PanSettingsChanged', changes });
    this.emit({ type: 'RequestRedraw' });
  }

  togglePanFlag(flag: PanFlag): void {
    const changes: Partial<PanSettings> = {};
    changes[flag] = !this.current.pan[flag];
    this.update({ pan: { ...this.current.pan, ...changes } });
    this.emit({ type: 'PanSettingsChanged', changes });
  }

  // ─────────────────────────────────────────────────────────────────
  // Settings
  // ─────────────────────────────────────────────────────────────────

  /**
   * Apply settings read at document open. Pan settings land first so the
   * first fit already uses the stored factor.
   */
  applySettings(settings: ResolvedZoomSettings): void {
    this.update({ pan: { ...settings.pan } });
    if (settings.mode !== this.current.mode) {
      this.setMode(settings.mode, { silent: true });
    } else {
      this.recompute();
    }
  }

  /**
   * Settings to persist. While flipping, the mode saved on entry is stored
   * rather than the temporary preview mode.
   */
  saveSettings(): PersistedZoomSettings {
    const mode = this.current.savedMode ?? this.current.mode ?? this.config.defaultMode;
    return toPersistedSettings(mode, this.current.pan);
  }

  // ─────────────────────────────────────────────────────────────────
  // Observers
  // ─────────────────────────────────────────────────────────────────

  subscribe(observer: ZoomObserver): () => void {
    this.observers.add(observer);
    return () => this.observers.delete(observer);
  }

  destroy(): void {
    this.observers.clear();
  }

  // ─────────────────────────────────────────────────────────────────
  // Private Methods
  // ─────────────────────────────────────────────────────────────────

  /**
   * Recompute the zoom for the current page and publish it.
   * Returns the new zoom, or NO_VIABLE_ZOOM when the cache rejects every step.
   */
  private recompute(): number {
    const { mode, currentPage, rotation, viewport, pan } = this.current;
    if (mode === null) {
      console.debug('[ModeTransitionController] No zoom mode yet, skipping recompute');
      return this.current.zoom;
    }

    const effective = resolveEffectivePageSize(this.document, currentPage, mode);
    this.publishBox(effective.box);

    const usable = usableViewport(viewport, this.config.footer);
    if (this.config.debug) {
      console.assert(isPositiveSize(usable), '[ModeTransitionController] Viewport must be positive:', usable);
      console.assert(isPositiveSize(effective.size), '[ModeTransitionController] Page size must be positive:', effective.size);
    }

    const candidate = calculateZoom({
      mode,
      ratios: computeFitRatios(usable, effective.size, rotation),
      panFactor: pan.factor,
      storedZoom: this.current.zoom,
    });
    if (candidate === null) {
      return this.current.zoom;
    }

    const limited = limitZoomToCacheBudget(
      candidate,
      viewport,
      this.config.cacheAccepts,
      this.config.degradePolicy
    );
    if (limited.zoom === NO_VIABLE_ZOOM) {
      console.warn(
        `[ModeTransitionController] No zoom fits the render cache for page ${currentPage} at ${viewport.width}x${viewport.height}`
      );
      this.update({ renderable: false });
      return NO_VIABLE_ZOOM;
    }

    this.publishZoom(limited.zoom);
    return limited.zoom;
  }

  /**
   * Mode change sequence shared by setMode() and zoomBy(); `refit`
   * publishes the box and zoom for the new mode.
   */
  private transition(mode: ZoomMode, options: SetModeOptions, refit: () => void): void {
    if (!options.silent && this.sink.isPageScroll()) {
      const kind = scrollAdvisoryFor(mode);
      if (kind) {
        this.emit({ type: 'ScrollModeAdvisory', mode, kind });
      }
    }

    console.log(`[ModeTransitionController] Setting zoom mode to ${mode}`);
    this.emit({ type: 'ModeChanged', mode });
    this.update({ mode });
    refit();
    this.emit({ type: 'InitScrollState', mode });
  }

  private publishBox(box: PageBox | null): void {
    this.sink.onBBoxChanged(box);
    this.emit({ type: 'BBoxChanged', box });
  }

  private publishZoom(zoom: number): void {
    this.update({ zoom, renderable: true });
    this.sink.onZoomChanged(zoom);
    this.emit({ type: 'ZoomChanged', zoom });
  }

  private update(patch: Partial<ZoomState>): void {
    this.current = { ...this.current, ...patch };
    this.store.set(this.getState());
  }

  private emit(notification: ZoomNotification): void {
    for (const observer of this.observers) {
      try {
        observer(notification);
      } catch (e) {
        console.error('[ModeTransitionController] Observer error:', e);
      }
    }
  }
}

export function createModeTransitionController(
  document: DocumentGeometry,
  sink: ZoomSink,
  config: ZoomControllerConfig
): ModeTransitionController {
  return new ModeTransitionController(document, sink, config);
}
