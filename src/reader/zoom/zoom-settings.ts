/**
 * Zoom settings
 *
 * Settings are persisted per document with global fallbacks. Resolution
 * walks the sources in order (per-document, then global) and takes the
 * first value that is valid for its key, falling back to built-in defaults.
 *
 * @example
 * ```typescript
 * const settings = resolveZoomSettings([docSettings, globalSettings]);
 * controller.applySettings(settings);
 *
 * // On close
 * const record = controller.saveSettings();
 * for (const [key, value] of Object.entries(record)) docSettings.saveSetting(key, value);
 * ```
 */

import type { PanSettings } from './zoom-events';
import { DEFAULT_ZOOM_MODE, isZoomMode, type ZoomMode } from './zoom-mode';

/**
 * Persisted shape, keyed as stored
 */
export interface PersistedZoomSettings {
  zoom_mode: ZoomMode;
  zoom_factor: number;
  zoom_pan_h_overlap: number;
  zoom_pan_v_overlap: number;
  zoom_pan_right_to_left: boolean;
  zoom_pan_bottom_to_top: boolean;
  zoom_pan_direction_vertical: boolean;
}

export type ZoomSettingKey = keyof PersistedZoomSettings;

export interface ResolvedZoomSettings {
  mode: ZoomMode;
  pan: PanSettings;
}

/**
 * Anything settings can be read from (document sidecar, global store, ...)
 */
export interface SettingsSource {
  readSetting(key: string): unknown;
}

export const DEFAULT_PAN_SETTINGS: PanSettings = {
  factor: 2,
  overlapH: 40,
  overlapV: 40,
  rightToLeft: false,
  bottomToTop: false,
  vertical: false,
};

export const DEFAULT_ZOOM_SETTINGS: ResolvedZoomSettings = {
  mode: DEFAULT_ZOOM_MODE,
  pan: DEFAULT_PAN_SETTINGS,
};

export const MIN_PAN_FACTOR = 1;
export const MAX_OVERLAP = 100;

// ─────────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────────

function isFactor(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= MIN_PAN_FACTOR;
}

function isOverlap(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 && value <= MAX_OVERLAP;
}

function isFlag(value: unknown): value is boolean {
  return typeof value === 'boolean';
}

function firstValid<T>(
  sources: readonly SettingsSource[],
  key: ZoomSettingKey,
  guard: (value: unknown) => value is T,
  fallback: T
): T {
  for (const source of sources) {
    const value = source.readSetting(key);
    if (value === undefined || value === null) continue;
    if (guard(value)) return value;
    console.warn(`[ZoomSettings] Ignoring invalid value for ${key}:`, value);
  }
  return fallback;
}

/**
 * Resolve settings across sources, most specific first.
 */
export function resolveZoomSettings(
  sources: readonly SettingsSource[],
  defaults: ResolvedZoomSettings = DEFAULT_ZOOM_SETTINGS
): ResolvedZoomSettings {
  return {
    mode: firstValid(sources, 'zoom_mode', isZoomMode, defaults.mode),
    pan: {
      factor: firstValid(sources, 'zoom_factor', isFactor, defaults.pan.factor),
      overlapH: firstValid(sources, 'zoom_pan_h_overlap', isOverlap, defaults.pan.overlapH),
      overlapV: firstValid(sources, 'zoom_pan_v_overlap', isOverlap, defaults.pan.overlapV),
      rightToLeft: firstValid(sources, 'zoom_pan_right_to_left', isFlag, defaults.pan.rightToLeft),
      bottomToTop: firstValid(sources, 'zoom_pan_bottom_to_top', isFlag, defaults.pan.bottomToTop),
      vertical: firstValid(sources, 'zoom_pan_direction_vertical', isFlag, defaults.pan.vertical),
    },
  };
}

export function toPersistedSettings(mode: ZoomMode, pan: PanSettings): PersistedZoomSettings {
  return {
    zoom_mode: mode,
    zoom_factor: pan.factor,
    zoom_pan_h_overlap: pan.overlapH,
    zoom_pan_v_overlap: pan.overlapV,
    zoom_pan_right_to_left: pan.rightToLeft,
    zoom_pan_bottom_to_top: pan.bottomToTop,
    zoom_pan_direction_vertical: pan.vertical,
  };
}

/**
 * Settings source over a plain object
 */
export function recordSource(record: Readonly<Record<string, unknown>>): SettingsSource {
  return {
    readSetting: (key) => record[key],
  };
}

// ─────────────────────────────────────────────────────────────────
// Pan factor bounds
// ─────────────────────────────────────────────────────────────────

export interface PanFactorBounds {
  min: number;
  max: number;
  /** Column counts are whole numbers */
  integer: boolean;
}

export function panFactorBounds(mode: ZoomMode | null): PanFactorBounds {
  if (mode === 'column') {
    return { min: 2, max: 10, integer: true };
  }
  return { min: 1.5, max: 10, integer: false };
}

/** NaN clamps to the lower bound */
export function clampPanFactor(value: number, mode: ZoomMode | null): number {
  const bounds = panFactorBounds(mode);
  if (Number.isNaN(value)) return bounds.min;
  const rounded = bounds.integer ? Math.round(value) : value;
  return Math.min(bounds.max, Math.max(bounds.min, rounded));
}

/** NaN clamps to 0 */
export function clampOverlap(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(MAX_OVERLAP, Math.max(0, value));
}
