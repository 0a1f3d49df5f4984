/**
 * Notifications emitted by the mode transition controller.
 *
 * These replace a global event bus: the controller hands each one to the
 * injected observers, in emission order.
 */

import type { PageBox } from './geometry';
import type { ScrollAdvisoryKind, ZoomMode } from './zoom-mode';

export interface PanSettings {
  /** Number of columns (column mode) or zoom multiplier (pan mode) */
  factor: number;
  /** Horizontal overlap between pan steps, percent */
  overlapH: number;
  /** Vertical overlap between pan steps, percent */
  overlapV: number;
  rightToLeft: boolean;
  bottomToTop: boolean;
  /** Pan down columns before moving across */
  vertical: boolean;
}

export type ZoomNotification =
  | { type: 'ModeChanged'; mode: ZoomMode }
  | { type: 'ZoomChanged'; zoom: number }
  | { type: 'InitScrollState'; mode: ZoomMode | null }
  | { type: 'BBoxChanged'; box: PageBox | null }
  | { type: 'PanSettingsChanged'; changes: Partial<PanSettings> }
  | { type: 'RequestRedraw' }
  | { type: 'ScrollModeAdvisory'; mode: ZoomMode; kind: ScrollAdvisoryKind };

export type ZoomNotificationType = ZoomNotification['type'];

export type ZoomObserver = (notification: ZoomNotification) => void;
