/**
 * Zoom Calculator
 *
 * Pure mapping from (mode, fit ratios, pan factor) to a candidate zoom.
 *
 * The ratios compare the usable viewport against the effective page size
 * as it lies after rotation:
 *
 *   ratioW = viewport.width  / page.width   (page.height at 90/270)
 *   ratioH = viewport.height / page.height  (page.width  at 90/270)
 *
 * The candidate is not yet checked against the render cache; see
 * cache-budget-limiter.ts.
 */

import type { Size } from './geometry';
import { orientPageSize, type Rotation } from './rotation-adapter';
import type { ZoomMode } from './zoom-mode';

/**
 * Reserved footer strip at the bottom of the viewport
 */
export interface FooterLayout {
  visible: boolean;
  /** Height in viewport pixels */
  height: number;
  /** Footer is drawn over the page instead of taking layout space */
  reclaimHeight: boolean;
}

export const NO_FOOTER: FooterLayout = {
  visible: false,
  height: 0,
  reclaimHeight: false,
};

export interface FitRatios {
  width: number;
  height: number;
}

export interface ZoomInputs {
  mode: ZoomMode;
  ratios: FitRatios;
  panFactor: number;
  /** Absolute zoom kept by free mode */
  storedZoom: number;
}

/**
 * Viewport area left for the page once the footer has taken its strip.
 */
export function usableViewport(viewport: Size, footer: FooterLayout): Size {
  if (footer.visible && !footer.reclaimHeight) {
    return { width: viewport.width, height: viewport.height - footer.height };
  }
  return { width: viewport.width, height: viewport.height };
}

export function computeFitRatios(viewport: Size, page: Size, rotation: Rotation): FitRatios {
  const oriented = orientPageSize(page, rotation);
  return {
    width: viewport.width / oriented.width,
    height: viewport.height / oriented.height,
  };
}

/**
 * Candidate zoom for a mode.
 *
 * Returns null only for a value outside the mode union, which the type
 * system rules out; it is logged and the caller keeps its current zoom.
 */
export function calculateZoom(inputs: ZoomInputs): number | null {
  const { mode, ratios, panFactor, storedZoom } = inputs;

  switch (mode) {
    case 'content':
    case 'page':
      return Math.min(ratios.width, ratios.height);
    case 'contentwidth':
    case 'pagewidth':
      return ratios.width;
    case 'contentheight':
    case 'pageheight':
      return ratios.height;
    case 'pan':
    case 'column':
      return ratios.width * panFactor;
    case 'free':
      return storedZoom;
    default: {
      const unreachable: never = mode;
      console.error(`[ZoomCalculator] No fit rule for zoom mode "${String(unreachable)}"`);
      return null;
    }
  }
}
