/**
 * Cache Budget Limiter
 *
 * A decoded page bitmap grows linearly with zoom. Before a large zoom is
 * requested, the render cache is asked whether it would admit a bitmap of
 * the estimated size; while it refuses, the zoom is stepped down.
 *
 * Step sizes come from a magnitude-banded schedule so the search is coarse
 * at high zoom and fine near 1. The schedule is empirical and kept
 * configurable.
 *
 * If the zoom falls below zero the limiter gives up and returns
 * NO_VIABLE_ZOOM. That value is a poison marker, never a magnification:
 * callers must not render at it.
 */

import type { Size } from './geometry';

/** Returned when no zoom at this viewport is accepted by the cache */
export const NO_VIABLE_ZOOM = 0;

/**
 * Render cache admission predicate: would an object of this many bytes fit?
 */
export type AdmissionPredicate = (estimatedBytes: number) => boolean;

export interface DegradeBand {
  /** Band applies while zoom is strictly above this value */
  above: number;
  step: number;
}

export interface DegradePolicy {
  /** Zooms at or below this are never checked */
  threshold: number;
  /** Per-bitmap overhead added to the viewport area */
  overheadBytes: number;
  /** Bands ordered from highest `above` to lowest */
  bands: readonly DegradeBand[];
  /** Step below the lowest band */
  floorStep: number;
}

export const DEFAULT_DEGRADE_POLICY: DegradePolicy = {
  threshold: 10,
  overheadBytes: 64,
  bands: [
    { above: 100, step: 50 },
    { above: 10, step: 5 },
    { above: 1, step: 0.5 },
    { above: 0.1, step: 0.05 },
  ],
  floorStep: 0.005,
};

export function estimateBitmapCost(
  zoom: number,
  viewport: Size,
  policy: DegradePolicy = DEFAULT_DEGRADE_POLICY
): number {
  return zoom * (viewport.width * viewport.height + policy.overheadBytes);
}

export function degradeStep(zoom: number, policy: DegradePolicy = DEFAULT_DEGRADE_POLICY): number {
  for (const band of policy.bands) {
    if (zoom > band.above) return band.step;
  }
  return policy.floorStep;
}

export interface CacheBudgetResult {
  /** Accepted zoom, or NO_VIABLE_ZOOM */
  zoom: number;
  /** Number of decrements applied */
  steps: number;
}

/**
 * Step `zoom` down until the cache admits it.
 *
 * Terminates for any finite start: every step is at least `floorStep`
 * and the loop stops once the zoom is negative.
 */
export function limitZoomToCacheBudget(
  zoom: number,
  viewport: Size,
  accepts: AdmissionPredicate,
  policy: DegradePolicy = DEFAULT_DEGRADE_POLICY
): CacheBudgetResult {
  if (!(zoom > policy.threshold)) {
    return { zoom, steps: 0 };
  }
  if (!Number.isFinite(zoom)) {
    return { zoom: NO_VIABLE_ZOOM, steps: 0 };
  }

  let current = zoom;
  let steps = 0;
  while (!accepts(estimateBitmapCost(current, viewport, policy))) {
    if (steps === 0) {
      console.debug(`[CacheBudgetLimiter] Zoom ${zoom} too large for render cache, adjusting`);
    }
    current -= degradeStep(current, policy);
    steps++;
    console.debug(`[CacheBudgetLimiter] New zoom: ${current}`);

    if (current < 0) {
      return { zoom: NO_VIABLE_ZOOM, steps };
    }
  }

  return { zoom: current, steps };
}

/**
 * Byte-budget admission policy for a render cache.
 *
 * A single bitmap may take at most `maxObjectShare` of the budget, so one
 * huge page cannot flush everything else out.
 */
export class RenderCacheBudget {
  private maxBytes: number;
  private readonly maxObjectShare: number;

  constructor(options: { maxBytes?: number; maxObjectShare?: number } = {}) {
    this.maxBytes = options.maxBytes ?? 100 * 1024 * 1024; // 100MB default
    this.maxObjectShare = options.maxObjectShare ?? 0.75;
  }

  willAccept(bytes: number): boolean {
    return bytes <= this.maxBytes * this.maxObjectShare;
  }

  /**
   * Set the budget from available memory: ~1% of RAM, between 50MB and 500MB.
   */
  setMemoryBudget(memoryGB: number): void {
    const budgetMB = Math.max(50, Math.min(500, memoryGB * 10));
    this.maxBytes = budgetMB * 1024 * 1024;
    console.log(`[RenderCacheBudget] Budget set to ${budgetMB}MB (${memoryGB}GB system RAM)`);
  }

  getMaxBytes(): number {
    return this.maxBytes;
  }

  /** Predicate bound to this budget, for the limiter */
  asPredicate(): AdmissionPredicate {
    return (bytes) => this.willAccept(bytes);
  }
}
