/**
 * Cache Budget Limiter Tests
 *
 * - Zooms at or below the threshold are never checked
 * - Rejected zooms step down through the band schedule
 * - The loop always terminates, returning NO_VIABLE_ZOOM when nothing fits
 */

import { describe, it, expect, vi } from 'vitest';

import {
  limitZoomToCacheBudget,
  estimateBitmapCost,
  degradeStep,
  RenderCacheBudget,
  NO_VIABLE_ZOOM,
  type DegradePolicy,
} from '@/reader/zoom/cache-budget-limiter';

const viewport = { width: 100, height: 100 };
/** viewport area + per-bitmap overhead */
const UNIT_COST = 100 * 100 + 64;

describe('Cache Budget Limiter', () => {
  it('estimates cost from zoom and viewport area', () => {
    expect(estimateBitmapCost(2, viewport)).toBe(2 * UNIT_COST);
  });

  it('does not consult the cache at or below the threshold', () => {
    const accepts = vi.fn(() => false);
    expect(limitZoomToCacheBudget(8, viewport, accepts)).toEqual({ zoom: 8, steps: 0 });
    expect(limitZoomToCacheBudget(10, viewport, accepts)).toEqual({ zoom: 10, steps: 0 });
    expect(accepts).not.toHaveBeenCalled();
  });

  it('keeps a zoom the cache accepts', () => {
    const accepts = vi.fn(() => true);
    expect(limitZoomToCacheBudget(20, viewport, accepts)).toEqual({ zoom: 20, steps: 0 });
    expect(accepts).toHaveBeenCalledWith(20 * UNIT_COST);
  });

  it('steps down through the bands until accepted', () => {
    const accepts = (bytes: number) => bytes <= 30 * UNIT_COST;
    // 150 → 100 (one step of 50), then 100 → 30 in fourteen steps of 5
    expect(limitZoomToCacheBudget(150, viewport, accepts)).toEqual({ zoom: 30, steps: 15 });
  });

  it('returns NO_VIABLE_ZOOM when nothing is accepted', () => {
    const result = limitZoomToCacheBudget(12, viewport, () => false);
    expect(result.zoom).toBe(NO_VIABLE_ZOOM);
    expect(result.steps).toBeGreaterThan(0);
  });

  it('only ever decreases the zoom', () => {
    const tried: number[] = [];
    limitZoomToCacheBudget(250, viewport, (bytes) => {
      tried.push(bytes / UNIT_COST);
      return false;
    });

    expect(tried[0]).toBe(250);
    for (let i = 1; i < tried.length; i++) {
      expect(tried[i]).toBeLessThan(tried[i - 1]);
    }
  });

  it('gives up on an infinite zoom', () => {
    expect(limitZoomToCacheBudget(Infinity, viewport, () => false)).toEqual({
      zoom: NO_VIABLE_ZOOM,
      steps: 0,
    });
  });

  it('follows a custom schedule', () => {
    const policy: DegradePolicy = {
      threshold: 10,
      overheadBytes: 64,
      bands: [{ above: 10, step: 10 }],
      floorStep: 1,
    };
    const accepts = (bytes: number) => bytes <= 15 * UNIT_COST;
    expect(limitZoomToCacheBudget(40, viewport, accepts, policy)).toEqual({ zoom: 10, steps: 3 });
  });

  it('picks the step by magnitude', () => {
    expect(degradeStep(150)).toBe(50);
    expect(degradeStep(100)).toBe(5);
    expect(degradeStep(50)).toBe(5);
    expect(degradeStep(10)).toBe(0.5);
    expect(degradeStep(2)).toBe(0.5);
    expect(degradeStep(1)).toBe(0.05);
    expect(degradeStep(0.5)).toBe(0.05);
    expect(degradeStep(0.1)).toBe(0.005);
    expect(degradeStep(0.05)).toBe(0.005);
  });
});

describe('RenderCacheBudget', () => {
  it('admits objects up to three quarters of the budget', () => {
    const budget = new RenderCacheBudget({ maxBytes: 1000 });
    expect(budget.willAccept(750)).toBe(true);
    expect(budget.willAccept(751)).toBe(false);
  });

  it('honours a custom object share', () => {
    const budget = new RenderCacheBudget({ maxBytes: 1000, maxObjectShare: 0.5 });
    const accepts = budget.asPredicate();
    expect(accepts(500)).toBe(true);
    expect(accepts(501)).toBe(false);
  });

  it('sizes the budget from system memory within bounds', () => {
    const budget = new RenderCacheBudget();
    expect(budget.getMaxBytes()).toBe(100 * 1024 * 1024);

    budget.setMemoryBudget(8);
    expect(budget.getMaxBytes()).toBe(80 * 1024 * 1024);

    budget.setMemoryBudget(1);
    expect(budget.getMaxBytes()).toBe(50 * 1024 * 1024);

    budget.setMemoryBudget(128);
    expect(budget.getMaxBytes()).toBe(500 * 1024 * 1024);
  });
});
