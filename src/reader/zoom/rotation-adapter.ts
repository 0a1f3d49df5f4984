/**
 * Rotation handling for fit calculations.
 *
 * At a quarter turn the page is laid on its side, so its width is
 * measured against the viewport height and vice versa.
 */

import type { Size } from './geometry';

export type Rotation = 0 | 90 | 180 | 270;

/**
 * Normalize any degree value to 0/90/180/270.
 * Values that are not a multiple of 90 snap to the nearest quarter turn.
 */
export function normalizeRotation(degrees: number): Rotation {
  if (!Number.isFinite(degrees)) return 0;
  const quarter = ((Math.round(degrees / 90) % 4) + 4) % 4;
  switch (quarter) {
    case 1:
      return 90;
    case 2:
      return 180;
    case 3:
      return 270;
    default:
      return 0;
  }
}

export function isQuarterTurn(rotation: Rotation): boolean {
  return rotation % 180 !== 0;
}

/**
 * Page size as it lies in the viewport after rotation.
 */
export function orientPageSize(page: Size, rotation: Rotation): Size {
  if (isQuarterTurn(rotation)) {
    return { width: page.height, height: page.width };
  }
  return { width: page.width, height: page.height };
}
