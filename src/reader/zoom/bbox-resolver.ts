/**
 * BBox Resolver
 *
 * Chooses the page size a fit is computed against. Content-aware modes fit
 * the used-content box so blank margins are cropped away; every other mode
 * fits the full native page.
 *
 * A used box larger than the native page (seen with broken crop boxes and
 * some scanned documents) is never trusted: the full page is used instead.
 */

import type { DocumentGeometry } from './document-geometry';
import { fitsWithin, type PageBox, type Size } from './geometry';
import { isContentAwareMode, isZoomMode, type ZoomMode } from './zoom-mode';

/** Scale at which the used box is measured, so it compares to native size */
export const BBOX_REFERENCE_SCALE = 1;

export interface EffectivePageSize {
  /** Size to fit against */
  size: Size;
  /** Used-content box when it was adopted, null for the full page */
  box: PageBox | null;
}

export function resolveEffectivePageSize(
  document: DocumentGeometry,
  page: number,
  mode: ZoomMode
): EffectivePageSize {
  const native = document.nativePageSize(page);

  if (!isZoomMode(mode)) {
    console.warn(`[BBoxResolver] Unrecognized zoom mode "${String(mode)}", fitting full page`);
    return { size: native, box: null };
  }

  if (!isContentAwareMode(mode)) {
    return { size: native, box: null };
  }

  const box = document.usedBoundingBox(page, BBOX_REFERENCE_SCALE);
  const boxSize: Size = { width: box.width, height: box.height };

  if (fitsWithin(boxSize, native)) {
    return { size: boxSize, box };
  }

  console.debug(
    `[BBoxResolver] Page ${page}: used box ${box.width}x${box.height} exceeds native ${native.width}x${native.height}, fitting full page`
  );
  return { size: native, box: null };
}
