/**
 * Geometry primitives shared by the zoom engine.
 *
 * Screen positions are in viewport pixels, page sizes in page points at
 * scale 1, and content blocks in fractions of the native page.
 */

export interface Point {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

/**
 * Used-content bounding box of a page, in page points at the queried scale.
 */
export interface PageBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Content block in normalized page coordinates (0..1 on both axes).
 */
export interface ContentBlock {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

/**
 * A screen point projected onto the single visible page.
 * `x`/`y` come from the view's projection, `zoom` is the zoom it used.
 */
export interface PagePosition extends Point {
  zoom: number;
}

/**
 * Check that a size is usable as a divisor (both sides finite and > 0)
 */
export function isPositiveSize(size: Size): boolean {
  return (
    Number.isFinite(size.width) &&
    Number.isFinite(size.height) &&
    size.width > 0 &&
    size.height > 0
  );
}

/**
 * Whether `inner` fits inside `outer` on both axes
 */
export function fitsWithin(inner: Size, outer: Size): boolean {
  return inner.width <= outer.width && inner.height <= outer.height;
}
