/**
 * Capabilities the zoom engine needs from its collaborators.
 *
 * The document side answers geometry questions; the view side receives
 * zoom results and projects screen points onto the visible page. Both are
 * called synchronously and may be expensive; the engine does not memoize.
 */

import type { ContentBlock, PageBox, PagePosition, Point, Size } from './geometry';

/**
 * Re-layout support for reflowable documents
 */
export interface ReflowCapability {
  /** Map the reader's font size onto the document's own unit */
  convertFontSize(fontSize: number): number;
  /** Re-lay-out the whole document at the converted size */
  layoutDocument(fontSize: number): void;
}

export interface DocumentGeometry {
  /** Native size of a 1-based page at scale 1 */
  nativePageSize(page: number): Size;
  /** Smallest box containing rendered content, at the given scale */
  usedBoundingBox(page: number, scale: number): PageBox;
  /** Content block covering the fractional position, or null */
  contentBlockAt(page: number, fractionX: number, fractionY: number): ContentBlock | null;
  /** Present only for reflowable documents */
  readonly reflow?: ReflowCapability;
}

export interface ZoomSink {
  /** Used-content box adopted for fitting, or null when fitting the full page */
  onBBoxChanged(box: PageBox | null): void;
  onZoomChanged(zoom: number): void;
  /** Focal point (in zoomed page pixels) to center on */
  setZoomCenter(x: number, y: number): void;
  /** Project a screen point onto the single visible page */
  getSinglePagePosition(screen: Point): PagePosition;
  /** Whether the view lays pages out as one continuous scroll */
  isPageScroll(): boolean;
}
