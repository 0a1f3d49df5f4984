/**
 * Regional Center Locator
 *
 * Picks the zoom and focal point for entering free zoom from a gesture:
 * the content block under the finger is scaled to the viewport width and
 * centered horizontally, keeping the finger's vertical offset.
 *
 * The zoom is widened so the configured page margin stays visible on
 * both sides:
 *
 *   zoom /= 1 + 3 * margin / (zoom * page.width)
 *
 * When no block is under the finger, only a zoom is returned (twice the
 * page-width fit) and the caller derives the center itself with
 * fallbackZoomCenter().
 */

import type { DocumentGeometry, ZoomSink } from './document-geometry';
import type { ContentBlock, Point, Size } from './geometry';

export interface MarginSettings {
  /** Page margin in inches */
  pageMargin: number;
  /** Screen density, dots per inch */
  dpi: number;
}

export type RegionalZoom =
  | { kind: 'block'; zoom: number; center: Point; block: ContentBlock }
  | { kind: 'page'; zoom: number };

export interface RegionalCenterContext {
  document: DocumentGeometry;
  sink: Pick<ZoomSink, 'getSinglePagePosition'>;
  /** Full viewport; the footer does not narrow the width */
  viewport: Size;
  margin: MarginSettings;
}

export function marginInPixels(margin: MarginSettings): number {
  return margin.pageMargin * margin.dpi;
}

export function compensateMargin(zoom: number, marginPx: number, pageWidth: number): number {
  return zoom / (1 + (3 * marginPx) / zoom / pageWidth);
}

export function locateRegionalZoomCenter(
  context: RegionalCenterContext,
  page: number,
  screen: Point
): RegionalZoom {
  const { document, sink, viewport } = context;

  const position = sink.getSinglePagePosition(screen);
  const pageSize = document.nativePageSize(page);
  const fractionX = position.x / pageSize.width;
  const fractionY = position.y / pageSize.height;
  const block = document.contentBlockAt(page, fractionX, fractionY);
  const marginPx = marginInPixels(context.margin);

  // A zero-width block has no width to fit
  if (block && block.x1 > block.x0) {
    const fit = viewport.width / pageSize.width / (block.x1 - block.x0);
    const zoom = compensateMargin(fit, marginPx, pageSize.width);
    const center: Point = {
      x: ((block.x0 + block.x1) / 2) * zoom * pageSize.width,
      y: (position.y / position.zoom) * zoom,
    };
    return { kind: 'block', zoom, center, block };
  }

  const fit = (2 * viewport.width) / pageSize.width;
  return { kind: 'page', zoom: compensateMargin(fit, marginPx, pageSize.width) };
}

/**
 * Focal point when no block was found: the gesture position scaled by the
 * zoom change.
 */
export function fallbackZoomCenter(gesture: Point, previousZoom: number, zoom: number): Point {
  return {
    x: (gesture.x * zoom) / previousZoom,
    y: (gesture.y * zoom) / previousZoom,
  };
}
