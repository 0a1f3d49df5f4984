/**
 * MuPDF Document Geometry
 *
 * DocumentGeometry backed by a MuPDF document. Page sizes come from page
 * bounds; the used-content box and content blocks come from the page's
 * structured text (text and image blocks).
 *
 * Nothing is cached: every query loads the page and releases it again.
 *
 * @example
 * ```typescript
 * const geometry = await openMupdfGeometry(bytes);
 * const controller = createModeTransitionController(geometry, view, { viewport });
 * ```
 */

import type { Rect } from 'mupdf';
import type { DocumentGeometry } from './document-geometry';
import type { ContentBlock, PageBox, Size } from './geometry';

/** Callbacks of the structured-text walker this adapter listens to */
export interface BlockWalker {
  beginTextBlock?(bbox: Rect): void;
  onImageBlock?(bbox: Rect): void;
}

export interface MupdfStructuredText {
  walk(walker: BlockWalker): void;
  destroy(): void;
}

export interface MupdfPage {
  getBounds(): Rect;
  toStructuredText(options?: string): MupdfStructuredText;
  destroy(): void;
}

/** The part of mupdf's Document this adapter uses */
export interface MupdfDocument {
  loadPage(index: number): MupdfPage;
}

interface PageLayout {
  bounds: Rect;
  blocks: Rect[];
}

function rectWidth(rect: Rect): number {
  return rect[2] - rect[0];
}

function rectHeight(rect: Rect): number {
  return rect[3] - rect[1];
}

export class MupdfDocumentGeometry implements DocumentGeometry {
  constructor(private readonly doc: MupdfDocument) {}

  nativePageSize(page: number): Size {
    const loaded = this.doc.loadPage(page - 1);
    try {
      const bounds = loaded.getBounds();
      return { width: rectWidth(bounds), height: rectHeight(bounds) };
    } finally {
      loaded.destroy();
    }
  }

  /**
   * Union of all block boxes, relative to the page origin. A page with no
   * blocks reports its full bounds.
   */
  usedBoundingBox(page: number, scale: number): PageBox {
    const { bounds, blocks } = this.readLayout(page);

    if (blocks.length === 0) {
      return { x: 0, y: 0, width: rectWidth(bounds) * scale, height: rectHeight(bounds) * scale };
    }

    let x0 = Infinity;
    let y0 = Infinity;
    let x1 = -Infinity;
    let y1 = -Infinity;
    for (const block of blocks) {
      x0 = Math.min(x0, block[0]);
      y0 = Math.min(y0, block[1]);
      x1 = Math.max(x1, block[2]);
      y1 = Math.max(y1, block[3]);
    }

    return {
      x: (x0 - bounds[0]) * scale,
      y: (y0 - bounds[1]) * scale,
      width: (x1 - x0) * scale,
      height: (y1 - y0) * scale,
    };
  }

  contentBlockAt(page: number, fractionX: number, fractionY: number): ContentBlock | null {
    const { bounds, blocks } = this.readLayout(page);
    const width = rectWidth(bounds);
    const height = rectHeight(bounds);
    const x = bounds[0] + fractionX * width;
    const y = bounds[1] + fractionY * height;

    const hit = blocks.find((b) => x >= b[0] && x <= b[2] && y >= b[1] && y <= b[3]);
    if (!hit) return null;

    return {
      x0: (hit[0] - bounds[0]) / width,
      y0: (hit[1] - bounds[1]) / height,
      x1: (hit[2] - bounds[0]) / width,
      y1: (hit[3] - bounds[1]) / height,
    };
  }

  private readLayout(page: number): PageLayout {
    const loaded = this.doc.loadPage(page - 1);
    try {
      const bounds = loaded.getBounds();
      const stext = loaded.toStructuredText('preserve-whitespace');
      const blocks: Rect[] = [];
      try {
        stext.walk({
          beginTextBlock(bbox: Rect) {
            blocks.push(bbox);
          },
          onImageBlock(bbox: Rect) {
            blocks.push(bbox);
          },
        });
      } finally {
        stext.destroy();
      }
      return { bounds, blocks };
    } finally {
      loaded.destroy();
    }
  }
}

/**
 * Open a PDF with MuPDF and wrap it as DocumentGeometry.
 */
export async function openMupdfGeometry(
  data: Uint8Array,
  mimeType: string = 'application/pdf'
): Promise<MupdfDocumentGeometry> {
  const mupdf = await import('mupdf');
  const doc = mupdf.Document.openDocument(data, mimeType);
  return new MupdfDocumentGeometry(doc);
}
