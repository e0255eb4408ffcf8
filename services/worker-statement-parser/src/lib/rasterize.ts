/**
 * Page rasterization for OCR, rendered with pdf-to-png-converter at
 * viewport scale dpi / 72.
 */

import { pdfToPng } from 'pdf-to-png-converter';

const PDF_POINTS_PER_INCH = 72;

export type PageRenderer = (pdfBytes: Uint8Array, pageNumber: number, dpi: number) => Promise<Buffer>;

export const renderPageToPng: PageRenderer = async (pdfBytes, pageNumber, dpi) => {
  // Copy: the converter hands the buffer to its own pdfjs instance
  const [png] = await pdfToPng(pdfBytes.slice().buffer, {
    viewportScale: dpi / PDF_POINTS_PER_INCH,
    pagesToProcess: [pageNumber],
    disableFontFace: true,
    useSystemFonts: true,
  });

  if (!png?.content) {
    throw new Error(`Page ${pageNumber} could not be rendered`);
  }
  return png.content;
};
