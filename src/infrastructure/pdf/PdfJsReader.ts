import fs from 'fs';
import * as pdfjsLib from 'pdfjs-dist';
import { IPdfReader } from '../../core/interfaces/IPdfReader.js';
import { createLogger } from '../../utils/logger.js';
import { PositionedText, layoutPageText } from './textLayout.js';

const log = createLogger('PdfJsReader');

/**
 * PDF text extraction backed by pdfjs-dist. Pages are never merged or split.
 */
export class PdfJsReader implements IPdfReader {
  async readPages(pdfPath: string): Promise<string[]> {
    const data = new Uint8Array(await fs.promises.readFile(pdfPath));
    // Errors only: missing standard font data would otherwise warn on stdout
    const document = await pdfjsLib.getDocument({
      data,
      isEvalSupported: false,
      verbosity: pdfjsLib.VerbosityLevel.ERRORS,
    }).promise;

    try {
      const pages: string[] = [];
      for (let pageNumber = 1; pageNumber <= document.numPages; pageNumber++) {
        const page = await document.getPage(pageNumber);
        const content = await page.getTextContent();

        const items: PositionedText[] = [];
        for (const item of content.items) {
          if ('str' in item) {
            items.push({ text: item.str, x: item.transform[4], y: item.transform[5] });
          }
        }
        pages.push(layoutPageText(items));
        page.cleanup();
      }

      log.debug('PDF read', { path: pdfPath, pages: pages.length });
      return pages;
    } finally {
      await document.destroy();
    }
  }
}
