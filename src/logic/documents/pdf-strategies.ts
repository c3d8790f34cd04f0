import pdfParse from 'pdf-parse';
import { errorMessage } from '../../utils/errors';
import { normalizeText } from '../../utils/textNormalizer';
import { PdfStrategyResult, PdfTextStrategy } from './types';

export const PDF_TEXT_STRATEGIES = Symbol('PDF_TEXT_STRATEGIES');

function fromPages(pages: string[]): PdfStrategyResult {
  const kept = pages.map(normalizeText).filter(page => page.length > 0);
  return kept.length > 0 ? { kind: 'text', text: kept.join('\n\n') } : { kind: 'empty' };
}

/** Primary strategy. pdf-parse already separates pages with blank lines. */
export class PdfParseStrategy implements PdfTextStrategy {
  readonly name = 'pdf-parse';

  async extract(bytes: Buffer): Promise<PdfStrategyResult> {
    try {
      const result = await pdfParse(bytes);
      return fromPages([result.text]);
    } catch (error) {
      return { kind: 'failed', reason: errorMessage(error) };
    }
  }
}

/** Page-by-page text content through pdf.js, used when pdf-parse gives up. */
export class PdfJsStrategy implements PdfTextStrategy {
  readonly name = 'pdfjs-dist';

  async extract(bytes: Buffer): Promise<PdfStrategyResult> {
    try {
      const { getDocument } = await import('pdfjs-dist');
      const pdfDoc = await getDocument({
        data: new Uint8Array(bytes),
        useWorkerFetch: false,
        isEvalSupported: false,
        disableFontFace: true,
      }).promise;

      try {
        const pages: string[] = [];
        for (let pageNumber = 1; pageNumber <= pdfDoc.numPages; pageNumber++) {
          const page = await pdfDoc.getPage(pageNumber);
          const content = await page.getTextContent();
          pages.push(
            content.items
              .map(item => ('str' in item ? item.str + (item.hasEOL ? '\n' : '') : ''))
              .join(''),
          );
        }
        return fromPages(pages);
      } finally {
        await pdfDoc.destroy();
      }
    } catch (error) {
      return { kind: 'failed', reason: errorMessage(error) };
    }
  }
}

export function defaultPdfStrategies(): PdfTextStrategy[] {
  return [new PdfParseStrategy(), new PdfJsStrategy()];
}
