import { ExtractionError } from '../../utils/errors';

export const DOCUMENT_FORMATS = ['pdf', 'image', 'plain-text', 'spreadsheet', 'unsupported'] as const;
export type DocumentFormat = (typeof DOCUMENT_FORMATS)[number];

export type ExtractionOutcome =
  | { ok: true; text: string; strategy?: string }
  | { ok: false; error: ExtractionError };

/** What a single PDF strategy reports. Strategies never throw. */
export type PdfStrategyResult =
  | { kind: 'text'; text: string }
  | { kind: 'empty' }
  | { kind: 'failed'; reason: string };

export interface PdfTextStrategy {
  readonly name: string;
  extract(bytes: Buffer): Promise<PdfStrategyResult>;
}

export interface UploadCandidate {
  fileName: string;
  size: number;
  mimeType?: string;
}
