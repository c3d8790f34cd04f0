import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ExtractionError, errorMessage } from '../../utils/errors';
import { normalizeText } from '../../utils/textNormalizer';
import { DEFAULT_MAX_UPLOAD_BYTES, detectDocumentFormat, supportedFormats, validateUpload } from './document-format';
import { PDF_TEXT_STRATEGIES } from './pdf-strategies';
import { DocumentFormat, ExtractionOutcome, PdfTextStrategy, UploadCandidate } from './types';

const utf8 = new TextDecoder('utf-8', { fatal: true });

function failure(code: ExtractionError['code'], message: string, cause?: unknown): ExtractionOutcome {
    return { ok: false, error: new ExtractionError(code, message, cause === undefined ? undefined : { cause }) };
}

@Injectable()
export class DocumentExtractorService {
    private readonly logger = new Logger(DocumentExtractorService.name);
    private readonly maxUploadBytes: number;

    constructor(
        private readonly configService: ConfigService,
        @Inject(PDF_TEXT_STRATEGIES) private readonly pdfStrategies: readonly PdfTextStrategy[],
    ) {
        this.maxUploadBytes = configService.get<number>('MAX_UPLOAD_BYTES', DEFAULT_MAX_UPLOAD_BYTES);
    }

    /** Validates an upload and returns the format to extract it as. Throws UploadRejectedError. */
    inspect(file: UploadCandidate): DocumentFormat {
        validateUpload(file, this.maxUploadBytes);
        return detectDocumentFormat(file.fileName, file.mimeType);
    }

    supportedFormats() {
        return supportedFormats();
    }

    async extract(bytes: Buffer, format: DocumentFormat): Promise<ExtractionOutcome> {
        if (format === 'unsupported') {
            return failure('UnsupportedFormat', 'No extractor for this file type');
        }
        if (format === 'image') {
            return failure('NotImplemented', 'Image text extraction (OCR) is not available');
        }
        if (format === 'spreadsheet') {
            return failure('NotImplemented', 'Spreadsheet text extraction is not available');
        }
        if (bytes.length === 0) {
            return failure('EmptyResult', 'The file is empty');
        }
        return format === 'pdf' ? this.extractPdf(bytes) : this.extractPlainText(bytes);
    }

    private extractPlainText(bytes: Buffer): ExtractionOutcome {
        let decoded: string;
        try {
            decoded = utf8.decode(bytes);
        } catch (error) {
            this.logger.warn(`Text file is not valid UTF-8: ${errorMessage(error)}`);
            return failure('CorruptInput', 'The file is not valid UTF-8 text', error);
        }

        const text = normalizeText(decoded);
        if (!text) {
            return failure('EmptyResult', 'The file contains only whitespace');
        }
        this.logger.log(`Extracted ${text.length} characters of plain text`);
        return { ok: true, text };
    }

    /** Strategies run in order; the first one that finds text wins. */
    private async extractPdf(bytes: Buffer): Promise<ExtractionOutcome> {
        let sawEmpty = false;
        const reasons: string[] = [];

        for (const strategy of this.pdfStrategies) {
            const result = await strategy.extract(bytes);
            switch (result.kind) {
                case 'text':
                    this.logger.log(`Extracted ${result.text.length} characters with ${strategy.name}`);
                    return { ok: true, text: result.text, strategy: strategy.name };
                case 'empty':
                    sawEmpty = true;
                    this.logger.warn(`${strategy.name} found no text`);
                    break;
                case 'failed':
                    reasons.push(`${strategy.name}: ${result.reason}`);
                    this.logger.warn(`${strategy.name} failed: ${result.reason}`);
                    break;
            }
        }

        if (sawEmpty) {
            return failure('EmptyResult', 'The PDF has no text layer');
        }
        return failure('CorruptInput', `No PDF strategy could read the file (${reasons.join('; ')})`);
    }
}
