import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { DocumentExtractorService } from './document-extractor.service';
import { PDF_TEXT_STRATEGIES } from './pdf-strategies';
import { PdfStrategyResult, PdfTextStrategy } from './types';
import { ExtractionError, UploadRejectedError } from '../../utils/errors';

function strategy(name: string, result: PdfStrategyResult) {
  return { name, extract: jest.fn(async (_bytes: Buffer) => result) };
}

async function createService(strategies: PdfTextStrategy[], config: Record<string, unknown> = {}) {
  const module: TestingModule = await Test.createTestingModule({
    providers: [
      DocumentExtractorService,
      { provide: ConfigService, useValue: new ConfigService(config) },
      { provide: PDF_TEXT_STRATEGIES, useValue: strategies },
    ],
  }).compile();
  return module.get<DocumentExtractorService>(DocumentExtractorService);
}

describe('DocumentExtractorService', () => {
  const pdf = Buffer.from('%PDF-1.4');

  describe('pdf', () => {
    it('stops at the first strategy that finds text', async () => {
      const primary = strategy('primary', { kind: 'text', text: 'Taxi 23.00' });
      const secondary = strategy('secondary', { kind: 'text', text: 'unused' });
      const service = await createService([primary, secondary]);

      await expect(service.extract(pdf, 'pdf')).resolves.toEqual({ ok: true, text: 'Taxi 23.00', strategy: 'primary' });
      expect(secondary.extract).not.toHaveBeenCalled();
    });

    it('falls back when the primary strategy fails', async () => {
      const primary = strategy('primary', { kind: 'failed', reason: 'bad xref' });
      const secondary = strategy('secondary', { kind: 'text', text: 'Hotel 240.00' });
      const service = await createService([primary, secondary]);

      await expect(service.extract(pdf, 'pdf')).resolves.toEqual({ ok: true, text: 'Hotel 240.00', strategy: 'secondary' });
      expect(primary.extract).toHaveBeenCalledWith(pdf);
    });

    it('reports EmptyResult when a strategy read the file but found no text', async () => {
      const service = await createService([
        strategy('primary', { kind: 'empty' }),
        strategy('secondary', { kind: 'failed', reason: 'unsupported encryption' }),
      ]);

      const outcome = await service.extract(pdf, 'pdf');

      expect(outcome.ok).toBe(false);
      expect(outcome).toMatchObject({ error: { code: 'EmptyResult' } });
    });

    it('reports CorruptInput when every strategy failed', async () => {
      const service = await createService([
        strategy('primary', { kind: 'failed', reason: 'bad xref' }),
        strategy('secondary', { kind: 'failed', reason: 'Invalid PDF structure.' }),
      ]);

      const outcome = await service.extract(pdf, 'pdf');

      if (outcome.ok) {
        throw new Error('expected a failure');
      }
      expect(outcome.error).toBeInstanceOf(ExtractionError);
      expect(outcome.error.code).toBe('CorruptInput');
      expect(outcome.error.message).toBe(
        'No PDF strategy could read the file (primary: bad xref; secondary: Invalid PDF structure.)',
      );
    });
  });

  describe('plain text', () => {
    let service: DocumentExtractorService;

    beforeEach(async () => {
      service = await createService([]);
    });

    it('decodes UTF-8, drops the BOM and normalizes whitespace', async () => {
      const bytes = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('Café\t 4.50\r\n\r\n\r\n\r\nTotal 4.50  \n')]);

      await expect(service.extract(bytes, 'plain-text')).resolves.toEqual({ ok: true, text: 'Café 4.50\n\nTotal 4.50' });
    });

    it('rejects bytes that are not UTF-8', async () => {
      const outcome = await service.extract(Buffer.from([0x54, 0x6f, 0xff, 0xfe, 0x74]), 'plain-text');

      expect(outcome).toMatchObject({ ok: false, error: { code: 'CorruptInput' } });
    });

    it('reports whitespace-only files as empty', async () => {
      await expect(service.extract(Buffer.from(' \n\t\n'), 'plain-text')).resolves.toMatchObject({
        ok: false,
        error: { code: 'EmptyResult' },
      });
    });
  });

  describe('other formats', () => {
    it.each([
      ['unsupported', 'UnsupportedFormat'],
      ['image', 'NotImplemented'],
      ['spreadsheet', 'NotImplemented'],
    ] as const)('%s gives %s', async (format, code) => {
      const service = await createService([]);

      await expect(service.extract(Buffer.from('data'), format)).resolves.toMatchObject({ ok: false, error: { code } });
    });

    it('treats an empty payload as EmptyResult before running any strategy', async () => {
      const primary = strategy('primary', { kind: 'text', text: 'never' });
      const service = await createService([primary]);

      await expect(service.extract(Buffer.alloc(0), 'pdf')).resolves.toMatchObject({ ok: false, error: { code: 'EmptyResult' } });
      expect(primary.extract).not.toHaveBeenCalled();
    });
  });

  describe('inspect', () => {
    it('validates against the configured size limit and detects the format', async () => {
      const service = await createService([], { MAX_UPLOAD_BYTES: 1000 });

      expect(service.inspect({ fileName: 'lunch.txt', size: 999 })).toBe('plain-text');
      expect(() => service.inspect({ fileName: 'lunch.txt', size: 1001 })).toThrow(UploadRejectedError);
    });
  });
});
