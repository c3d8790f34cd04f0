import { UploadRejectedError } from '../../utils/errors';
import { DocumentFormat, UploadCandidate } from './types';

export const DEFAULT_MAX_UPLOAD_BYTES = 50 * 1024 * 1024;
export const MAX_FILE_NAME_LENGTH = 255;

type ExtractableFormat = Exclude<DocumentFormat, 'unsupported'>;

const EXTRACTABLE_FORMATS: readonly ExtractableFormat[] = ['pdf', 'image', 'plain-text', 'spreadsheet'];

export const SUPPORTED_EXTENSIONS: Readonly<Record<ExtractableFormat, readonly string[]>> = {
  pdf: ['.pdf'],
  image: ['.png', '.jpg', '.jpeg', '.gif', '.bmp', '.tiff'],
  'plain-text': ['.txt', '.csv', '.md'],
  spreadsheet: ['.xlsx', '.xls', '.ods'],
};

const EXECUTABLE_EXTENSIONS = new Set(['.exe', '.bat', '.cmd', '.com', '.scr', '.vbs', '.js']);

/** Lower-cased extension with its dot, or '' when there is none. */
export function fileExtension(fileName: string): string {
  const base = fileName.slice(fileName.lastIndexOf('/') + 1);
  const dot = base.lastIndexOf('.');
  return dot > 0 ? base.slice(dot).toLowerCase() : '';
}

export function detectDocumentFormat(fileName: string, mimeType?: string): DocumentFormat {
  const ext = fileExtension(fileName);
  const byExtension = EXTRACTABLE_FORMATS.find(format => ext !== '' && SUPPORTED_EXTENSIONS[format].includes(ext));
  if (byExtension) {
    return byExtension;
  }

  const type = mimeType?.toLowerCase() ?? '';
  if (type === 'application/pdf') return 'pdf';
  if (type.startsWith('image/')) return 'image';
  if (type.startsWith('text/')) return 'plain-text';
  return 'unsupported';
}

export function validateUpload({ fileName, size }: UploadCandidate, maxBytes = DEFAULT_MAX_UPLOAD_BYTES): void {
  if (size > maxBytes) {
    throw new UploadRejectedError(`File is ${size} bytes, limit is ${maxBytes}`);
  }
  if (!fileName.trim() || fileName.length > MAX_FILE_NAME_LENGTH) {
    throw new UploadRejectedError('File name is empty or too long');
  }
  const ext = fileExtension(fileName);
  if (EXECUTABLE_EXTENSIONS.has(ext)) {
    throw new UploadRejectedError(`Executable extension ${ext} is not accepted`);
  }
}

export function supportedFormats(): Record<string, string[]> {
  return Object.fromEntries(EXTRACTABLE_FORMATS.map(format => [format, [...SUPPORTED_EXTENSIONS[format]]]));
}
