import { ConfigService } from '@nestjs/config';
import { uploadLimits } from './chat.module';
import { DEFAULT_MAX_UPLOAD_BYTES } from '../documents/document-format';

describe('uploadLimits', () => {
  it('caps multipart files at MAX_UPLOAD_BYTES', () => {
    expect(uploadLimits(new ConfigService({ MAX_UPLOAD_BYTES: 1024 }))).toEqual({ limits: { fileSize: 1024, files: 1 } });
  });

  it('falls back to the default limit', () => {
    expect(uploadLimits(new ConfigService({}))).toEqual({ limits: { fileSize: DEFAULT_MAX_UPLOAD_BYTES, files: 1 } });
  });
});
