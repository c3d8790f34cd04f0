export type ExtractionErrorCode = 'UnsupportedFormat' | 'CorruptInput' | 'EmptyResult' | 'NotImplemented';
export type UploadErrorCode = 'UploadRejected';
export type StoreErrorCode = 'InvalidSessionId' | 'UnknownConversation' | 'StorageUnavailable';
export type CompletionErrorCode = 'AuthError' | 'RateLimited' | 'UpstreamError' | 'InvalidResponse' | 'RequestRejected';

export type ErrorCode = ExtractionErrorCode | UploadErrorCode | StoreErrorCode | CompletionErrorCode;

/**
 * Base class for every failure the service reports on purpose.
 * `message` is for logs; what users see comes from {@link USER_MESSAGES}.
 */
export abstract class AppError<C extends ErrorCode = ErrorCode> extends Error {
  protected constructor(readonly code: C, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ExtractionError extends AppError<ExtractionErrorCode> {
  constructor(code: ExtractionErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
  }
}

export class UploadRejectedError extends AppError<UploadErrorCode> {
  constructor(readonly reason: string) {
    super('UploadRejected', reason);
  }
}

export class StoreError extends AppError<StoreErrorCode> {
  constructor(code: StoreErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
  }
}

export class CompletionError extends AppError<CompletionErrorCode> {
  constructor(code: CompletionErrorCode, message: string, options?: { cause?: unknown; status?: number }) {
    super(code, message, options);
    this.status = options?.status;
  }

  readonly status?: number;

  get retryable(): boolean {
    return this.code === 'RateLimited' || this.code === 'UpstreamError';
  }
}

/** Raised when a stream fails after it already emitted text. */
export class CompletionStreamError extends CompletionError {
  constructor(readonly failure: CompletionError, readonly partialText: string) {
    super(failure.code, `Stream interrupted after ${partialText.length} characters: ${failure.message}`, {
      cause: failure,
      status: failure.status,
    });
  }
}

export const USER_MESSAGES: Record<ErrorCode, string> = {
  UnsupportedFormat: 'This file type is not supported. Please upload a PDF or a text file (.txt, .csv, .md).',
  CorruptInput: 'The file could not be read. It may be damaged or not what its extension says; please re-export it and try again.',
  EmptyResult: 'No text could be found in this document. If it is a scanned PDF, please upload a version with selectable text.',
  NotImplemented: 'Text extraction for this kind of file is not available yet. Please upload a PDF or a text file instead.',
  UploadRejected: 'This upload was rejected. Files must be under the size limit, have a normal name and not be executable.',
  InvalidSessionId: 'This session id is not valid. Please start a new session.',
  UnknownConversation: 'This conversation no longer exists. Please start a new session.',
  StorageUnavailable: 'The conversation history is temporarily unavailable. Please try again in a moment.',
  AuthError: 'The assistant is not configured correctly (the model credential was refused). Please contact the administrator.',
  RateLimited: 'The assistant is receiving too many requests right now. Please wait a few seconds and try again.',
  UpstreamError: 'The assistant service is having trouble right now. Please try again later.',
  InvalidResponse: 'The assistant returned a reply that could not be read. Please ask again.',
  RequestRejected: 'The assistant could not process this request. Try shortening the document or the question.',
};

/** Shown for anything that is not an {@link AppError}. */
export const GENERIC_ERROR_MESSAGE = 'Something went wrong on our side. Please try again.';

export function userMessageFor(error: AppError): string {
  return USER_MESSAGES[error.code];
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
