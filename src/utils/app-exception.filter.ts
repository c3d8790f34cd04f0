import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger, PayloadTooLargeException } from '@nestjs/common';
import { Response } from 'express';
import { AppError, ErrorCode, GENERIC_ERROR_MESSAGE, USER_MESSAGES, userMessageFor } from './errors';

export const STATUS_BY_CODE: Record<ErrorCode, HttpStatus> = {
  UploadRejected: HttpStatus.BAD_REQUEST,
  UnsupportedFormat: HttpStatus.UNSUPPORTED_MEDIA_TYPE,
  CorruptInput: HttpStatus.UNPROCESSABLE_ENTITY,
  EmptyResult: HttpStatus.UNPROCESSABLE_ENTITY,
  NotImplemented: HttpStatus.NOT_IMPLEMENTED,
  InvalidSessionId: HttpStatus.BAD_REQUEST,
  UnknownConversation: HttpStatus.NOT_FOUND,
  StorageUnavailable: HttpStatus.SERVICE_UNAVAILABLE,
  AuthError: HttpStatus.BAD_GATEWAY,
  RateLimited: HttpStatus.TOO_MANY_REQUESTS,
  UpstreamError: HttpStatus.BAD_GATEWAY,
  InvalidResponse: HttpStatus.BAD_GATEWAY,
  RequestRejected: HttpStatus.UNPROCESSABLE_ENTITY,
};

export interface ErrorBody {
  statusCode: number;
  code: ErrorCode | 'HttpError' | 'InternalError';
  message: string | string[];
}

/** Turns every failure into `{ statusCode, code, message }` with a message fit for end users. */
@Catch()
export class AppExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(AppExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const res = host.switchToHttp().getResponse<Response>();
    const body = this.toBody(exception);

    if (res.headersSent) {
      // A streamed reply already started; all that is left is to close it.
      this.logger.error(`Failure after response started: ${body.code}`);
      res.end();
      return;
    }
    res.status(body.statusCode).json(body);
  }

  toBody(exception: unknown): ErrorBody {
    if (exception instanceof AppError) {
      this.logger.warn(`${exception.name} ${exception.code}: ${exception.message}`);
      const code: ErrorCode = exception.code;
      return { statusCode: STATUS_BY_CODE[code], code, message: userMessageFor(exception) };
    }
    if (exception instanceof PayloadTooLargeException) {
      // Raised by multer when an upload passes the configured file size limit.
      return { statusCode: HttpStatus.PAYLOAD_TOO_LARGE, code: 'UploadRejected', message: USER_MESSAGES.UploadRejected };
    }
    if (exception instanceof HttpException) {
      const response = exception.getResponse();
      const message =
        typeof response === 'object' && 'message' in response && (typeof response.message === 'string' || Array.isArray(response.message))
          ? response.message
          : exception.message;
      return { statusCode: exception.getStatus(), code: 'HttpError', message };
    }
    this.logger.error(
      `Unhandled ${exception instanceof Error ? exception.name : typeof exception}`,
      exception instanceof Error ? exception.stack : String(exception),
    );
    return { statusCode: HttpStatus.INTERNAL_SERVER_ERROR, code: 'InternalError', message: GENERIC_ERROR_MESSAGE };
  }
}
