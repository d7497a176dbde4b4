import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { DomainError } from './errors';

/** Same wording as NestJS's built-in HttpExceptions */
const STATUS_TEXT: Partial<Record<number, string>> = {
  [HttpStatus.BAD_REQUEST]: 'Bad Request',
  [HttpStatus.NOT_FOUND]: 'Not Found',
};

export interface ErrorResponseBody {
  statusCode: number;
  error: string;
  message: string;
  code: string;
}

/**
 * Maps domain errors to JSON responses.
 * HttpExceptions and unknown errors keep NestJS's default handling.
 */
@Catch(DomainError)
export class DomainExceptionFilter implements ExceptionFilter<DomainError> {
  private readonly logger = new Logger(DomainExceptionFilter.name);

  catch(exception: DomainError, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();

    this.logger.warn(`${exception.name} [${exception.code}]: ${exception.message}`);

    const body: ErrorResponseBody = {
      statusCode: exception.statusCode,
      error: STATUS_TEXT[exception.statusCode] ?? 'Error',
      message: exception.message,
      code: exception.code,
    };

    response.status(exception.statusCode).json(body);
  }
}
