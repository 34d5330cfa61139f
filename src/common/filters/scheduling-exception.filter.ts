import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { FastifyReply } from 'fastify';
import {
  SchedulingError,
  type SchedulingErrorKind,
} from '../errors/scheduling.errors.js';

export const STATUS_BY_KIND: Readonly<Record<SchedulingErrorKind, HttpStatus>> =
  {
    not_found: HttpStatus.NOT_FOUND,
    unauthorized: HttpStatus.FORBIDDEN,
    validation_failed: HttpStatus.BAD_REQUEST,
    slot_unavailable: HttpStatus.BAD_REQUEST,
    state_conflict: HttpStatus.CONFLICT,
    persistence_error: HttpStatus.SERVICE_UNAVAILABLE,
  };

@Catch(SchedulingError)
export class SchedulingExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(SchedulingExceptionFilter.name);

  catch(exception: SchedulingError, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<FastifyReply>();
    const status = STATUS_BY_KIND[exception.kind];

    if (exception.kind === 'persistence_error') {
      this.logger.error(exception.message, exception.cause);
    }

    void response.status(status).send({
      statusCode: status,
      error: exception.kind,
      code: exception.code,
      message: exception.message,
    });
  }
}
