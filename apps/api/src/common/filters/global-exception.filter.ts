import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import type { ApiError } from '@tabaudit/shared';
import { AuditConfigurationError, AuditResourceError } from '../errors/audit-errors';

export interface ExceptionBody {
  status: number;
  code: string;
  message: string;
  details?: unknown;
}

function readString(record: object, key: string): string | undefined {
  const value: unknown = Reflect.get(record, key);
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return value.map(String).join('; ');
  return undefined;
}

export function describeException(exception: unknown): ExceptionBody {
  if (exception instanceof HttpException) {
    const response = exception.getResponse();
    const body: ExceptionBody = {
      status: exception.getStatus(),
      code: 'HTTP_ERROR',
      message: exception.message,
    };
    if (typeof response === 'string') {
      body.message = response;
    } else if (typeof response === 'object' && response !== null) {
      body.message = readString(response, 'message') ?? body.message;
      body.code = readString(response, 'error') ?? body.code;
      const details: unknown = Reflect.get(response, 'details');
      if (details !== undefined) body.details = details;
    }
    return body;
  }
  if (exception instanceof ZodError) {
    return {
      status: HttpStatus.UNPROCESSABLE_ENTITY,
      code: 'VALIDATION_ERROR',
      message: 'Request validation failed',
      details: exception.issues.map((i) => ({
        path: i.path.join('.'),
        message: i.message,
      })),
    };
  }
  if (exception instanceof AuditConfigurationError) {
    return { status: HttpStatus.BAD_REQUEST, code: exception.code, message: exception.message };
  }
  if (exception instanceof AuditResourceError) {
    return { status: HttpStatus.UNPROCESSABLE_ENTITY, code: exception.code, message: exception.message };
  }
  return {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    code: 'INTERNAL_ERROR',
    message: exception instanceof Error ? exception.message : 'An unexpected error occurred',
  };
}

export function errorResponse({ code, message, details }: ExceptionBody): ApiError {
  return { success: false, error: details === undefined ? { code, message } : { code, message, details } };
}

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const reply = host.switchToHttp().getResponse<FastifyReply>();
    const body = describeException(exception);
    const { status, code, message } = body;

    if (status >= 500) {
      this.logger.error(
        `[${code}] ${message}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    }

    reply.status(status).send(errorResponse(body));
  }
}
