import { ExceptionFilter, Catch, ArgumentsHost, HttpException, HttpStatus } from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { AppError, InternalError } from '../errors/error-types';
import { createLogger } from '../logging/logger';

const logger = createLogger('HttpExceptionFilter');

const GENERIC_DETAIL = 'An unexpected error occurred';

const TITLES_BY_CODE: Record<string, string> = {
  plugin_validation_error: 'Plugin Validation Error',
};

const TITLES_BY_STATUS: Record<number, string> = {
  400: 'Bad Request',
  401: 'Unauthorized',
  404: 'Not Found',
  408: 'Request Timeout',
  409: 'Conflict',
  422: 'Validation Error',
  500: 'Internal Server Error',
  502: 'Bad Gateway',
  503: 'Service Unavailable',
};

export interface ErrorEnvelope {
  error: string;
  detail: string | unknown[];
}

interface ResolvedError {
  status: number;
  code: string;
  envelope: ErrorEnvelope;
}

function titleFor(status: number, code?: string): string {
  return (code && TITLES_BY_CODE[code]) || TITLES_BY_STATUS[status] || 'Error';
}

/**
 * Maps any thrown value to the `{ error, detail }` envelope.
 * Faults that are not AppErrors never expose their message.
 */
export function resolveErrorEnvelope(exception: unknown): ResolvedError {
  if (exception instanceof AppError) {
    return {
      status: exception.statusCode,
      code: exception.code,
      envelope: {
        error: titleFor(exception.statusCode, exception.code),
        detail: exception.toEnvelopeDetail(),
      },
    };
  }

  if (exception instanceof ZodError) {
    return {
      status: HttpStatus.BAD_REQUEST,
      code: 'bad_request',
      envelope: {
        error: titleFor(HttpStatus.BAD_REQUEST),
        detail: exception.errors.map((e) => `${e.path.join('.') || '(body)'}: ${e.message}`).join(', '),
      },
    };
  }

  if (exception instanceof HttpException) {
    const status = exception.getStatus();
    const exceptionResponse = exception.getResponse();
    let detail: string = exception.message;
    if (typeof exceptionResponse === 'string') {
      detail = exceptionResponse;
    } else {
      const responseMessage = (exceptionResponse as { message?: unknown } | null | undefined)
        ?.message;
      if (typeof responseMessage === 'string') {
        detail = responseMessage;
      }
    }
    return {
      status,
      code: 'http_exception',
      envelope: { error: titleFor(status), detail },
    };
  }

  return {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    code: 'internal_error',
    envelope: { error: titleFor(HttpStatus.INTERNAL_SERVER_ERROR), detail: GENERIC_DETAIL },
  };
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<FastifyReply>();
    const request = ctx.getRequest<FastifyRequest>();

    const { status, code, envelope } = resolveErrorEnvelope(exception);

    const cause = exception instanceof InternalError ? exception.cause : exception;
    const isClientError = status >= 400 && status < 500;
    const logPayload = {
      requestId: request.id,
      method: request.method,
      url: request.url,
      statusCode: status,
      code,
      message: cause instanceof Error ? cause.message : String(cause),
      // Only include stack traces for server errors
      stack: !isClientError && cause instanceof Error ? cause.stack : undefined,
      ...(exception instanceof AppError && exception.details ? { details: exception.details } : {}),
    };

    if (status === 404) {
      logger.info(logPayload, 'Request not found');
    } else if (isClientError) {
      logger.warn(logPayload, 'Client error');
    } else {
      logger.error(logPayload, 'Request failed');
    }

    // Guard against double-send (can happen if response was partially sent)
    if (response.sent) {
      return;
    }

    response.code(status).send(envelope);
  }
}
