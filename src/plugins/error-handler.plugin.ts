// ============================================
// VOTESHIELD - Error Handler Plugin
// ============================================

import { FastifyPluginAsync, FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';

// Custom error classes
export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code: string = 'INTERNAL_ERROR'
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    super(
      id ? `${resource} with ID '${id}' not found` : `${resource} not found`,
      404,
      'NOT_FOUND'
    );
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, public details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Unauthorized') {
    super(message, 401, 'UNAUTHORIZED');
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string = 'Forbidden') {
    super(message, 403, 'FORBIDDEN');
    this.name = 'ForbiddenError';
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message: string = 'Service temporarily unavailable, please retry', public cause?: unknown) {
    super(message, 503, 'SERVICE_UNAVAILABLE');
    this.name = 'ServiceUnavailableError';
  }
}

// ============================================
// Voting errors
// ============================================

export class PollNotFoundError extends AppError {
  constructor(pollId: string) {
    super(`Poll with ID '${pollId}' not found`, 404, 'POLL_NOT_FOUND');
    this.name = 'PollNotFoundError';
  }
}

export class InvalidPollError extends AppError {
  constructor(message: string) {
    super(message, 400, 'INVALID_POLL');
    this.name = 'InvalidPollError';
  }
}

export class InvalidVoteError extends AppError {
  constructor(message: string) {
    super(message, 400, 'INVALID_VOTE');
    this.name = 'InvalidVoteError';
  }
}

export class PollClosedError extends AppError {
  constructor(message: string = 'This poll is closed') {
    super(message, 400, 'POLL_CLOSED');
    this.name = 'PollClosedError';
  }
}

export class DuplicateVoteError extends AppError {
  constructor(message: string = 'You have already voted on this poll') {
    super(message, 409, 'DUPLICATE_VOTE');
    this.name = 'DuplicateVoteError';
  }
}

export class RateLimitError extends AppError {
  constructor(public retryAfterSeconds: number) {
    super(`Too many vote attempts. Try again in ${retryAfterSeconds} seconds.`, 429, 'RATE_LIMITED');
    this.name = 'RateLimitError';
  }
}

export class FraudDetectedError extends AppError {
  constructor(message: string = 'Vote blocked due to suspicious activity', public reasons: string[] = []) {
    super(message, 403, 'FRAUD_DETECTED');
    this.name = 'FraudDetectedError';
  }
}

export class FingerprintValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'FINGERPRINT_INVALID');
    this.name = 'FingerprintValidationError';
  }
}

interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

export const errorHandlerPlugin: FastifyPluginAsync = async (fastify) => {
  // Global error handler
  fastify.setErrorHandler((error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply) => {
    const response: ErrorResponse = {
      error: {
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
      },
    };

    let statusCode = 500;

    // Handle Zod validation errors
    if (error instanceof ZodError) {
      statusCode = 400;
      response.error.code = 'VALIDATION_ERROR';
      response.error.message = 'Validation failed';
      response.error.details = error.issues.map((e) => ({
        path: e.path.join('.'),
        message: e.message,
      }));
    }
    // Handle our custom errors
    else if (error instanceof AppError) {
      statusCode = error.statusCode;
      response.error.code = error.code;
      response.error.message = error.message;
      if (error instanceof ValidationError && error.details) {
        response.error.details = error.details;
      }
      if (error instanceof FraudDetectedError && error.reasons.length > 0) {
        response.error.details = { reasons: error.reasons };
      }
    }
    // Handle Fastify validation errors
    else if ('validation' in error && error.validation) {
      statusCode = 400;
      response.error.code = 'VALIDATION_ERROR';
      response.error.message = 'Request validation failed';
      response.error.details = error.validation;
    }
    // Fastify's own client errors (malformed JSON, oversized body)
    else if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
      statusCode = error.statusCode;
      response.error.code = 'BAD_REQUEST';
      response.error.message = error.message;
    }

    if (statusCode >= 500) {
      request.log.error({
        err: error,
        request: {
          method: request.method,
          url: request.url,
          params: request.params,
        },
      }, 'Request failed');
    } else {
      request.log.info({ code: response.error.code, url: request.url }, 'Request rejected');
    }

    reply.status(statusCode).send(response);
  });

  // 404 handler
  fastify.setNotFoundHandler((request, reply) => {
    reply.status(404).send({
      error: {
        code: 'NOT_FOUND',
        message: `Route ${request.method} ${request.url} not found`,
      },
    });
  });
};
