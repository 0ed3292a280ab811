import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  GoneException,
  HttpException,
  NotFoundException,
} from '@nestjs/common';
import type { ErrorCode, OperationResult } from '@credentia/core';

/**
 * Extract error message and stack trace from an error object.
 * Handles Error instances, strings, and other types safely.
 */
export function extractErrorInfo(error: unknown): {
  message: string;
  stack: string | undefined;
} {
  if (error instanceof Error) {
    return {
      message: error.message,
      stack: error.stack,
    };
  }

  if (typeof error === 'string') {
    return {
      message: error,
      stack: undefined,
    };
  }

  return {
    message: JSON.stringify(error),
    stack: undefined,
  };
}

/**
 * Map a registry error code to its HTTP exception.
 */
export function toHttpException(code: ErrorCode, reason: string): HttpException {
  switch (code) {
    case 'Unauthorized':
      return new ForbiddenException(reason);
    case 'AlreadyExists':
      return new ConflictException(reason);
    case 'NotFound':
      return new NotFoundException(reason);
    case 'InvalidInput':
      return new BadRequestException(reason);
    case 'Expired':
      return new GoneException(reason);
  }
}

/**
 * Unwrap a registry result for a controller, throwing the mapped HTTP
 * exception on failure.
 */
export function unwrapResult<T>(result: OperationResult<T>): T {
  if (!result.ok) {
    throw toHttpException(result.code, result.reason);
  }
  return result.value;
}
