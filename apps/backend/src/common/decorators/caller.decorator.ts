import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { CallContext } from '@credentia/core';
import type { AuthenticatedRequest } from '../guards/api-key.guard';

/**
 * Registry call context for an authenticated request: the account's
 * identity is the caller.
 */
export function toCallContext(request: AuthenticatedRequest): CallContext {
  return {
    caller: request.account.identity,
    requestId: request.requestId,
  };
}

/**
 * Injects the CallContext of the request. Only valid behind ApiKeyGuard.
 */
export const Caller = createParamDecorator(
  (_data: unknown, context: ExecutionContext): CallContext =>
    toCallContext(context.switchToHttp().getRequest<AuthenticatedRequest>()),
);
