import { type FastifyRequest } from 'fastify';
import { AppError, ErrorCode } from '@tasknest/shared';
import { AuthError, type User } from '@tasknest/domain';

declare module 'fastify' {
  interface FastifyRequest {
    user?: User;
  }
}

export interface IdentityResolver {
  resolveIdentity(token: string): Promise<User>;
}

const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i;

export function createAuthMiddleware(resolver: IdentityResolver) {
  return async function authenticate(request: FastifyRequest) {
    const match = BEARER_PATTERN.exec(request.headers.authorization ?? '');
    if (!match) {
      throw new AppError(ErrorCode.UNAUTHORIZED, 'Not authenticated');
    }

    try {
      request.user = await resolver.resolveIdentity(match[1]);
    } catch (err) {
      if (err instanceof AuthError) {
        throw new AppError(ErrorCode.UNAUTHORIZED, err.message);
      }
      throw err;
    }
  };
}

/** The user set by `authenticate`; only valid behind that pre-handler. */
export function currentUser(request: FastifyRequest): User {
  if (!request.user) {
    throw new AppError(ErrorCode.UNAUTHORIZED, 'Not authenticated');
  }
  return request.user;
}
