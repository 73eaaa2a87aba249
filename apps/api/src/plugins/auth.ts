import { type FastifyRequest } from 'fastify';
import { AppError, ErrorCode } from '@contactbook/shared';
import { ANY_ROLE, type AccessPolicy, type PublicUser, type SessionResolver } from '@contactbook/domain';

declare module 'fastify' {
  interface FastifyRequest {
    authUser?: PublicUser;
  }
}

/** Token from an `Authorization: Bearer <token>` header; the scheme is case-insensitive. */
function bearerToken(header: string | undefined): string | null {
  const match = header?.match(/^bearer +(\S+)\s*$/i);
  return match?.[1] ?? null;
}

/**
 * preHandler that resolves the bearer token to a user and then applies the
 * role policy. Token and lookup failures are 401, role failures 403.
 */
export function createAuthGuard(resolver: SessionResolver, policy: AccessPolicy = ANY_ROLE) {
  return async function authenticate(request: FastifyRequest) {
    const token = bearerToken(request.headers.authorization);
    if (!token) {
      throw new AppError(ErrorCode.UNAUTHORIZED, 'Not authenticated');
    }

    const resolved = await resolver.resolve(token);
    if (!resolved.ok) {
      throw new AppError(ErrorCode.UNAUTHORIZED, 'Could not validate credentials');
    }

    const permitted = policy.check(resolved.value);
    if (!permitted.ok) {
      throw new AppError(ErrorCode.FORBIDDEN, 'Insufficient permissions');
    }

    request.authUser = permitted.value;
  };
}

export type AuthGuard = ReturnType<typeof createAuthGuard>;

export function currentUser(request: FastifyRequest): PublicUser {
  if (!request.authUser) {
    throw new AppError(ErrorCode.UNAUTHORIZED, 'Not authenticated');
  }
  return request.authUser;
}
