import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode } from '@contactbook/shared';
import { AuthError, type AuthErrorKind, type AuthService, type PublicUser } from '@contactbook/domain';
import {
  LoginRequestSchema,
  PasswordResetRequestSchema,
  PasswordResetSchema,
  RegisterRequestSchema,
  VerifyEmailQuerySchema,
  type TokenResponse,
  type UserResponse,
} from '@contactbook/proto';
import { currentUser, type AuthGuard } from '../plugins/auth';
import { type RateLimiter } from '../plugins/rate-limit';
import { parseOrThrow } from './validation';

interface UserRouteDeps {
  authService: AuthService;
  authenticate: AuthGuard;
  authenticateAdmin: AuthGuard;
  registerRateLimit: RateLimiter;
  loginRateLimit: RateLimiter;
  meRateLimit: RateLimiter;
  passwordResetRateLimit: RateLimiter;
}

const AUTH_ERROR_CODES: Record<AuthErrorKind, ErrorCode> = {
  UNAUTHORIZED: ErrorCode.UNAUTHORIZED,
  FORBIDDEN: ErrorCode.FORBIDDEN,
  CONFLICT: ErrorCode.CONFLICT,
  INVALID_TOKEN: ErrorCode.INVALID_TOKEN,
  VALIDATION: ErrorCode.VALIDATION,
  NOT_FOUND: ErrorCode.NOT_FOUND,
};

function mapAuthError(err: unknown): never {
  if (err instanceof AuthError) {
    throw new AppError(AUTH_ERROR_CODES[err.kind], err.message);
  }
  throw err;
}

export function toUserResponse(user: PublicUser): UserResponse {
  return {
    id: user.id,
    email: user.email,
    role: user.role,
    is_verified: user.isVerified,
    avatar_url: user.avatarUrl,
    created_at: user.createdAt.toISOString(),
  };
}

function avatarContentType(header: string | undefined): string {
  return (header ?? '').split(';')[0]?.trim().toLowerCase() ?? '';
}

export function registerUserRoutes(app: FastifyInstance, deps: UserRouteDeps): void {
  const { authService, authenticate, authenticateAdmin } = deps;

  app.post('/users/register', { preHandler: [deps.registerRateLimit] }, async (request, reply) => {
    const input = parseOrThrow(RegisterRequestSchema, request.body, 'Invalid registration data');
    try {
      const user = await authService.register(input);
      return reply.status(201).send(toUserResponse(user));
    } catch (err) {
      return mapAuthError(err);
    }
  });

  app.get('/users/verify', async (request, reply) => {
    const { token } = parseOrThrow(VerifyEmailQuerySchema, request.query, 'Token is required');
    try {
      await authService.verifyEmail(token);
      return reply.status(200).send({ message: 'Email verified successfully!' });
    } catch (err) {
      return mapAuthError(err);
    }
  });

  app.post('/users/login', { preHandler: [deps.loginRateLimit] }, async (request, reply) => {
    const input = parseOrThrow(LoginRequestSchema, request.body, 'Invalid login data');
    try {
      const result = await authService.login(input);
      const body: TokenResponse = { access_token: result.accessToken, token_type: result.tokenType };
      return reply.status(200).send(body);
    } catch (err) {
      return mapAuthError(err);
    }
  });

  app.get('/users/me', { preHandler: [deps.meRateLimit, authenticate] }, async (request, reply) => {
    return reply.status(200).send(toUserResponse(currentUser(request)));
  });

  app.post('/users/avatar', { preHandler: [authenticate] }, async (request, reply) => {
    const user = currentUser(request);
    if (!Buffer.isBuffer(request.body) || request.body.byteLength === 0) {
      throw new AppError(ErrorCode.VALIDATION, 'Avatar image body is required');
    }

    try {
      const updated = await authService.updateAvatar(user.id, {
        body: request.body,
        contentType: avatarContentType(request.headers['content-type']),
      });
      return reply.status(200).send(toUserResponse(updated));
    } catch (err) {
      return mapAuthError(err);
    }
  });

  app.post(
    '/users/password-reset-request',
    { preHandler: [deps.passwordResetRateLimit] },
    async (request, reply) => {
      const { email } = parseOrThrow(PasswordResetRequestSchema, request.body, 'Invalid email');
      const result = await authService.requestPasswordReset(email);
      return reply.status(200).send(result);
    },
  );

  app.post('/users/reset-password', async (request, reply) => {
    const input = parseOrThrow(PasswordResetSchema, request.body, 'Invalid password reset data');
    try {
      await authService.resetPassword(input.token, input.new_password);
      return reply.status(200).send({ message: 'Password has been reset successfully' });
    } catch (err) {
      return mapAuthError(err);
    }
  });

  app.get('/users', { preHandler: [authenticateAdmin] }, async (_request, reply) => {
    const users = await authService.listUsers();
    return reply.status(200).send(users.map(toUserResponse));
  });
}
