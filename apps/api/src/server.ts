import Fastify, { type FastifyInstance } from 'fastify';
import { createLogger } from '@contactbook/shared';
import {
  ADMIN_ONLY,
  type AuthService,
  type ContactService,
  type SessionResolver,
} from '@contactbook/domain';
import { registerErrorHandler } from './plugins/error-handler';
import { createAuthGuard } from './plugins/auth';
import { createRateLimiter, DEFAULT_RATE_LIMITS, type RateLimitSettings } from './plugins/rate-limit';
import { registerUserRoutes } from './routes/users';
import { registerContactRoutes } from './routes/contacts';

const logger = createLogger({ name: 'api' });

export interface ApiServices {
  authService: AuthService;
  contactService: ContactService;
  sessionResolver: SessionResolver;
}

export interface ServerConfig {
  corsOrigin: string;
  avatarMaxBytes: number;
  rateLimits?: Partial<RateLimitSettings>;
}

export function buildServer(services: ApiServices, config: ServerConfig): FastifyInstance {
  const app = Fastify({
    logger: false,
    bodyLimit: 1_048_576,
  });

  registerErrorHandler(app);

  // Avatars arrive as the raw image body.
  app.addContentTypeParser(
    /^image\//,
    { parseAs: 'buffer', bodyLimit: config.avatarMaxBytes },
    (_request, body, done) => {
      done(null, body);
    },
  );

  app.addHook('onRequest', async (request, reply) => {
    reply.header('Access-Control-Allow-Origin', config.corsOrigin);
    logger.info({ method: request.method, url: request.url, requestId: request.id }, 'Incoming request');
  });

  app.addHook('onResponse', async (request, reply) => {
    logger.info(
      { method: request.method, url: request.url, statusCode: reply.statusCode, requestId: request.id },
      'Request completed',
    );
  });

  app.options('*', async (_request, reply) => {
    return reply
      .status(204)
      .header('Access-Control-Allow-Methods', 'GET, POST, PUT, DELETE, OPTIONS')
      .header('Access-Control-Allow-Headers', 'Authorization, Content-Type')
      .send();
  });

  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  const limits: RateLimitSettings = { ...DEFAULT_RATE_LIMITS, ...config.rateLimits };

  registerUserRoutes(app, {
    authService: services.authService,
    authenticate: createAuthGuard(services.sessionResolver),
    authenticateAdmin: createAuthGuard(services.sessionResolver, ADMIN_ONLY),
    registerRateLimit: createRateLimiter({ name: 'register', ...limits.auth }),
    loginRateLimit: createRateLimiter({ name: 'login', ...limits.auth }),
    meRateLimit: createRateLimiter({ name: 'me', ...limits.me }),
    passwordResetRateLimit: createRateLimiter({ name: 'password-reset', ...limits.passwordReset }),
  });

  registerContactRoutes(app, {
    contactService: services.contactService,
    authenticate: createAuthGuard(services.sessionResolver),
  });

  return app;
}
