import { randomUUID } from 'node:crypto';
import { buildServer } from './server';
import {
  ApiConfigSchema,
  Argon2CredentialHasher,
  BackgroundMailer,
  JoseTokenService,
  LogMailer,
  RedisUserCache,
  S3AvatarStorage,
  closeRedis,
  createLogger,
  createRedis,
  loadConfig,
} from '@contactbook/shared';
import { AuthService, ContactService, SessionResolver } from '@contactbook/domain';
import {
  PgContactRepository,
  PgUserRepository,
  closePool,
  createPool,
  createTransactionRunner,
} from '@contactbook/db';

const logger = createLogger({ name: 'api' });

async function main() {
  const config = loadConfig(ApiConfigSchema);

  const pool = createPool({ connectionString: config.DATABASE_URL }, logger.child({ component: 'db' }));
  const redis = createRedis(config.REDIS_URL, logger.child({ component: 'redis' }));
  const withTransaction = createTransactionRunner(pool);

  const userRepo = new PgUserRepository();
  const userCache = new RedisUserCache(redis, config.USER_CACHE_TTL_SECONDS);
  const tokenService = new JoseTokenService({
    secret: config.JWT_SECRET,
    issuer: config.JWT_ISSUER,
    ttlSeconds: {
      access: config.ACCESS_TOKEN_TTL_SECONDS,
      password_reset: config.PASSWORD_RESET_TOKEN_TTL_SECONDS,
      email_verification: config.EMAIL_VERIFICATION_TOKEN_TTL_SECONDS,
    },
  });

  const avatarStorage = new S3AvatarStorage({
    endpoint: config.S3_ENDPOINT,
    publicEndpoint: config.S3_PUBLIC_ENDPOINT,
    accessKey: config.S3_ACCESS_KEY,
    secretKey: config.S3_SECRET_KEY,
    bucket: config.S3_BUCKET,
    region: config.S3_REGION,
  });
  await avatarStorage.ensureBucket();

  const mailerLogger = logger.child({ component: 'mailer' });
  const logMailer = new LogMailer(
    { apiBaseUrl: config.APP_BASE_URL, frontendBaseUrl: config.APP_FRONTEND_URL },
    mailerLogger,
  );
  const mailer = new BackgroundMailer(logMailer, mailerLogger);

  const app = buildServer(
    {
      authService: new AuthService({
        userRepo,
        passwordHasher: new Argon2CredentialHasher(),
        tokenService,
        userCache,
        mailer,
        avatarStorage,
        withTransaction,
        generateUuid: () => randomUUID(),
      }),
      contactService: new ContactService({ contactRepo: new PgContactRepository(), withTransaction }),
      sessionResolver: new SessionResolver({
        tokenService,
        userCache,
        userRepo,
        withTransaction,
        cacheTtlSeconds: config.USER_CACHE_TTL_SECONDS,
      }),
    },
    { corsOrigin: config.CORS_ORIGIN, avatarMaxBytes: config.AVATAR_MAX_BYTES },
  );

  await app.listen({ host: config.API_HOST, port: config.API_PORT });
  logger.info({ port: config.API_PORT }, 'API server started');

  const shutdown = async () => {
    logger.info({}, 'Shutting down API server');
    await app.close();
    avatarStorage.destroy();
    await closeRedis(redis, logger);
    await closePool(pool, logger);
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err: unknown) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start API');
  process.exit(1);
});
