export { createLogger, sanitize, type SafeLogger } from './logger';
export { AppError, ErrorCode } from './errors';
export {
  loadConfig,
  type BaseConfig,
  type ApiConfig,
  BaseConfigSchema,
  DatabaseConfigSchema,
  RedisConfigSchema,
  JwtConfigSchema,
  StorageConfigSchema,
  ApiConfigSchema,
} from './config';
export { Argon2CredentialHasher } from './auth/password-hasher';
export { JoseTokenService, DEFAULT_TOKEN_TTLS, type TokenServiceConfig } from './auth/token-service';
export { createRedis, closeRedis } from './redis';
export {
  RedisUserCache,
  InMemoryUserCache,
  USER_CACHE_PREFIX,
  DEFAULT_USER_CACHE_TTL,
  parseSnapshot,
} from './user-cache';
export { S3AvatarStorage, type S3AvatarStorageConfig } from './object-storage';
export { LogMailer, BackgroundMailer, buildMailLink, type MailLinkBases } from './mailer';
