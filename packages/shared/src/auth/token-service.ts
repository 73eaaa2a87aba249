import { SignJWT, jwtVerify, errors, type JWTPayload } from 'jose';
import {
  type Result,
  type TokenFailure,
  type TokenPurpose,
  type TokenService,
  ok,
  err,
} from '@contactbook/domain';

export const DEFAULT_TOKEN_TTLS: Record<TokenPurpose, number> = {
  access: 30 * 60,
  password_reset: 60 * 60,
  email_verification: 24 * 60 * 60,
};

export interface TokenServiceConfig {
  secret: string;
  issuer?: string;
  ttlSeconds?: Partial<Record<TokenPurpose, number>>;
  now?: () => Date;
}

/**
 * HS256 tokens carrying `sub` (email) and a `type` claim naming what the token
 * may be used for. Tokens are stateless; expiry is the only way they end.
 */
export class JoseTokenService implements TokenService {
  private readonly secret: Uint8Array;
  private readonly issuer: string;
  private readonly ttls: Record<TokenPurpose, number>;
  private readonly now: () => Date;

  constructor(config: TokenServiceConfig) {
    if (config.secret.length < 32) {
      throw new Error('JWT secret must be at least 32 characters');
    }
    this.secret = new TextEncoder().encode(config.secret);
    this.issuer = config.issuer ?? 'contactbook';
    this.ttls = { ...DEFAULT_TOKEN_TTLS, ...config.ttlSeconds };
    this.now = config.now ?? (() => new Date());
  }

  async issue(subject: string, purpose: TokenPurpose, ttlSeconds?: number): Promise<string> {
    const issuedAt = Math.floor(this.now().getTime() / 1000);
    return new SignJWT({ type: purpose })
      .setProtectedHeader({ alg: 'HS256', typ: 'JWT' })
      .setSubject(subject)
      .setIssuer(this.issuer)
      .setIssuedAt(issuedAt)
      .setExpirationTime(issuedAt + (ttlSeconds ?? this.ttls[purpose]))
      .sign(this.secret);
  }

  async validate(token: string, expectedPurpose: TokenPurpose): Promise<Result<string, TokenFailure>> {
    let payload: JWTPayload;
    try {
      const verified = await jwtVerify(token, this.secret, {
        issuer: this.issuer,
        algorithms: ['HS256'],
        currentDate: this.now(),
      });
      payload = verified.payload;
    } catch (e) {
      if (e instanceof errors.JOSEError) return err('INVALID_TOKEN');
      throw e;
    }

    // A missing type claim means access.
    const purpose = payload.type ?? 'access';
    if (purpose !== expectedPurpose) return err('WRONG_PURPOSE');

    if (typeof payload.sub !== 'string' || payload.sub.length === 0) {
      return err('MISSING_SUBJECT');
    }

    return ok(payload.sub);
  }
}
