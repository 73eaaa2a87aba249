import { vi } from 'vitest';
import { type FastifyInstance } from 'fastify';
import { Argon2CredentialHasher, InMemoryUserCache, JoseTokenService } from '@contactbook/shared';
import {
  AuthService,
  ContactService,
  SessionResolver,
  type AvatarStorage,
  type MailMessage,
  type Mailer,
} from '@contactbook/domain';
import { InMemoryContactRepository, InMemoryUserRepository, runInMemory } from '@contactbook/db';
import { buildServer } from '../server';
import { type RateLimitSettings } from '../plugins/rate-limit';

export const TEST_SECRET = 'test-secret-'.padEnd(40, 'x');
export const PASSWORD = 'password123';

export class CapturingMailer implements Mailer {
  readonly sent: MailMessage[] = [];

  async send(message: MailMessage): Promise<void> {
    this.sent.push(message);
  }

  lastTokenFor(to: string, template: MailMessage['template']): string {
    const message = [...this.sent].reverse().find((m) => m.to === to && m.template === template);
    if (!message) throw new Error(`No ${template} mail sent to ${to}`);
    return message.token;
  }
}

const GENEROUS_LIMITS: RateLimitSettings = {
  auth: { windowMs: 60_000, maxRequests: 1000 },
  me: { windowMs: 60_000, maxRequests: 1000 },
  passwordReset: { windowMs: 60_000, maxRequests: 1000 },
};

export interface TestApp {
  app: FastifyInstance;
  userRepo: InMemoryUserRepository;
  contactRepo: InMemoryContactRepository;
  userCache: InMemoryUserCache;
  tokenService: JoseTokenService;
  mailer: CapturingMailer;
  avatarStorage: AvatarStorage;
}

export function createTestApp(
  opts: { rateLimits?: Partial<RateLimitSettings>; today?: Date } = {},
): TestApp {
  const userRepo = new InMemoryUserRepository();
  const contactRepo = new InMemoryContactRepository();
  const userCache = new InMemoryUserCache();
  const tokenService = new JoseTokenService({ secret: TEST_SECRET });
  const mailer = new CapturingMailer();
  const avatarStorage: AvatarStorage = {
    putObject: vi.fn(async (key: string) => `http://storage.test/avatars/${key}`),
  };
  const today = opts.today;
  let uploads = 0;

  const app = buildServer(
    {
      authService: new AuthService({
        userRepo,
        passwordHasher: new Argon2CredentialHasher(),
        tokenService,
        userCache,
        mailer,
        avatarStorage,
        withTransaction: runInMemory,
        generateUuid: () => `upload-${++uploads}`,
      }),
      contactService: new ContactService({
        contactRepo,
        withTransaction: runInMemory,
        now: today ? () => today : undefined,
      }),
      sessionResolver: new SessionResolver({
        tokenService,
        userCache,
        userRepo,
        withTransaction: runInMemory,
      }),
    },
    {
      corsOrigin: '*',
      avatarMaxBytes: 1024,
      rateLimits: opts.rateLimits ?? GENEROUS_LIMITS,
    },
  );

  return { app, userRepo, contactRepo, userCache, tokenService, mailer, avatarStorage };
}

/** Registers, verifies and logs in; returns the access token. */
export async function signUp(ctx: TestApp, email: string, password = PASSWORD): Promise<string> {
  const registered = await ctx.app.inject({
    method: 'POST',
    url: '/users/register',
    payload: { email, password },
  });
  if (registered.statusCode !== 201) throw new Error(`register failed: ${registered.body}`);

  const token = ctx.mailer.lastTokenFor(email, 'verify-email');
  await ctx.app.inject({ method: 'GET', url: `/users/verify?token=${encodeURIComponent(token)}` });

  const login = await ctx.app.inject({
    method: 'POST',
    url: '/users/login',
    payload: { email, password },
  });
  const body: unknown = login.json();
  if (
    typeof body !== 'object' ||
    body === null ||
    !('access_token' in body) ||
    typeof body.access_token !== 'string'
  ) {
    throw new Error(`login failed: ${login.body}`);
  }
  return body.access_token;
}

export function bearer(token: string): { authorization: string } {
  return { authorization: `Bearer ${token}` };
}
