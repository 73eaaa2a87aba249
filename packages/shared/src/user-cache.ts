import type Redis from 'ioredis';
import { z } from 'zod';
import { type UserCache, type UserSnapshot } from '@contactbook/domain';

export const USER_CACHE_PREFIX = 'user_cache:';
export const DEFAULT_USER_CACHE_TTL = 3600;

const UserSnapshotSchema = z.object({
  id: z.string(),
  email: z.string(),
  isVerified: z.boolean(),
  role: z.enum(['USER', 'ADMIN']),
  avatarUrl: z.string().nullable(),
  createdAt: z.string(),
});

export function parseSnapshot(raw: string): UserSnapshot | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = UserSnapshotSchema.safeParse(data);
  return parsed.success ? parsed.data : null;
}

export class RedisUserCache implements UserCache {
  constructor(
    private readonly redis: Redis,
    private readonly defaultTtlSeconds = DEFAULT_USER_CACHE_TTL,
  ) {}

  async get(email: string): Promise<UserSnapshot | null> {
    const raw = await this.redis.get(USER_CACHE_PREFIX + email);
    if (!raw) return null;
    return parseSnapshot(raw);
  }

  async put(email: string, snapshot: UserSnapshot, ttlSeconds?: number): Promise<void> {
    await this.redis.set(
      USER_CACHE_PREFIX + email,
      JSON.stringify(snapshot),
      'EX',
      ttlSeconds ?? this.defaultTtlSeconds,
    );
  }

  async invalidate(email: string): Promise<void> {
    await this.redis.del(USER_CACHE_PREFIX + email);
  }
}

export class InMemoryUserCache implements UserCache {
  private readonly data = new Map<string, { raw: string; expiresAt: number }>();

  constructor(
    private readonly defaultTtlSeconds = DEFAULT_USER_CACHE_TTL,
    private readonly now: () => number = Date.now,
  ) {}

  async get(email: string): Promise<UserSnapshot | null> {
    const key = USER_CACHE_PREFIX + email;
    const entry = this.data.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.data.delete(key);
      return null;
    }
    return parseSnapshot(entry.raw);
  }

  async put(email: string, snapshot: UserSnapshot, ttlSeconds?: number): Promise<void> {
    this.data.set(USER_CACHE_PREFIX + email, {
      raw: JSON.stringify(snapshot),
      expiresAt: this.now() + (ttlSeconds ?? this.defaultTtlSeconds) * 1000,
    });
  }

  async invalidate(email: string): Promise<void> {
    this.data.delete(USER_CACHE_PREFIX + email);
  }
}
