import { describe, it, expect, beforeEach } from 'vitest';
import { type UserSnapshot } from '@contactbook/domain';
import { InMemoryUserCache, parseSnapshot } from '../user-cache';

const snapshot: UserSnapshot = {
  id: '1',
  email: 'alice@example.com',
  isVerified: true,
  role: 'USER',
  avatarUrl: null,
  createdAt: '2026-01-01T00:00:00.000Z',
};

describe('InMemoryUserCache', () => {
  let clock: number;
  let cache: InMemoryUserCache;

  beforeEach(() => {
    clock = 1_000_000;
    cache = new InMemoryUserCache(3600, () => clock);
  });

  it('put + get returns the snapshot', async () => {
    await cache.put('alice@example.com', snapshot);
    expect(await cache.get('alice@example.com')).toEqual(snapshot);
  });

  it('returns null for an unknown key', async () => {
    expect(await cache.get('ghost@example.com')).toBeNull();
  });

  it('keys are case-sensitive', async () => {
    await cache.put('alice@example.com', snapshot);
    expect(await cache.get('Alice@example.com')).toBeNull();
  });

  it('expires after the default ttl', async () => {
    await cache.put('alice@example.com', snapshot);
    clock += 3599 * 1000;
    expect(await cache.get('alice@example.com')).toEqual(snapshot);
    clock += 1000;
    expect(await cache.get('alice@example.com')).toBeNull();
  });

  it('honours a per-entry ttl', async () => {
    await cache.put('alice@example.com', snapshot, 5);
    clock += 5000;
    expect(await cache.get('alice@example.com')).toBeNull();
  });

  it('overwrites unconditionally', async () => {
    await cache.put('alice@example.com', snapshot);
    await cache.put('alice@example.com', { ...snapshot, role: 'ADMIN' });
    expect((await cache.get('alice@example.com'))?.role).toBe('ADMIN');
  });

  it('invalidate removes the entry', async () => {
    await cache.put('alice@example.com', snapshot);
    await cache.invalidate('alice@example.com');
    expect(await cache.get('alice@example.com')).toBeNull();
  });

  it('invalidate on an absent key is a no-op', async () => {
    await expect(cache.invalidate('ghost@example.com')).resolves.toBeUndefined();
  });
});

describe('parseSnapshot', () => {
  it('reads a stored snapshot', () => {
    expect(parseSnapshot(JSON.stringify(snapshot))).toEqual(snapshot);
  });

  it('treats corrupt entries as absent', () => {
    expect(parseSnapshot('{not json')).toBeNull();
    expect(parseSnapshot(JSON.stringify({ ...snapshot, role: 'ROOT' }))).toBeNull();
    expect(parseSnapshot(JSON.stringify({ email: 'alice@example.com' }))).toBeNull();
  });
});
