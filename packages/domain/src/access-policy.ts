import { type PublicUser, type UserRole } from './user';
import { type Result, ok, err } from './result';

/**
 * Role gate applied after the session resolver. Built once from a fixed
 * role set and shared by every route that needs it.
 */
export class AccessPolicy {
  private readonly allowed: ReadonlySet<UserRole>;

  constructor(roles: Iterable<UserRole>) {
    this.allowed = new Set(roles);
    if (this.allowed.size === 0) {
      throw new Error('AccessPolicy requires at least one role');
    }
  }

  permits(role: UserRole): boolean {
    return this.allowed.has(role);
  }

  check(user: PublicUser): Result<PublicUser, 'FORBIDDEN'> {
    return this.permits(user.role) ? ok(user) : err('FORBIDDEN');
  }
}

export const ANY_ROLE = new AccessPolicy(['USER', 'ADMIN']);
export const ADMIN_ONLY = new AccessPolicy(['ADMIN']);

/** The first avatar is free; replacing one is reserved for admins. */
export function canChangeAvatar(user: { role: UserRole; avatarUrl: string | null }): boolean {
  return user.avatarUrl === null || user.role === 'ADMIN';
}
