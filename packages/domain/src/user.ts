export type UserRole = 'USER' | 'ADMIN';

export const USER_ROLES: readonly UserRole[] = ['USER', 'ADMIN'];

export interface User {
  id: string;
  email: string;
  passwordHash: string;
  isVerified: boolean;
  role: UserRole;
  avatarUrl: string | null;
  createdAt: Date;
}

/** User as seen by request handlers: everything but the password hash. */
export interface PublicUser {
  id: string;
  email: string;
  isVerified: boolean;
  role: UserRole;
  avatarUrl: string | null;
  createdAt: Date;
}

/**
 * JSON-safe copy of a PublicUser held in the user cache.
 * May lag the directory by up to the cache TTL.
 */
export interface UserSnapshot {
  id: string;
  email: string;
  isVerified: boolean;
  role: UserRole;
  avatarUrl: string | null;
  createdAt: string;
}

export interface AvatarUpload {
  body: Uint8Array;
  contentType: string;
}
