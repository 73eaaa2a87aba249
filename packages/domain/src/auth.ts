import { type PublicUser, type User, type UserSnapshot } from './user';

export const AVATAR_CONTENT_TYPES: Record<string, string> = {
  'image/png': 'png',
  'image/jpeg': 'jpg',
  'image/gif': 'gif',
  'image/webp': 'webp',
};

export const PASSWORD_RESET_MESSAGE =
  'If your email exists in our system, you will receive a password reset link';

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    email: user.email,
    isVerified: user.isVerified,
    role: user.role,
    avatarUrl: user.avatarUrl,
    createdAt: user.createdAt,
  };
}

export function toSnapshot(user: PublicUser): UserSnapshot {
  return {
    id: user.id,
    email: user.email,
    isVerified: user.isVerified,
    role: user.role,
    avatarUrl: user.avatarUrl,
    createdAt: user.createdAt.toISOString(),
  };
}

export function fromSnapshot(snapshot: UserSnapshot): PublicUser {
  return {
    id: snapshot.id,
    email: snapshot.email,
    isVerified: snapshot.isVerified,
    role: snapshot.role,
    avatarUrl: snapshot.avatarUrl,
    createdAt: new Date(snapshot.createdAt),
  };
}

/**
 * Object key for one avatar upload. Every upload gets its own key, so an
 * upload whose database write is refused never replaces the stored image.
 */
export function avatarObjectKey(
  userId: string,
  contentType: string,
  uploadId: string,
): string | null {
  const ext = AVATAR_CONTENT_TYPES[contentType];
  if (!ext) return null;
  return `avatars/user_${userId}_${uploadId}.${ext}`;
}
