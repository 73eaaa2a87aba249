import { type User, type UserRole, type UserSnapshot } from './user';
import { type Contact, type ContactInput } from './contact';
import { type Result } from './result';

export type WithTransaction = <T>(fn: (tx: unknown) => Promise<T>) => Promise<T>;

export interface UserRepository {
  /** Returns null when the email is already registered. */
  create(
    tx: unknown,
    user: { email: string; passwordHash: string; role: UserRole },
  ): Promise<User | null>;
  findByEmail(tx: unknown, email: string): Promise<User | null>;
  findById(tx: unknown, id: string): Promise<User | null>;
  list(tx: unknown): Promise<User[]>;
  markVerified(tx: unknown, id: string): Promise<void>;
  updatePasswordHash(tx: unknown, id: string, passwordHash: string): Promise<void>;
  /**
   * Sets the avatar only while the user has none or is an ADMIN, in a single
   * conditional write. Null when the user is missing or the rule refuses.
   */
  updateAvatar(tx: unknown, id: string, avatarUrl: string): Promise<User | null>;
}

export interface ContactRepository {
  create(tx: unknown, userId: string, contact: ContactInput): Promise<Contact>;
  findById(tx: unknown, userId: string, id: string): Promise<Contact | null>;
  listByUser(tx: unknown, userId: string): Promise<Contact[]>;
  search(tx: unknown, userId: string, query: string): Promise<Contact[]>;
  update(tx: unknown, userId: string, id: string, contact: ContactInput): Promise<Contact | null>;
  delete(tx: unknown, userId: string, id: string): Promise<boolean>;
}

export interface CredentialHasher {
  hash(password: string): Promise<string>;
  /** Resolves false for a wrong password and for a digest it cannot parse. */
  verify(password: string, hash: string): Promise<boolean>;
}

export type TokenPurpose = 'access' | 'password_reset' | 'email_verification';

export type TokenFailure = 'INVALID_TOKEN' | 'WRONG_PURPOSE' | 'MISSING_SUBJECT';

export interface TokenService {
  issue(subject: string, purpose: TokenPurpose, ttlSeconds?: number): Promise<string>;
  validate(token: string, expectedPurpose: TokenPurpose): Promise<Result<string, TokenFailure>>;
}

export interface UserCache {
  get(email: string): Promise<UserSnapshot | null>;
  put(email: string, snapshot: UserSnapshot, ttlSeconds?: number): Promise<void>;
  invalidate(email: string): Promise<void>;
}

export type MailTemplate = 'verify-email' | 'password-reset';

export interface MailMessage {
  to: string;
  template: MailTemplate;
  token: string;
}

export interface Mailer {
  send(message: MailMessage): Promise<void>;
}

export interface AvatarStorage {
  /** Stores the object and returns its public URL. */
  putObject(key: string, body: Uint8Array, contentType: string): Promise<string>;
}
