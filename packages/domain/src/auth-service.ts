import { type AvatarUpload, type PublicUser } from './user';
import { PASSWORD_RESET_MESSAGE, avatarObjectKey, toPublicUser } from './auth';
import { canChangeAvatar } from './access-policy';
import {
  type AvatarStorage,
  type CredentialHasher,
  type Mailer,
  type TokenService,
  type UserCache,
  type UserRepository,
  type WithTransaction,
} from './ports';

export interface AuthServiceDeps {
  userRepo: UserRepository;
  passwordHasher: CredentialHasher;
  tokenService: TokenService;
  userCache: UserCache;
  mailer: Mailer;
  avatarStorage: AvatarStorage;
  withTransaction: WithTransaction;
  generateUuid: () => string;
}

export interface LoginResult {
  accessToken: string;
  tokenType: 'bearer';
}

export class AuthService {
  constructor(private readonly deps: AuthServiceDeps) {}

  async register(input: { email: string; password: string }): Promise<PublicUser> {
    const { userRepo, passwordHasher, tokenService, mailer } = this.deps;

    const user = await this.deps.withTransaction(async (tx) => {
      const existing = await userRepo.findByEmail(tx, input.email);
      if (existing) {
        throw new AuthError('CONFLICT', 'User already exists');
      }

      const passwordHash = await passwordHasher.hash(input.password);
      const created = await userRepo.create(tx, { email: input.email, passwordHash, role: 'USER' });
      // Lost the race on the unique index against a concurrent registration.
      if (!created) {
        throw new AuthError('CONFLICT', 'User already exists');
      }
      return created;
    });

    const token = await tokenService.issue(user.email, 'email_verification');
    await mailer.send({ to: user.email, template: 'verify-email', token });

    return toPublicUser(user);
  }

  async verifyEmail(token: string): Promise<PublicUser> {
    const { userRepo, tokenService, userCache } = this.deps;

    const validated = await tokenService.validate(token, 'email_verification');
    if (!validated.ok) {
      throw new AuthError('INVALID_TOKEN', 'Invalid or expired token');
    }
    const email = validated.value;

    const user = await this.deps.withTransaction(async (tx) => {
      const found = await userRepo.findByEmail(tx, email);
      if (!found) {
        throw new AuthError('INVALID_TOKEN', 'Invalid or expired token');
      }
      if (!found.isVerified) {
        await userRepo.markVerified(tx, found.id);
      }
      return { ...found, isVerified: true };
    });

    await userCache.invalidate(email);
    return toPublicUser(user);
  }

  async login(input: { email: string; password: string }): Promise<LoginResult> {
    const { userRepo, passwordHasher, tokenService } = this.deps;

    const user = await this.deps.withTransaction((tx) => userRepo.findByEmail(tx, input.email));
    if (!user) {
      throw new AuthError('UNAUTHORIZED', 'Invalid credentials');
    }

    const valid = await passwordHasher.verify(input.password, user.passwordHash);
    if (!valid) {
      throw new AuthError('UNAUTHORIZED', 'Invalid credentials');
    }

    if (!user.isVerified) {
      throw new AuthError('FORBIDDEN', 'Email is not verified');
    }

    const accessToken = await tokenService.issue(user.email, 'access');
    return { accessToken, tokenType: 'bearer' };
  }

  /**
   * Resolves with the same message whether or not the account exists, so the
   * response does not reveal which emails are registered.
   */
  async requestPasswordReset(email: string): Promise<{ message: string }> {
    const { userRepo, tokenService, mailer } = this.deps;

    const user = await this.deps.withTransaction((tx) => userRepo.findByEmail(tx, email));
    if (user) {
      const token = await tokenService.issue(user.email, 'password_reset');
      await mailer.send({ to: user.email, template: 'password-reset', token });
    }

    return { message: PASSWORD_RESET_MESSAGE };
  }

  async resetPassword(token: string, newPassword: string): Promise<void> {
    const { userRepo, passwordHasher, tokenService, userCache } = this.deps;

    const validated = await tokenService.validate(token, 'password_reset');
    if (!validated.ok) {
      throw new AuthError('INVALID_TOKEN', 'Invalid or expired password reset token');
    }
    const email = validated.value;

    await this.deps.withTransaction(async (tx) => {
      const user = await userRepo.findByEmail(tx, email);
      if (!user) {
        throw new AuthError('INVALID_TOKEN', 'Invalid or expired password reset token');
      }
      const passwordHash = await passwordHasher.hash(newPassword);
      await userRepo.updatePasswordHash(tx, user.id, passwordHash);
    });

    await userCache.invalidate(email);
  }

  async updateAvatar(userId: string, upload: AvatarUpload): Promise<PublicUser> {
    const { userRepo, avatarStorage, userCache } = this.deps;

    const key = avatarObjectKey(userId, upload.contentType, this.deps.generateUuid());
    if (!key) {
      throw new AuthError('VALIDATION', 'Unsupported avatar image type');
    }

    // The cached session may be stale, so the rule is checked against the directory.
    const current = await this.deps.withTransaction((tx) => userRepo.findById(tx, userId));
    if (!current) {
      throw new AuthError('NOT_FOUND', 'User not found');
    }
    if (!canChangeAvatar(current)) {
      throw new AuthError('FORBIDDEN', 'Only admin users can change their avatar after setting one');
    }

    const url = await avatarStorage.putObject(key, upload.body, upload.contentType);

    // The write re-checks the rule, so an upload racing another one cannot replace it.
    const updated = await this.deps.withTransaction(async (tx) => {
      const written = await userRepo.updateAvatar(tx, userId, url);
      if (written) return written;
      if (!(await userRepo.findById(tx, userId))) {
        throw new AuthError('NOT_FOUND', 'User not found');
      }
      throw new AuthError('FORBIDDEN', 'Only admin users can change their avatar after setting one');
    });

    await userCache.invalidate(updated.email);
    return toPublicUser(updated);
  }

  async listUsers(): Promise<PublicUser[]> {
    const users = await this.deps.withTransaction((tx) => this.deps.userRepo.list(tx));
    return users.map(toPublicUser);
  }
}

export type AuthErrorKind =
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'CONFLICT'
  | 'INVALID_TOKEN'
  | 'VALIDATION'
  | 'NOT_FOUND';

export class AuthError extends Error {
  constructor(
    public readonly kind: AuthErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'AuthError';
  }
}
