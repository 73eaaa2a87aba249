import {
  canChangeAvatar,
  type User,
  type UserRepository,
  type UserRole,
} from '@contactbook/domain';

/** Map-backed user directory for tests. */
export class InMemoryUserRepository implements UserRepository {
  private readonly users = new Map<string, User>();
  private nextId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async create(
    _tx: unknown,
    user: { email: string; passwordHash: string; role: UserRole },
  ): Promise<User | null> {
    if (this.findEmail(user.email)) return null;
    const created: User = {
      id: String(this.nextId++),
      email: user.email,
      passwordHash: user.passwordHash,
      isVerified: false,
      role: user.role,
      avatarUrl: null,
      createdAt: this.now(),
    };
    this.users.set(created.id, created);
    return { ...created };
  }

  async findByEmail(_tx: unknown, email: string): Promise<User | null> {
    const user = this.findEmail(email);
    return user ? { ...user } : null;
  }

  async findById(_tx: unknown, id: string): Promise<User | null> {
    const user = this.users.get(id);
    return user ? { ...user } : null;
  }

  async list(_tx: unknown): Promise<User[]> {
    return [...this.users.values()].map((u) => ({ ...u }));
  }

  async markVerified(_tx: unknown, id: string): Promise<void> {
    const user = this.users.get(id);
    if (user) user.isVerified = true;
  }

  async updatePasswordHash(_tx: unknown, id: string, passwordHash: string): Promise<void> {
    const user = this.users.get(id);
    if (user) user.passwordHash = passwordHash;
  }

  async updateAvatar(_tx: unknown, id: string, avatarUrl: string): Promise<User | null> {
    const user = this.users.get(id);
    if (!user || !canChangeAvatar(user)) return null;
    user.avatarUrl = avatarUrl;
    return { ...user };
  }

  /** Test helper: promote a user without going through the API. */
  setRole(id: string, role: UserRole): void {
    const user = this.users.get(id);
    if (user) user.role = role;
  }

  private findEmail(email: string): User | undefined {
    for (const user of this.users.values()) {
      if (user.email === email) return user;
    }
    return undefined;
  }
}
