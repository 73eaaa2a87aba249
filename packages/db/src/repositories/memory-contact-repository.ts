import { type Contact, type ContactInput, type ContactRepository } from '@contactbook/domain';

export class InMemoryContactRepository implements ContactRepository {
  private readonly contacts = new Map<string, Contact>();
  private nextId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async create(_tx: unknown, userId: string, contact: ContactInput): Promise<Contact> {
    const timestamp = this.now();
    const created: Contact = {
      ...contact,
      id: String(this.nextId++),
      userId,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.contacts.set(created.id, created);
    return { ...created };
  }

  async findById(_tx: unknown, userId: string, id: string): Promise<Contact | null> {
    const contact = this.owned(userId, id);
    return contact ? { ...contact } : null;
  }

  async listByUser(_tx: unknown, userId: string): Promise<Contact[]> {
    return this.ownedBy(userId);
  }

  async search(_tx: unknown, userId: string, query: string): Promise<Contact[]> {
    const needle = query.toLowerCase();
    return this.ownedBy(userId).filter((c) =>
      [c.firstName, c.lastName, c.email].some((field) => field.toLowerCase().includes(needle)),
    );
  }

  async update(
    _tx: unknown,
    userId: string,
    id: string,
    contact: ContactInput,
  ): Promise<Contact | null> {
    const existing = this.owned(userId, id);
    if (!existing) return null;
    const updated: Contact = { ...existing, ...contact, updatedAt: this.now() };
    this.contacts.set(id, updated);
    return { ...updated };
  }

  async delete(_tx: unknown, userId: string, id: string): Promise<boolean> {
    if (!this.owned(userId, id)) return false;
    return this.contacts.delete(id);
  }

  private owned(userId: string, id: string): Contact | undefined {
    const contact = this.contacts.get(id);
    return contact && contact.userId === userId ? contact : undefined;
  }

  private ownedBy(userId: string): Contact[] {
    return [...this.contacts.values()]
      .filter((c) => c.userId === userId)
      .sort((a, b) => Number(a.id) - Number(b.id))
      .map((c) => ({ ...c }));
  }
}
