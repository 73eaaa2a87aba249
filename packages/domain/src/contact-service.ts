import { type Contact, type ContactInput } from './contact';
import { type ContactRepository, type WithTransaction } from './ports';
import { daysUntilBirthday, isBirthdayWithin } from './birthdays';

export interface ContactServiceDeps {
  contactRepo: ContactRepository;
  withTransaction: WithTransaction;
  now?: () => Date;
}

export const UPCOMING_BIRTHDAY_DAYS = 7;

/**
 * Every operation is scoped to the owning user. A contact that belongs to
 * someone else is reported exactly like one that does not exist.
 */
export class ContactService {
  constructor(private readonly deps: ContactServiceDeps) {}

  async create(userId: string, input: ContactInput): Promise<Contact> {
    return this.deps.withTransaction((tx) => this.deps.contactRepo.create(tx, userId, input));
  }

  async list(userId: string): Promise<Contact[]> {
    return this.deps.withTransaction((tx) => this.deps.contactRepo.listByUser(tx, userId));
  }

  async get(userId: string, contactId: string): Promise<Contact> {
    const contact = await this.deps.withTransaction((tx) =>
      this.deps.contactRepo.findById(tx, userId, contactId),
    );
    if (!contact) {
      throw new ContactError('NOT_FOUND', 'Contact not found');
    }
    return contact;
  }

  async update(userId: string, contactId: string, input: ContactInput): Promise<Contact> {
    const contact = await this.deps.withTransaction((tx) =>
      this.deps.contactRepo.update(tx, userId, contactId, input),
    );
    if (!contact) {
      throw new ContactError('NOT_FOUND', 'Contact not found');
    }
    return contact;
  }

  async delete(userId: string, contactId: string): Promise<void> {
    const deleted = await this.deps.withTransaction((tx) =>
      this.deps.contactRepo.delete(tx, userId, contactId),
    );
    if (!deleted) {
      throw new ContactError('NOT_FOUND', 'Contact not found');
    }
  }

  async search(userId: string, query: string): Promise<Contact[]> {
    const trimmed = query.trim();
    if (trimmed.length === 0) return [];
    return this.deps.withTransaction((tx) => this.deps.contactRepo.search(tx, userId, trimmed));
  }

  /** Contacts whose birthday falls today or within the next `days` days, soonest first. */
  async upcomingBirthdays(userId: string, days = UPCOMING_BIRTHDAY_DAYS): Promise<Contact[]> {
    const today = (this.deps.now ?? (() => new Date()))();
    const contacts = await this.list(userId);
    return contacts
      .filter((c) => isBirthdayWithin(c.birthDate, today, days))
      .sort(
        (a, b) =>
          (daysUntilBirthday(a.birthDate, today) ?? 0) - (daysUntilBirthday(b.birthDate, today) ?? 0),
      );
  }
}

export class ContactError extends Error {
  constructor(
    public readonly kind: 'NOT_FOUND',
    message: string,
  ) {
    super(message);
    this.name = 'ContactError';
  }
}
