import { type Contact, type ContactInput, type ContactRepository } from '@contactbook/domain';
import { pgClient } from '../client';

type ContactRow = {
  id: string;
  user_id: string;
  first_name: string;
  last_name: string;
  email: string;
  phone_number: string;
  birth_date: string;
  additional_info: string | null;
  created_at: Date;
  updated_at: Date;
};

// birth_date is read as text so node-postgres does not shift it through a local-time Date.
const CONTACT_COLUMNS = `id, user_id, first_name, last_name, email, phone_number,
  to_char(birth_date, 'YYYY-MM-DD') AS birth_date, additional_info, created_at, updated_at`;

export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

export class PgContactRepository implements ContactRepository {
  async create(tx: unknown, userId: string, contact: ContactInput): Promise<Contact> {
    const result = await pgClient(tx).query<ContactRow>(
      `INSERT INTO contacts
         (user_id, first_name, last_name, email, phone_number, birth_date, additional_info)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING ${CONTACT_COLUMNS}`,
      [
        userId,
        contact.firstName,
        contact.lastName,
        contact.email,
        contact.phoneNumber,
        contact.birthDate,
        contact.additionalInfo,
      ],
    );
    const row = result.rows[0];
    if (!row) throw new Error('Contact insert returned no row');
    return mapContactRow(row);
  }

  async findById(tx: unknown, userId: string, id: string): Promise<Contact | null> {
    const result = await pgClient(tx).query<ContactRow>(
      `SELECT ${CONTACT_COLUMNS} FROM contacts WHERE id = $1 AND user_id = $2`,
      [id, userId],
    );
    const row = result.rows[0];
    return row ? mapContactRow(row) : null;
  }

  async listByUser(tx: unknown, userId: string): Promise<Contact[]> {
    const result = await pgClient(tx).query<ContactRow>(
      `SELECT ${CONTACT_COLUMNS} FROM contacts WHERE user_id = $1 ORDER BY id`,
      [userId],
    );
    return result.rows.map(mapContactRow);
  }

  async search(tx: unknown, userId: string, query: string): Promise<Contact[]> {
    const pattern = `%${escapeLikePattern(query)}%`;
    const result = await pgClient(tx).query<ContactRow>(
      `SELECT ${CONTACT_COLUMNS}
       FROM contacts
       WHERE user_id = $1
         AND (first_name ILIKE $2 OR last_name ILIKE $2 OR email ILIKE $2)
       ORDER BY id`,
      [userId, pattern],
    );
    return result.rows.map(mapContactRow);
  }

  async update(
    tx: unknown,
    userId: string,
    id: string,
    contact: ContactInput,
  ): Promise<Contact | null> {
    const result = await pgClient(tx).query<ContactRow>(
      `UPDATE contacts
       SET first_name = $3, last_name = $4, email = $5, phone_number = $6,
           birth_date = $7, additional_info = $8, updated_at = NOW()
       WHERE id = $1 AND user_id = $2
       RETURNING ${CONTACT_COLUMNS}`,
      [
        id,
        userId,
        contact.firstName,
        contact.lastName,
        contact.email,
        contact.phoneNumber,
        contact.birthDate,
        contact.additionalInfo,
      ],
    );
    const row = result.rows[0];
    return row ? mapContactRow(row) : null;
  }

  async delete(tx: unknown, userId: string, id: string): Promise<boolean> {
    const result = await pgClient(tx).query('DELETE FROM contacts WHERE id = $1 AND user_id = $2', [
      id,
      userId,
    ]);
    return (result.rowCount ?? 0) > 0;
  }
}

function mapContactRow(row: ContactRow): Contact {
  return {
    id: String(row.id),
    userId: String(row.user_id),
    firstName: row.first_name,
    lastName: row.last_name,
    email: row.email,
    phoneNumber: row.phone_number,
    birthDate: row.birth_date,
    additionalInfo: row.additional_info,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
