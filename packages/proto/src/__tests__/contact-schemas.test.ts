import { describe, it, expect } from 'vitest';
import {
  ContactRequestSchema,
  ContactIdParamsSchema,
  isStorableContactId,
  ContactSearchQuerySchema,
  BirthdayQuerySchema,
} from '../api/contacts';

const valid = {
  first_name: 'Ada',
  last_name: 'Lovelace',
  email: 'ada@example.com',
  phone_number: '+44 20 0000',
  birth_date: '1815-12-10',
};

describe('ContactRequestSchema', () => {
  it('validates a contact without additional info', () => {
    const result = ContactRequestSchema.parse(valid);
    expect(result.first_name).toBe('Ada');
    expect(result.additional_info).toBeUndefined();
  });

  it('accepts null additional info', () => {
    expect(ContactRequestSchema.parse({ ...valid, additional_info: null }).additional_info).toBeNull();
  });

  it('enforces name and phone lengths', () => {
    expect(() => ContactRequestSchema.parse({ ...valid, first_name: '' })).toThrow();
    expect(() => ContactRequestSchema.parse({ ...valid, last_name: 'x'.repeat(101) })).toThrow();
    expect(() => ContactRequestSchema.parse({ ...valid, phone_number: '1234' })).toThrow();
    expect(() => ContactRequestSchema.parse({ ...valid, phone_number: '1'.repeat(21) })).toThrow();
  });

  it('rejects impossible or non-ISO dates', () => {
    expect(() => ContactRequestSchema.parse({ ...valid, birth_date: '2023-02-30' })).toThrow();
    expect(() => ContactRequestSchema.parse({ ...valid, birth_date: '10/12/1815' })).toThrow();
  });

  it('rejects an invalid email', () => {
    expect(() => ContactRequestSchema.parse({ ...valid, email: 'not-an-email' })).toThrow();
  });
});

describe('ContactIdParamsSchema', () => {
  it('accepts numeric ids only', () => {
    expect(ContactIdParamsSchema.parse({ contactId: '42' }).contactId).toBe('42');
    expect(() => ContactIdParamsSchema.parse({ contactId: 'abc' })).toThrow();
    expect(() => ContactIdParamsSchema.parse({ contactId: '-1' })).toThrow();
  });
});

describe('isStorableContactId', () => {
  it('accepts ids up to the bigint maximum', () => {
    expect(isStorableContactId('1')).toBe(true);
    expect(isStorableContactId('9223372036854775807')).toBe(true);
    expect(isStorableContactId('0009223372036854775807')).toBe(true);
  });

  it('rejects ids beyond the bigint maximum', () => {
    expect(isStorableContactId('9223372036854775808')).toBe(false);
    expect(isStorableContactId('99999999999999999999')).toBe(false);
  });
});

describe('ContactSearchQuerySchema', () => {
  it('defaults to an empty query', () => {
    expect(ContactSearchQuerySchema.parse({})).toEqual({ query: '' });
  });
});

describe('BirthdayQuerySchema', () => {
  it('defaults to seven days and coerces strings', () => {
    expect(BirthdayQuerySchema.parse({})).toEqual({ days: 7 });
    expect(BirthdayQuerySchema.parse({ days: '30' })).toEqual({ days: 30 });
    expect(() => BirthdayQuerySchema.parse({ days: '-1' })).toThrow();
  });
});
