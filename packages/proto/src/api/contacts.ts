import { z } from 'zod';

export const ContactRequestSchema = z.object({
  first_name: z.string().trim().min(1).max(100),
  last_name: z.string().trim().min(1).max(100),
  email: z.string().trim().email('Invalid email address').max(255),
  phone_number: z.string().trim().min(5).max(20),
  birth_date: z.string().date('birth_date must be a YYYY-MM-DD date'),
  additional_info: z.string().nullable().optional(),
});

export const ContactIdParamsSchema = z.object({
  contactId: z.string().regex(/^\d+$/, 'Contact id must be numeric'),
});

/** Largest id a BIGSERIAL column can hold. */
export const MAX_CONTACT_ID = 9223372036854775807n;

/** Whether a numeric contact id could name a stored row at all. */
export function isStorableContactId(contactId: string): boolean {
  return BigInt(contactId) <= MAX_CONTACT_ID;
}

export const ContactSearchQuerySchema = z.object({
  query: z.string().max(100).default(''),
});

export const BirthdayQuerySchema = z.object({
  days: z.coerce.number().int().min(0).max(366).default(7),
});

export const ContactResponseSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  first_name: z.string(),
  last_name: z.string(),
  email: z.string(),
  phone_number: z.string(),
  birth_date: z.string(),
  additional_info: z.string().nullable(),
  created_at: z.string().datetime(),
  updated_at: z.string().datetime(),
});

export type ContactRequest = z.infer<typeof ContactRequestSchema>;
export type ContactResponse = z.infer<typeof ContactResponseSchema>;
