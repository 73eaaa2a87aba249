import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode } from '@contactbook/shared';
import {
  ContactError,
  type Contact,
  type ContactInput,
  type ContactService,
} from '@contactbook/domain';
import {
  BirthdayQuerySchema,
  ContactIdParamsSchema,
  ContactRequestSchema,
  ContactSearchQuerySchema,
  isStorableContactId,
  type ContactRequest,
  type ContactResponse,
} from '@contactbook/proto';
import { currentUser, type AuthGuard } from '../plugins/auth';
import { parseOrThrow } from './validation';

interface ContactRouteDeps {
  contactService: ContactService;
  authenticate: AuthGuard;
}

function mapContactError(err: unknown): never {
  if (err instanceof ContactError) {
    throw new AppError(ErrorCode.NOT_FOUND, err.message);
  }
  throw err;
}

// An id past the column's range names no row, so it is reported like any other missing contact.
function readContactId(params: unknown): string {
  const { contactId } = parseOrThrow(ContactIdParamsSchema, params, 'Invalid contact id');
  if (!isStorableContactId(contactId)) {
    throw new AppError(ErrorCode.NOT_FOUND, 'Contact not found');
  }
  return contactId;
}

function toContactInput(body: ContactRequest): ContactInput {
  return {
    firstName: body.first_name,
    lastName: body.last_name,
    email: body.email,
    phoneNumber: body.phone_number,
    birthDate: body.birth_date,
    additionalInfo: body.additional_info ?? null,
  };
}

export function toContactResponse(contact: Contact): ContactResponse {
  return {
    id: contact.id,
    user_id: contact.userId,
    first_name: contact.firstName,
    last_name: contact.lastName,
    email: contact.email,
    phone_number: contact.phoneNumber,
    birth_date: contact.birthDate,
    additional_info: contact.additionalInfo,
    created_at: contact.createdAt.toISOString(),
    updated_at: contact.updatedAt.toISOString(),
  };
}

export function registerContactRoutes(app: FastifyInstance, deps: ContactRouteDeps): void {
  const { contactService, authenticate } = deps;

  app.post('/contacts', { preHandler: [authenticate] }, async (request, reply) => {
    const user = currentUser(request);
    const body = parseOrThrow(ContactRequestSchema, request.body, 'Invalid contact data');
    const contact = await contactService.create(user.id, toContactInput(body));
    return reply.status(201).send(toContactResponse(contact));
  });

  app.get('/contacts', { preHandler: [authenticate] }, async (request, reply) => {
    const contacts = await contactService.list(currentUser(request).id);
    return reply.status(200).send(contacts.map(toContactResponse));
  });

  app.get('/contacts/search', { preHandler: [authenticate] }, async (request, reply) => {
    const { query } = parseOrThrow(ContactSearchQuerySchema, request.query, 'Invalid search query');
    const contacts = await contactService.search(currentUser(request).id, query);
    return reply.status(200).send(contacts.map(toContactResponse));
  });

  app.get('/contacts/birthdays', { preHandler: [authenticate] }, async (request, reply) => {
    const { days } = parseOrThrow(BirthdayQuerySchema, request.query, 'Invalid birthday window');
    const contacts = await contactService.upcomingBirthdays(currentUser(request).id, days);
    return reply.status(200).send(contacts.map(toContactResponse));
  });

  app.get('/contacts/:contactId', { preHandler: [authenticate] }, async (request, reply) => {
    const contactId = readContactId(request.params);
    try {
      const contact = await contactService.get(currentUser(request).id, contactId);
      return reply.status(200).send(toContactResponse(contact));
    } catch (err) {
      return mapContactError(err);
    }
  });

  app.put('/contacts/:contactId', { preHandler: [authenticate] }, async (request, reply) => {
    const contactId = readContactId(request.params);
    const body = parseOrThrow(ContactRequestSchema, request.body, 'Invalid contact data');
    try {
      const contact = await contactService.update(currentUser(request).id, contactId, toContactInput(body));
      return reply.status(200).send(toContactResponse(contact));
    } catch (err) {
      return mapContactError(err);
    }
  });

  app.delete('/contacts/:contactId', { preHandler: [authenticate] }, async (request, reply) => {
    const contactId = readContactId(request.params);
    try {
      await contactService.delete(currentUser(request).id, contactId);
      return reply.status(204).send();
    } catch (err) {
      return mapContactError(err);
    }
  });
}
