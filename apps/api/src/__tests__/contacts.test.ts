import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { bearer, createTestApp, signUp, type TestApp } from './helpers';

const ada = {
  first_name: 'Ada',
  last_name: 'Lovelace',
  email: 'ada@example.com',
  phone_number: '+44 20 0000',
  birth_date: '1815-12-10',
  additional_info: 'first programmer',
};

const alan = {
  first_name: 'Alan',
  last_name: 'Turing',
  email: 'alan@bletchley.test',
  phone_number: '+44 20 1111',
  birth_date: '1912-06-23',
};

describe('contact routes', () => {
  let ctx: TestApp;
  let alice: string;
  let bob: string;

  beforeEach(async () => {
    ctx = createTestApp({ today: new Date('2026-12-05T09:00:00.000Z') });
    alice = await signUp(ctx, 'alice@example.com');
    bob = await signUp(ctx, 'bob@example.com');
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  async function create(token: string, payload: Record<string, unknown>) {
    return ctx.app.inject({ method: 'POST', url: '/contacts', headers: bearer(token), payload });
  }

  it('creates a contact owned by the caller', async () => {
    const res = await create(alice, ada);

    expect(res.statusCode).toBe(201);
    expect(res.json()).toMatchObject({
      id: '1',
      user_id: '1',
      ...ada,
      created_at: expect.any(String),
      updated_at: expect.any(String),
    });
  });

  it('stores a missing additional_info as null', async () => {
    const res = await create(alice, alan);
    expect(res.json()).toMatchObject({ additional_info: null });
  });

  it('rejects invalid contact data with 422', async () => {
    const res = await create(alice, { ...ada, phone_number: '123', birth_date: '1815-13-10' });

    expect(res.statusCode).toBe(422);
    expect(res.json()).toMatchObject({ code: 'VALIDATION', message: 'Invalid contact data' });
  });

  it('requires authentication', async () => {
    const res = await ctx.app.inject({ method: 'GET', url: '/contacts' });
    expect(res.statusCode).toBe(401);
    expect(res.headers['www-authenticate']).toBe('Bearer');
  });

  it('lists only the caller\'s contacts', async () => {
    await create(alice, ada);
    await create(alice, alan);
    await create(bob, { ...ada, first_name: 'Bobs Ada' });

    const res = await ctx.app.inject({ method: 'GET', url: '/contacts', headers: bearer(alice) });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject([{ first_name: 'Ada' }, { first_name: 'Alan' }]);
  });

  it('reports another user\'s contact as not found', async () => {
    await create(alice, ada);

    for (const method of ['GET', 'DELETE'] as const) {
      const res = await ctx.app.inject({ method, url: '/contacts/1', headers: bearer(bob) });
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ code: 'NOT_FOUND', message: 'Contact not found' });
    }

    const update = await ctx.app.inject({
      method: 'PUT',
      url: '/contacts/1',
      headers: bearer(bob),
      payload: alan,
    });
    expect(update.statusCode).toBe(404);

    const own = await ctx.app.inject({ method: 'GET', url: '/contacts/1', headers: bearer(alice) });
    expect(own.json()).toMatchObject({ first_name: 'Ada' });
  });

  it('reports an id beyond the bigint range as not found without querying', async () => {
    await create(alice, ada);
    const findById = vi.spyOn(ctx.contactRepo, 'findById');
    const update = vi.spyOn(ctx.contactRepo, 'update');
    const remove = vi.spyOn(ctx.contactRepo, 'delete');
    const url = '/contacts/99999999999999999999';

    const responses = [
      await ctx.app.inject({ method: 'GET', url, headers: bearer(alice) }),
      await ctx.app.inject({ method: 'PUT', url, headers: bearer(alice), payload: alan }),
      await ctx.app.inject({ method: 'DELETE', url, headers: bearer(alice) }),
    ];

    for (const res of responses) {
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ code: 'NOT_FOUND', message: 'Contact not found' });
    }
    expect(findById).not.toHaveBeenCalled();
    expect(update).not.toHaveBeenCalled();
    expect(remove).not.toHaveBeenCalled();
  });

  it('rejects a non-numeric id with 422', async () => {
    const res = await ctx.app.inject({ method: 'GET', url: '/contacts/abc', headers: bearer(alice) });
    expect(res.statusCode).toBe(422);
  });

  it('replaces a contact on update', async () => {
    await create(alice, ada);
    const res = await ctx.app.inject({
      method: 'PUT',
      url: '/contacts/1',
      headers: bearer(alice),
      payload: alan,
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ id: '1', first_name: 'Alan', additional_info: null });
  });

  it('deletes a contact', async () => {
    await create(alice, ada);

    const deleted = await ctx.app.inject({ method: 'DELETE', url: '/contacts/1', headers: bearer(alice) });
    expect(deleted.statusCode).toBe(204);
    expect(deleted.body).toBe('');

    const after = await ctx.app.inject({ method: 'GET', url: '/contacts/1', headers: bearer(alice) });
    expect(after.statusCode).toBe(404);
  });

  it('searches case-insensitively within the caller\'s contacts', async () => {
    await create(alice, ada);
    await create(alice, alan);
    await create(bob, { ...ada, last_name: 'Lovelace-Byron' });

    const res = await ctx.app.inject({
      method: 'GET',
      url: '/contacts/search?query=LOVE',
      headers: bearer(alice),
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject([{ last_name: 'Lovelace' }]);
    expect(res.json()).toHaveLength(1);
  });

  it('returns nothing for a blank search', async () => {
    await create(alice, ada);
    const res = await ctx.app.inject({ method: 'GET', url: '/contacts/search?query=', headers: bearer(alice) });
    expect(res.json()).toEqual([]);
  });

  it('lists birthdays in the coming week', async () => {
    await create(alice, ada);
    await create(alice, alan);

    const week = await ctx.app.inject({ method: 'GET', url: '/contacts/birthdays', headers: bearer(alice) });
    expect(week.statusCode).toBe(200);
    expect(week.json()).toMatchObject([{ first_name: 'Ada' }]);
    expect(week.json()).toHaveLength(1);

    const threeDays = await ctx.app.inject({
      method: 'GET',
      url: '/contacts/birthdays?days=3',
      headers: bearer(alice),
    });
    expect(threeDays.json()).toEqual([]);
  });
});
