export { createPool, closePool, createTransactionRunner, pgClient } from './client';
export { PgUserRepository } from './repositories/user-repository';
export { PgContactRepository, escapeLikePattern } from './repositories/contact-repository';
export { InMemoryUserRepository } from './repositories/memory-user-repository';
export { InMemoryContactRepository } from './repositories/memory-contact-repository';
export { runInMemory } from './memory-transaction';
