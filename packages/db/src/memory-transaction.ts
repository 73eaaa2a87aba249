import { type WithTransaction } from '@contactbook/domain';

/** Transaction runner for the in-memory repositories, which ignore the handle. */
export const runInMemory: WithTransaction = async (fn) => fn(null);
