export * from './api/users';
export * from './api/contacts';
