import { describe, it, expect } from 'vitest';
import {
  EmailSchema,
  PasswordSchema,
  RegisterRequestSchema,
  LoginRequestSchema,
  PasswordResetSchema,
  VerifyEmailQuerySchema,
} from '../api/users';

describe('EmailSchema', () => {
  it('trims but keeps case', () => {
    expect(EmailSchema.parse('  Alice@Example.com ')).toBe('Alice@Example.com');
  });

  it('rejects malformed addresses', () => {
    expect(() => EmailSchema.parse('alice')).toThrow();
    expect(() => EmailSchema.parse('alice@')).toThrow();
  });
});

describe('PasswordSchema', () => {
  it('rejects too short', () => {
    expect(() => PasswordSchema.parse('short')).toThrow();
  });

  it('rejects too long', () => {
    expect(() => PasswordSchema.parse('a'.repeat(129))).toThrow();
  });

  it('accepts valid password', () => {
    expect(PasswordSchema.parse('securepassword123')).toBe('securepassword123');
  });
});

describe('RegisterRequestSchema', () => {
  it('validates a registration', () => {
    expect(RegisterRequestSchema.parse({ email: 'alice@example.com', password: 'password123' })).toEqual({
      email: 'alice@example.com',
      password: 'password123',
    });
  });

  it('drops a client-supplied role', () => {
    const result = RegisterRequestSchema.parse({
      email: 'alice@example.com',
      password: 'password123',
      role: 'ADMIN',
    });
    expect(result).not.toHaveProperty('role');
  });
});

describe('LoginRequestSchema', () => {
  it('accepts any non-empty password so login failures stay uniform', () => {
    expect(LoginRequestSchema.parse({ email: 'alice@example.com', password: 'x' }).password).toBe('x');
    expect(() => LoginRequestSchema.parse({ email: 'alice@example.com', password: '' })).toThrow();
  });
});

describe('PasswordResetSchema', () => {
  it('requires a token and an 8+ character password', () => {
    expect(PasswordResetSchema.parse({ token: 't', new_password: 'newpass123' }).new_password).toBe(
      'newpass123',
    );
    expect(() => PasswordResetSchema.parse({ token: 't', new_password: 'short' })).toThrow();
    expect(() => PasswordResetSchema.parse({ token: '', new_password: 'newpass123' })).toThrow();
  });
});

describe('VerifyEmailQuerySchema', () => {
  it('rejects a missing token', () => {
    expect(VerifyEmailQuerySchema.safeParse({}).success).toBe(false);
  });
});
