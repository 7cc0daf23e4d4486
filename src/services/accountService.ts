/**
 * accountService.ts - Prototype registration and login.
 * Credentials are compared as stored; this service is not an authentication layer.
 */

import { ConflictError, UnauthorizedError } from '../errors/appErrors';
import type { RecordStore } from '../store/recordStore';
import type { AccountRecord, Role } from '../types/domain';

export interface RegistrationInput {
  name: string;
  email: string;
  password: string;
  role: Role;
  phone?: string;
  lat?: number;
  lng?: number;
  preferredType?: string;
}

export type PublicAccount = Omit<AccountRecord, 'password'>;

export function toPublicAccount(account: AccountRecord): PublicAccount {
  const { password: _password, ...rest } = account;
  return rest;
}

async function findByEmail(store: RecordStore, email: string): Promise<AccountRecord | null> {
  const [account] = await store.fetchAll('account', { email: email.trim().toLowerCase() });
  return account ?? null;
}

export async function registerAccount(store: RecordStore, input: RegistrationInput): Promise<{ id: string; email: string; role: Role }> {
  const email = input.email.trim().toLowerCase();

  if (await findByEmail(store, email)) {
    throw new ConflictError('Email already registered');
  }

  const id = await store.create('account', {
    name: input.name.trim(),
    email,
    password: input.password,
    role: input.role,
    phone: input.phone ?? null,
    lat: input.lat ?? null,
    lng: input.lng ?? null,
    isActive: true,
    preferredType: input.preferredType?.trim().toLowerCase() || null,
  });

  console.log(`[Auth] Account registered: ${email} (${input.role})`);
  return { id, email, role: input.role };
}

export async function login(store: RecordStore, email: string, password: string): Promise<PublicAccount> {
  const account = await findByEmail(store, email);
  if (!account || account.password !== password) {
    throw new UnauthorizedError('Invalid credentials');
  }
  return toPublicAccount(account);
}
