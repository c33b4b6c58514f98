export const ROLES = ['user', 'admin'] as const;

export type Role = (typeof ROLES)[number];

/**
 * User account as held by the store. `passwordHash` never leaves the
 * application layer; use {@link toPublicUser} for anything returned to callers.
 */
export interface User {
  readonly id: string;
  readonly username: string;
  readonly email: string;
  readonly passwordHash: string;
  readonly role: Role;
  readonly isActive: boolean;
  readonly apiKey: string | null;
  readonly company: string | null;
  readonly fullName: string | null;
  readonly createdAt: Date;
  readonly lastLogin: Date | null;
}

export interface NewUser {
  username: string;
  email: string;
  passwordHash: string;
  role: Role;
  apiKey: string;
  company?: string | null;
  fullName?: string | null;
}

export interface PublicUser {
  id: string;
  username: string;
  email: string;
  role: Role;
  isActive: boolean;
  company: string | null;
  fullName: string | null;
  createdAt: Date;
  lastLogin: Date | null;
}

/**
 * Authenticated identity resolved from a credential. Produced once per
 * request and never mutated.
 */
export interface Principal {
  readonly userId: string;
  readonly username: string;
  readonly role: Role;
}

export function isRole(value: unknown): value is Role {
  return ROLES.some((role) => role === value);
}

export function toPrincipal(user: User): Principal {
  return Object.freeze({
    userId: user.id,
    username: user.username,
    role: user.role,
  });
}

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    role: user.role,
    isActive: user.isActive,
    company: user.company,
    fullName: user.fullName,
    createdAt: user.createdAt,
    lastLogin: user.lastLogin,
  };
}
