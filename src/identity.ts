import type { Identity, IdentityField } from './types';

export const normalizeIdentity = (identity: Identity): Identity => {
  return { name: identity.name.trim(), email: identity.email.trim() };
};

/** Deduplication key: trimmed, case-sensitive. */
export const identityKey = (identity: Identity): string => {
  const { name, email } = normalizeIdentity(identity);
  return `${name}\u0000${email}`;
};

export const isSameIdentity = (a: Identity, b: Identity): boolean => {
  return identityKey(a) === identityKey(b);
};

export const hasEmailShape = (value: string): boolean => {
  return value.trim().includes('@');
};

export const getMissingFields = (identity: Identity): IdentityField[] => {
  const missing: IdentityField[] = [];
  if (identity.name.trim().length === 0) {
    missing.push('name');
  }
  if (identity.email.trim().length === 0) {
    missing.push('email');
  }
  return missing;
};

export const formatIdentity = (identity: Identity): string => {
  return `${identity.name} <${identity.email}>`;
};
