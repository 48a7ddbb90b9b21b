export type Identity = {
  name: string;
  email: string;
};

export interface StoredIdentity extends Identity {
  id: number;
}

export type Scope = 'global' | 'local';

/** Authors currently configured in git, per scope. */
export type ConfiguredAuthors = Partial<Record<Scope, Identity>>;

export type IdentityField = keyof Identity;
