import { ExternalToolError } from './errors';
import type { GitConfigBridge } from './git';
import type { KeyInput, NamedKey, SessionEvent } from './session';
import type { ConfiguredAuthors, Identity, Scope } from './types';

/** In-memory git config with a call journal. */
export class FakeGitBridge implements GitConfigBridge {
  insideWorkTree = true;
  authors: ConfiguredAuthors = {};
  writeError: string | undefined;
  readonly calls: string[] = [];
  readonly writes: Array<{ scope: Scope; identity: Identity }> = [];

  async isInsideWorkTree(): Promise<boolean> {
    this.calls.push('isInsideWorkTree');
    return this.insideWorkTree;
  }

  async readAuthor(scope: Scope): Promise<Identity | undefined> {
    this.calls.push(`read:${scope}`);
    if (scope === 'local' && !this.insideWorkTree) {
      return undefined;
    }
    return this.authors[scope];
  }

  async writeAuthor(scope: Scope, identity: Identity): Promise<void> {
    this.calls.push(`write:${scope}`);
    if (this.writeError !== undefined) {
      throw new ExternalToolError(this.writeError);
    }
    this.writes.push({ scope, identity });
    this.authors[scope] = identity;
  }
}

export const press = (kind: NamedKey): SessionEvent => ({ type: 'key', key: { kind } });

export const typeText = (text: string): SessionEvent => {
  const key: KeyInput = { kind: 'char', text };
  return { type: 'key', key };
};
