import type { GitConfigBridge } from './git';
import { errorMessage } from './errors';
import { formatIdentity } from './identity';
import type { IdentityRepository } from './identity-store';
import type { OutputChannel } from './log';
import type { Identity, Scope } from './types';

export type HydrationResult = {
  /** Authors found in git config, per scope. */
  found: Array<{ scope: Scope; identity: Identity }>;
  /** Ids of rows created; authors already stored are skipped. */
  inserted: number[];
};

/**
 * Seeds the store from git's global author and, inside a work tree, the local
 * one. Unset config is expected and ignored. A failed insert is logged and
 * skipped: hydration never stops startup.
 */
export const hydrateFromGit = async (
  store: IdentityRepository,
  git: GitConfigBridge,
  log: OutputChannel
): Promise<HydrationResult> => {
  const result: HydrationResult = { found: [], inserted: [] };

  const seed = async (scope: Scope, identity: Identity | undefined): Promise<void> => {
    if (!identity) {
      log.info(`no ${scope} author configured`);
      return;
    }

    result.found.push({ scope, identity });
    let id: number | undefined;
    try {
      id = await store.insert(identity.name, identity.email);
    } catch (error) {
      log.warn(`could not store ${scope} author ${formatIdentity(identity)}: ${errorMessage(error)}`);
      return;
    }
    if (id === undefined) {
      log.info(`${scope} author ${formatIdentity(identity)} already stored`);
      return;
    }

    result.inserted.push(id);
    log.info(`imported ${scope} author ${formatIdentity(identity)} as #${id}`);
  };

  await seed('global', await git.readAuthor('global'));

  if (await git.isInsideWorkTree()) {
    await seed('local', await git.readAuthor('local'));
  }

  return result;
};
