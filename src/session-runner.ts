import { createStore, type StoreApi } from 'zustand/vanilla';
import { NotTrackedWorkspaceError, errorMessage } from './errors';
import type { GitConfigBridge } from './git';
import { formatIdentity } from './identity';
import type { IdentityRepository } from './identity-store';
import type { OutputChannel } from './log';
import { createSession, update, type SessionEffect, type SessionEvent, type SessionState, type Viewport } from './session';
import type { ConfiguredAuthors, StoredIdentity } from './types';

export type SessionPorts = {
  store: IdentityRepository;
  git: GitConfigBridge;
  log: OutputChannel;
  onQuit: () => void;
};

export type SessionRunner = {
  readonly store: StoreApi<SessionState>;
  getState(): SessionState;
  /** Resolves once the event and every effect it caused have been handled. */
  dispatch(event: SessionEvent): Promise<void>;
};

export const readConfiguredAuthors = async (git: GitConfigBridge): Promise<ConfiguredAuthors> => {
  const [global, local] = await Promise.all([git.readAuthor('global'), git.readAuthor('local')]);
  return { ...(global ? { global } : {}), ...(local ? { local } : {}) };
};

/**
 * Loads the store snapshot and the configured authors into a fresh browse
 * session. Store failures propagate: a store that cannot be listed at startup
 * is fatal.
 */
export const loadInitialSession = async (
  store: IdentityRepository,
  git: GitConfigBridge,
  viewport?: Viewport
): Promise<SessionState> => {
  const identities = await store.list();
  const authors = await readConfiguredAuthors(git);
  return createSession(identities, { authors, viewport });
};

export const createSessionRunner = (initial: SessionState, { store, git, log, onQuit }: SessionPorts): SessionRunner => {
  const state = createStore<SessionState>()(() => initial);

  const reloadAfterFailure = async (): Promise<StoredIdentity[] | undefined> => {
    try {
      return await store.list();
    } catch (error) {
      log.warn(`reload after failure: ${errorMessage(error)}`);
      return undefined;
    }
  };

  const execute = async (effect: SessionEffect): Promise<SessionEvent | undefined> => {
    try {
      switch (effect.type) {
        case 'delete': {
          await store.delete(effect.id);
          log.info(`deleted #${effect.id}`);
          return { type: 'deleted', identities: await store.list() };
        }
        case 'save': {
          const { identity, replaceId } = effect;
          const id =
            replaceId === undefined
              ? await store.insert(identity.name, identity.email)
              : await store.replace(replaceId, identity.name, identity.email);
          const replaced = replaceId === undefined ? '' : ` replacing #${replaceId}`;
          log.info(`saved ${formatIdentity(identity)}${replaced} (${id === undefined ? 'already stored' : `#${id}`})`);
          return { type: 'saved', identity, identities: await store.list() };
        }
        case 'apply': {
          const { scope } = effect;
          const identity = { name: effect.identity.name, email: effect.identity.email };
          if (scope === 'local' && !(await git.isInsideWorkTree())) {
            throw new NotTrackedWorkspaceError();
          }
          await git.writeAuthor(scope, identity);
          log.info(`set ${scope} author to ${formatIdentity(identity)}`);
          return { type: 'applied', scope, identity };
        }
        case 'quit':
          log.info('quit');
          onQuit();
          return undefined;
      }
    } catch (error) {
      const message = errorMessage(error);
      log.error(`${effect.type} failed: ${message}`);
      const touchesStore = effect.type === 'delete' || effect.type === 'save';
      return { type: 'failed', message, identities: touchesStore ? await reloadAfterFailure() : undefined };
    }
  };

  const handle = async (event: SessionEvent): Promise<void> => {
    const current = state.getState();
    const transition = update(current, event);
    if (transition.state !== current) {
      state.setState(transition.state, true);
    }

    for (const effect of transition.effects) {
      const outcome = await execute(effect);
      if (outcome) {
        await handle(outcome);
      }
    }
  };

  let queue: Promise<void> = Promise.resolve();

  const dispatch = (event: SessionEvent): Promise<void> => {
    queue = queue
      .then(() => handle(event))
      .catch((error: unknown) => {
        log.error(`event ${event.type} failed: ${errorMessage(error)}`);
        state.setState({ error: errorMessage(error) });
      });
    return queue;
  };

  return { store: state, getState: state.getState, dispatch };
};
