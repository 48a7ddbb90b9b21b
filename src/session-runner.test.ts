import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Chalk } from 'chalk';
import { StoreTimeoutError } from './errors';
import { applyQuery, createIdentityIndex, viewItems } from './fuzzy-filter';
import { IdentityStore, MEMORY_STORE, type IdentityRepository } from './identity-store';
import { silentChannel } from './log';
import { allIdentities, visibleIdentities, type SessionEvent } from './session';
import { createSessionRunner, loadInitialSession, type SessionRunner } from './session-runner';
import { FakeGitBridge, press, typeText } from './test-helpers';
import { renderSession } from './view';

describe('session runner', () => {
  let store: IdentityStore;
  let git: FakeGitBridge;
  let onQuit: () => void;

  beforeEach(async () => {
    store = await IdentityStore.open({ filename: MEMORY_STORE, timeoutMs: 2000 });
    git = new FakeGitBridge();
    onQuit = vi.fn();
  });

  afterEach(() => {
    store.close();
  });

  const start = async (repository: IdentityRepository = store): Promise<SessionRunner> => {
    const initial = await loadInitialSession(repository, git);
    return createSessionRunner(initial, { store: repository, git, log: silentChannel(), onQuit });
  };

  const dispatchAll = async (runner: SessionRunner, ...events: SessionEvent[]): Promise<void> => {
    for (const event of events) {
      await runner.dispatch(event);
    }
  };

  const expectInSync = async (runner: SessionRunner): Promise<void> => {
    const state = runner.getState();
    const stored = await store.list();
    expect(allIdentities(state)).toEqual(stored);
    expect(visibleIdentities(state)).toEqual(viewItems(createIdentityIndex(stored, state.filter.query)));
  };

  it('loads the store and the configured authors', async () => {
    await store.insert('Alice Smith', 'a@x.com');
    git.authors = { global: { name: 'Alice Smith', email: 'a@x.com' } };

    const runner = await start();
    expect(allIdentities(runner.getState())).toEqual([{ id: 1, name: 'Alice Smith', email: 'a@x.com' }]);
    expect(runner.getState().authors).toEqual({ global: { name: 'Alice Smith', email: 'a@x.com' } });
  });

  it('adds an identity through the form', async () => {
    const runner = await start();
    await dispatchAll(runner, typeText('a'), typeText('Carl'), press('enter'), typeText('c@x.com'), press('enter'));

    const state = runner.getState();
    expect(await store.list()).toEqual([{ id: 1, name: 'Carl', email: 'c@x.com' }]);
    expect(state.mode).toBe('browse');
    expect(state.status).toBe('saved');
    expect(state.selection).toBe(0);
    await expectInSync(runner);
  });

  it('gives an edited identity a new id', async () => {
    await store.insert('Alice', 'a@x.com');
    const runner = await start();

    await dispatchAll(runner, typeText('e'));
    for (let i = 0; i < 'Alice'.length; i++) await runner.dispatch(press('erase'));
    await dispatchAll(runner, typeText('Bob'), press('enter'));
    for (let i = 0; i < 'a@x.com'.length; i++) await runner.dispatch(press('erase'));
    await dispatchAll(runner, typeText('b@x.com'), press('enter'));

    expect(await store.list()).toEqual([{ id: 2, name: 'Bob', email: 'b@x.com' }]);
    await expectInSync(runner);
  });

  it('merges an edit into an existing identical identity', async () => {
    await store.insert('Alice', 'a@x.com');
    await store.insert('Bob', 'b@x.com');
    const runner = await start();

    await dispatchAll(runner, typeText('e'));
    for (let i = 0; i < 'Alice'.length; i++) await runner.dispatch(press('erase'));
    await dispatchAll(runner, typeText('Bob'), press('enter'));
    for (let i = 0; i < 'a@x.com'.length; i++) await runner.dispatch(press('erase'));
    await dispatchAll(runner, typeText('b@x.com'), press('enter'));

    expect(await store.list()).toEqual([{ id: 2, name: 'Bob', email: 'b@x.com' }]);
    expect(runner.getState().selection).toBe(0);
    await expectInSync(runner);
  });

  it('deletes the only visible identity and still renders', async () => {
    await store.insert('Alice Smith', 'a@x.com');
    await store.insert('Bob Jones', 'b@x.com');
    const runner = await start();

    await dispatchAll(runner, typeText('/'), typeText('ali'), press('enter'), press('erase'));

    const state = runner.getState();
    expect(state.selection).toBeUndefined();
    expect(state.status).toBe('deleted');
    expect(await store.list()).toEqual([{ id: 2, name: 'Bob Jones', email: 'b@x.com' }]);
    expect(renderSession(state, new Chalk({ level: 0 })).split('\n')[3]).toBe('  (no matches)');
    await expectInSync(runner);
  });

  it('leaves the store untouched for an invalid form', async () => {
    const runner = await start();
    await dispatchAll(runner, typeText('a'), typeText('Carl'), press('enter'), typeText('carl'), press('enter'));

    expect(await store.list()).toEqual([]);
    expect(runner.getState().mode).toBe('add');
    expect(runner.getState().error).toBe('email must contain @');
  });

  it('stays consistent with the store across a run of mutations', async () => {
    await store.insert('Alice Smith', 'a@x.com');
    const runner = await start();

    const steps: SessionEvent[][] = [
      [typeText('a'), typeText('Bob Jones'), press('enter'), typeText('b@x.com'), press('enter')],
      [typeText('/'), typeText('o'), press('enter')],
      [typeText('a'), typeText('Olga'), press('enter'), typeText('o@x.com'), press('enter')],
      [press('down'), press('erase')],
      [typeText('e'), press('erase'), press('enter'), press('enter')],
      [press('escape'), press('erase')]
    ];

    for (const step of steps) {
      await dispatchAll(runner, ...step);
      await expectInSync(runner);
    }
  });

  it('refuses a local apply outside a work tree without calling git', async () => {
    await store.insert('Alice', 'a@x.com');
    git.insideWorkTree = false;
    const runner = await start();
    git.calls.length = 0;

    await runner.dispatch(typeText('l'));

    expect(runner.getState().error).toBe('not inside a git repository (local set aborted)');
    expect(git.calls).toEqual(['isInsideWorkTree']);
    expect(git.writes).toEqual([]);
    expect(await store.list()).toEqual([{ id: 1, name: 'Alice', email: 'a@x.com' }]);
  });

  it('applies the selection at global scope', async () => {
    await store.insert('Alice', 'a@x.com');
    const runner = await start();

    await runner.dispatch(typeText('g'));

    const state = runner.getState();
    expect(git.writes).toEqual([{ scope: 'global', identity: { name: 'Alice', email: 'a@x.com' } }]);
    expect(state.status).toBe('set global: Alice <a@x.com>');
    expect(state.authors.global).toEqual({ name: 'Alice', email: 'a@x.com' });
    expect(state.error).toBeUndefined();
  });

  it('surfaces the git failure detail and changes nothing else', async () => {
    await store.insert('Alice', 'a@x.com');
    const runner = await start();
    git.writeError = 'git config --local user.name Alice: error: could not lock config file';
    const before = runner.getState();

    await runner.dispatch(press('enter'));

    const after = runner.getState();
    expect(after.error).toBe('git config --local user.name Alice: error: could not lock config file');
    expect(after.status).toBe(before.status);
    expect(after.filter).toBe(before.filter);
    expect(after.authors).toEqual({});
  });

  it('reports a store timeout and keeps the form open', async () => {
    const slow: IdentityRepository = {
      list: () => store.list(),
      insert: async () => {
        throw new StoreTimeoutError(2000);
      },
      delete: (id) => store.delete(id),
      replace: (id, name, email) => store.replace(id, name, email),
      close: () => undefined
    };
    const runner = await start(slow);

    await dispatchAll(runner, typeText('a'), typeText('Carl'), press('enter'), typeText('c@x.com'), press('enter'));

    const state = runner.getState();
    expect(state.error).toBe('identity store busy for more than 2000ms');
    expect(state.mode).toBe('add');
    expect(allIdentities(state)).toEqual([]);
  });

  it('calls onQuit for q', async () => {
    const runner = await start();
    await runner.dispatch(typeText('q'));
    expect(onQuit).toHaveBeenCalledTimes(1);
  });

  it('handles events in dispatch order', async () => {
    await store.insert('Alice', 'a@x.com');
    const runner = await start();

    const first = runner.dispatch(press('erase'));
    const second = runner.dispatch(typeText('a'));
    await Promise.all([first, second]);

    expect(await store.list()).toEqual([]);
    expect(runner.getState().mode).toBe('add');
    expect(applyQuery(runner.getState().filter, '').view).toEqual([]);
  });
});
