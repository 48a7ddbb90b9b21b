import { parseArgs } from 'node:util';
import { render, type Instance } from 'ink';
import { App } from './app';
import { errorMessage } from './errors';
import { createGitBridge, createGitRunner } from './git';
import { hydrateFromGit } from './hydrate';
import { IdentityStore } from './identity-store';
import { consoleSink, createOutputChannel, fileSink, type LogSink } from './log';
import { createSessionRunner, loadInitialSession } from './session-runner';
import { getActionTimeoutMs, getGitPath, getLogFile, getStorePath, isHydrateOnStartupEnabled } from './settings';

const USAGE = 'usage: git-identities [--init-db]';
const ENTER_ALT_SCREEN = '\u001b[?1049h';
const LEAVE_ALT_SCREEN = '\u001b[?1049l';

const parseFlags = (argv: string[]): { initDb: boolean } | undefined => {
  try {
    const { values } = parseArgs({
      args: argv,
      options: { 'init-db': { type: 'boolean', default: false } },
      strict: true,
      allowPositionals: false
    });
    return { initDb: values['init-db'] === true };
  } catch (error) {
    console.error(`git-identities: ${errorMessage(error)}\n${USAGE}`);
    return undefined;
  }
};

export const main = async (argv: string[] = process.argv.slice(2)): Promise<number> => {
  const flags = parseFlags(argv);
  if (!flags) {
    return 2;
  }

  const logFailures: unknown[] = [];
  const sinks: LogSink[] = [fileSink(getLogFile(), (error) => logFailures.push(error))];
  if (flags.initDb) {
    sinks.push(consoleSink);
  }
  const log = createOutputChannel('git-identities', sinks);

  const store = await IdentityStore.open({ filename: getStorePath(), timeoutMs: getActionTimeoutMs() });
  log.info(`opened ${getStorePath()}`);

  try {
    const git = createGitBridge({
      cwd: process.cwd(),
      timeoutMs: getActionTimeoutMs(),
      run: createGitRunner(getGitPath())
    });

    if (flags.initDb) {
      const { inserted } = await hydrateFromGit(store, git, log.child('hydrate'));
      const stored = await store.list();
      log.info(`database initialized from current git config: ${inserted.length} added, ${stored.length} stored`);
      return 0;
    }

    if (isHydrateOnStartupEnabled()) {
      await hydrateFromGit(store, git, log.child('hydrate'));
    }

    const initial = await loadInitialSession(store, git);
    let app: Instance | undefined;
    const session = createSessionRunner(initial, {
      store,
      git,
      log: log.child('session'),
      onQuit: () => app?.unmount()
    });

    process.stdout.write(ENTER_ALT_SCREEN);
    try {
      app = render(<App session={session} />, { exitOnCtrlC: false });
      await app.waitUntilExit();
    } finally {
      process.stdout.write(LEAVE_ALT_SCREEN);
    }
    return 0;
  } finally {
    store.close();
    for (const failure of logFailures) {
      console.error(`git-identities: log file unavailable: ${errorMessage(failure)}`);
    }
  }
};

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(`git-identities: ${errorMessage(error)}`);
    process.exitCode = 1;
  }
);
