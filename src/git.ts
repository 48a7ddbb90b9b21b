import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { ExternalToolError, errorMessage } from './errors';
import { getMissingFields } from './identity';
import type { Identity, Scope } from './types';

const execFileAsync = promisify(execFile);

export type GitOutput = { stdout: string; stderr: string };

export type GitRunOptions = { cwd: string; timeoutMs: number };

export type GitRunner = (args: string[], options: GitRunOptions) => Promise<GitOutput>;

export type GitAuthorKey = 'user.name' | 'user.email';

/**
 * Narrow port over git's author configuration. The session only ever talks to
 * git through this interface.
 */
export interface GitConfigBridge {
  isInsideWorkTree(): Promise<boolean>;
  readAuthor(scope: Scope): Promise<Identity | undefined>;
  writeAuthor(scope: Scope, identity: Identity): Promise<void>;
}

export type GitBridgeOptions = {
  cwd: string;
  timeoutMs: number;
  run?: GitRunner;
};

export const createGitRunner = (gitPath = 'git'): GitRunner => {
  return async (args, { cwd, timeoutMs }) => {
    const { stdout, stderr } = await execFileAsync(gitPath, args, { cwd, timeout: timeoutMs });
    return { stdout, stderr };
  };
};

export const describeGitFailure = (args: string[], error: unknown, timeoutMs: number): string => {
  const command = `git ${args.join(' ')}`;
  if (error instanceof Error) {
    if ('killed' in error && error.killed === true) {
      return `${command}: timed out after ${timeoutMs}ms`;
    }
    if ('code' in error && error.code === 'ENOENT') {
      return `${command}: git executable not found`;
    }
    const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr.trim() : '';
    if (stderr.length > 0) {
      return `${command}: ${stderr}`;
    }
  }
  return `${command}: ${errorMessage(error)}`;
};

export const createGitBridge = ({ cwd, timeoutMs, run = createGitRunner() }: GitBridgeOptions): GitConfigBridge => {
  const runGit = (args: string[]): Promise<GitOutput> => run(args, { cwd, timeoutMs });

  const isInsideWorkTree = async (): Promise<boolean> => {
    try {
      const { stdout } = await runGit(['rev-parse', '--is-inside-work-tree']);
      return stdout.trim() === 'true';
    } catch {
      return false;
    }
  };

  const readGitValue = async (scope: Scope, key: GitAuthorKey): Promise<string> => {
    try {
      const { stdout } = await runGit(['config', `--${scope}`, '--get', key]);
      return stdout.trim();
    } catch {
      return '';
    }
  };

  const readAuthor = async (scope: Scope): Promise<Identity | undefined> => {
    if (scope === 'local' && !(await isInsideWorkTree())) {
      return undefined;
    }

    const name = await readGitValue(scope, 'user.name');
    const email = await readGitValue(scope, 'user.email');
    const identity = { name, email };
    return getMissingFields(identity).length === 0 ? identity : undefined;
  };

  const writeGitValue = async (scope: Scope, key: GitAuthorKey, value: string): Promise<void> => {
    const args = ['config', `--${scope}`, key, value];
    try {
      await runGit(args);
    } catch (error) {
      throw new ExternalToolError(describeGitFailure(args, error, timeoutMs), { cause: error });
    }
  };

  const writeAuthor = async (scope: Scope, identity: Identity): Promise<void> => {
    await writeGitValue(scope, 'user.name', identity.name);
    await writeGitValue(scope, 'user.email', identity.email);
  };

  return { isInsideWorkTree, readAuthor, writeAuthor };
};
