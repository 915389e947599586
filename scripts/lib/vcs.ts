import fs from 'fs-extra';
import path from 'node:path';

import { findExecutable, runLogged, type CommandContext } from './process.js';

/** True when the Android checkout is managed by pore rather than repo. */
export async function inPoreTree(androidDir: string): Promise<boolean> {
  return fs.pathExists(path.join(androidDir, '.pore'));
}

export async function startBranchCommand(
  androidDir: string,
  name: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<string[]> {
  if (!(await inPoreTree(androidDir))) {
    return ['repo', 'start', name, '.'];
  }

  const pore = await findExecutable('pore', env);
  if (pore === null) {
    throw new Error('Could not find pore in PATH.');
  }
  return [pore, 'start', name];
}

export async function startBranch(
  context: CommandContext,
  androidDir: string,
  name: string
): Promise<void> {
  await runLogged(context, await startBranchCommand(androidDir, name, context.env));
}

export async function gitRemove(
  context: CommandContext,
  targetPath: string,
  flags: string[] = ['-r', '--ignore-unmatch']
): Promise<void> {
  await runLogged(context, ['git', 'rm', ...flags, targetPath]);
}

export async function gitAdd(context: CommandContext, targetPath: string): Promise<void> {
  await runLogged(context, ['git', 'add', targetPath]);
}

export async function gitCommit(context: CommandContext, message: string): Promise<void> {
  await runLogged(context, ['git', 'commit', '-m', message]);
}
