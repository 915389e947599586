import { spawn } from 'node:child_process';
import fs from 'fs-extra';
import path from 'node:path';

import type { OperationLog } from './operation_log.js';

export interface CommandRunOptions {
  cwd?: string;
  /** Redirect the command's stdout into this file instead of the terminal. */
  stdoutFile?: string;
}

export interface CommandRunner {
  run(argv: readonly string[], options?: CommandRunOptions): Promise<void>;
}

export class CommandError extends Error {
  readonly argv: readonly string[];
  readonly exitCode: number | null;

  constructor(argv: readonly string[], exitCode: number | null, signal: string | null = null) {
    const status = signal ? `was killed by ${signal}` : `exited with status ${exitCode}`;
    super(`Command \`${argv.join(' ')}\` ${status}`);
    this.name = 'CommandError';
    this.argv = argv;
    this.exitCode = exitCode;
  }
}

async function spawnChecked(argv: readonly string[], options: CommandRunOptions): Promise<void> {
  const [command, ...args] = argv;
  if (!command) {
    throw new Error('Cannot run an empty command');
  }

  const stdoutFd = options.stdoutFile ? await fs.open(options.stdoutFile, 'w') : null;

  try {
    await new Promise<void>((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        stdio: ['ignore', stdoutFd ?? 'inherit', 'inherit']
      });

      child.once('error', reject);
      child.once('close', (code, signal) => {
        if (code === 0) {
          resolve();
          return;
        }
        reject(new CommandError(argv, code, signal));
      });
    });
  } finally {
    if (stdoutFd !== null) {
      await fs.close(stdoutFd);
    }
  }
}

/** Runs commands with inherited stdio and fails on a non-zero exit. */
export const processCommandRunner: CommandRunner = {
  run(argv, options = {}) {
    return spawnChecked(argv, options);
  }
};

async function isExecutableFile(candidate: string): Promise<boolean> {
  if (!(await fs.pathExists(candidate))) {
    return false;
  }

  const stat = await fs.stat(candidate);
  if (!stat.isFile()) {
    return false;
  }

  return fs.access(candidate, fs.constants.X_OK).then(
    () => true,
    () => false
  );
}

/** Looks `name` up on PATH the way a shell would; null when absent. */
export async function findExecutable(
  name: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<string | null> {
  const directories = (env.PATH ?? '').split(path.delimiter).filter((entry) => entry.length > 0);

  for (const directory of directories) {
    const candidate = path.join(directory, name);
    if (await isExecutableFile(candidate)) {
      return candidate;
    }
  }

  return null;
}

export interface CommandContext {
  runner: CommandRunner;
  log: OperationLog;
  /** Directory the commands run in. */
  cwd: string;
  env?: NodeJS.ProcessEnv;
}

export async function runLogged(
  context: CommandContext,
  argv: string[],
  options: Omit<CommandRunOptions, 'cwd'> = {}
): Promise<void> {
  context.log.command(argv);
  await context.runner.run(argv, { ...options, cwd: context.cwd });
}

/** What every update workflow needs to reach the tree and run tools. */
export interface WorkflowContext {
  /** This checkout; git commands run here. */
  prebuiltsDir: string;
  androidDir: string;
  runner: CommandRunner;
  log: OperationLog;
  env?: NodeJS.ProcessEnv;
}

export function commandContext(workflow: WorkflowContext): CommandContext {
  return {
    runner: workflow.runner,
    log: workflow.log,
    cwd: workflow.prebuiltsDir,
    env: workflow.env
  };
}
