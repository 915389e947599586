import fg from 'fast-glob';
import fs from 'fs-extra';
import path from 'node:path';

import { parseCliArguments } from './cli_args.js';
import { consoleOperationLog } from './operation_log.js';
import { ANDROID_DIR, PREBUILTS_NDK_DIR, androidPath } from './paths.js';
import { parsePlatformToken } from './platforms/names.js';
import { commandContext, processCommandRunner, type WorkflowContext } from './process.js';
import { NDK_HOSTS, type NdkHost } from './update_gcc.js';
import { gitAdd, gitCommit, gitRemove, startBranch } from './vcs.js';

const PREBUILT_HOST_BY_HOST: Record<NdkHost, string> = {
  'darwin-x86_64': 'darwin-x86',
  'linux-x86_64': 'linux-x86',
  windows: 'windows-x86_32',
  'windows-x86_64': 'windows-x86'
};

export function prebuiltHost(host: NdkHost): string {
  return PREBUILT_HOST_BY_HOST[host];
}

/**
 * Highest numeric `clang-<n>` directory under `clangHostDir`. Revision-style
 * names such as `clang-r416183b` are ignored.
 */
export async function latestClangBuild(clangHostDir: string): Promise<string> {
  const names = await fg('clang-*', {
    cwd: clangHostDir,
    onlyFiles: false,
    deep: 1
  });

  const builds = names
    .map((name) => parsePlatformToken(name.slice('clang-'.length)))
    .flatMap((token) => (token.kind === 'numeric' ? [token.level] : []));

  if (builds.length === 0) {
    throw new Error(`No numeric clang-* builds found in ${clangHostDir}`);
  }

  return String(Math.max(...builds));
}

export interface SymlinkClangArgs {
  build: string | null;
  useCurrentBranch: boolean;
}

export function parseSymlinkClangArgs(argv: string[]): SymlinkClangArgs {
  const parsed = parseCliArguments(argv, {
    booleanFlags: ['use-current-branch'],
    maxPositionals: 1
  });

  return {
    build: parsed.positionals[0] ?? null,
    useCurrentBranch: parsed.flags.has('use-current-branch')
  };
}

async function linkExists(linkPath: string): Promise<boolean> {
  try {
    await fs.lstat(linkPath);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

export async function symlinkClang(
  args: SymlinkClangArgs,
  context: WorkflowContext
): Promise<void> {
  const { androidDir, log } = context;
  const commands = commandContext(context);

  const clangHostDir = androidPath(androidDir, 'prebuilts', 'clang', 'host');
  const build = args.build ?? (await latestClangBuild(path.join(clangHostDir, 'linux-x86')));

  if (!args.useCurrentBranch) {
    await startBranch(commands, androidDir, `update-clang-${build}`);
  }

  for (const host of NDK_HOSTS) {
    const installPath = androidPath(
      androidDir,
      'prebuilts',
      'ndk',
      'current',
      'toolchains',
      host,
      'llvm'
    );
    if (await linkExists(installPath)) {
      log.info(`Removing old Clang link for ${host}...`);
      await gitRemove(commands, installPath, []);
    }

    const prebuiltPath = path.join(clangHostDir, prebuiltHost(host), `clang-${build}`);
    const relativePath = path.relative(path.dirname(installPath), prebuiltPath);

    log.info(`Linking ${host} clang-${build}...`);
    log.symlink(installPath, relativePath);
    await fs.symlink(relativePath, installPath);

    log.info(`Adding ${host} link to index...`);
    await gitAdd(commands, installPath);
  }

  log.info('Committing update...');
  await gitCommit(commands, `Update prebuilt Clang to build ${build}.`);
}

export async function runSymlinkClangCli(argv: string[] = process.argv.slice(2)): Promise<void> {
  await symlinkClang(parseSymlinkClangArgs(argv), {
    prebuiltsDir: PREBUILTS_NDK_DIR,
    androidDir: ANDROID_DIR,
    runner: processCommandRunner,
    log: consoleOperationLog
  });
}
