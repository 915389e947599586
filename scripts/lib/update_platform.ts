import fs from 'fs-extra';
import path from 'node:path';

import { extractArchive, fetchArtifact } from './build_server.js';
import { assertExclusiveFlags, parseCliArguments } from './cli_args.js';
import { consoleOperationLog } from './operation_log.js';
import { loadPlatformsMetadata } from './platforms/metadata.js';
import { reconcilePlatforms } from './platforms/reconcile.js';
import { verifyAllNumeric } from './platforms/verify.js';
import { commandContext, processCommandRunner, type WorkflowContext } from './process.js';
import { ANDROID_DIR, PREBUILTS_NDK_DIR, defaultPlatformsMetadataPath } from './paths.js';
import { interactivePromptAdapter, type PromptAdapter } from './prompts.js';
import { gitAdd, gitCommit, gitRemove, startBranch } from './vcs.js';

export const PLATFORM_PACKAGE_NAME = 'ndk_platform.tar.bz2';
export const PLATFORM_INSTALL_DIR = 'platform';

export interface UpdatePlatformArgs {
  /** Build number, or a local artifact path with `--no-download`. */
  build: string | null;
  download: boolean;
  branch: string;
  bug: string;
  useCurrentBranch: boolean;
  metadataPath: string | null;
}

export function parseUpdatePlatformArgs(argv: string[]): UpdatePlatformArgs {
  const parsed = parseCliArguments(argv, {
    booleanFlags: ['download', 'no-download', 'use-current-branch'],
    valueOptions: ['branch', 'bug', 'metadata'],
    aliases: { '-b': 'bug' },
    maxPositionals: 1
  });
  assertExclusiveFlags(parsed, ['download', 'no-download']);

  return {
    build: parsed.positionals[0] ?? null,
    download: !parsed.flags.has('no-download'),
    branch: parsed.options.get('branch') ?? 'aosp-master',
    bug: parsed.options.get('bug') ?? 'None',
    useCurrentBranch: parsed.flags.has('use-current-branch'),
    metadataPath: parsed.options.get('metadata') ?? null
  };
}

export function platformCommitMessage(download: boolean, build: string, bug: string): string {
  const updateMessage = download ? `to build ${build}` : 'with local artifact';
  return [
    `Update NDK platform prebuilts ${updateMessage}.`,
    '',
    'Test: ndk/checkbuild.py && ndk/run_tests.py',
    `Bug: ${bug}`,
    ''
  ].join('\n');
}

export interface UpdatePlatformRequest extends Omit<UpdatePlatformArgs, 'build'> {
  build: string;
}

/**
 * Replaces `platform/` with the contents of an NDK platform package and
 * commits the result. The platform directories are reconciled against the
 * platforms metadata and verified numeric before anything is staged.
 */
export async function updatePlatform(
  request: UpdatePlatformRequest,
  context: WorkflowContext
): Promise<void> {
  const { log, prebuiltsDir } = context;
  const commands = commandContext(context);

  const platforms = loadPlatformsMetadata(
    request.metadataPath ?? defaultPlatformsMetadataPath(context.androidDir)
  );

  let packagePath: string;
  if (request.download) {
    packagePath = path.join(prebuiltsDir, PLATFORM_PACKAGE_NAME);
  } else {
    packagePath = path.resolve(request.build);
    log.info(`Using local artifact at ${packagePath}`);
  }

  if (!request.useCurrentBranch) {
    const suffix = request.download ? request.build : 'local';
    await startBranch(commands, context.androidDir, `update-platform-${suffix}`);
  }

  const installPath = path.join(prebuiltsDir, PLATFORM_INSTALL_DIR);
  await gitRemove(commands, PLATFORM_INSTALL_DIR);
  if (await fs.pathExists(installPath)) {
    log.removeTree(installPath);
    await fs.remove(installPath);
  }
  log.makeDirs(installPath);
  await fs.ensureDir(installPath);

  if (request.download) {
    await fetchArtifact(commands, {
      branch: request.branch,
      target: 'ndk',
      build: request.build,
      pattern: PLATFORM_PACKAGE_NAME
    });
  }

  await extractArchive(commands, packagePath, installPath, 1);

  if (request.download) {
    log.removeFile(packagePath);
    await fs.remove(packagePath);
  }

  // NOTICE sits at the package root, but only sysroot/ is installed as the
  // NDK sysroot; platforms/ is build input.
  const noticeFrom = path.join(installPath, 'NOTICE');
  const noticeTo = path.join(installPath, 'sysroot', 'NOTICE');
  log.rename(noticeFrom, noticeTo);
  await fs.rename(noticeFrom, noticeTo);

  const platformsRoot = path.join(installPath, 'platforms');
  reconcilePlatforms(platformsRoot, platforms, { log });
  verifyAllNumeric(platformsRoot);

  await gitAdd(commands, PLATFORM_INSTALL_DIR);
  await gitCommit(commands, platformCommitMessage(request.download, request.build, request.bug));
}

export async function resolvePlatformBuild(
  args: UpdatePlatformArgs,
  prompt: PromptAdapter,
  interactive: boolean
): Promise<string> {
  if (args.build !== null) {
    return args.build;
  }

  if (!interactive) {
    throw new Error('Missing BUILD_OR_ARTIFACT argument');
  }

  const build = await prompt.input({
    message: args.download
      ? 'Build number to pull from the build server:'
      : 'Path to a local platform artifact:'
  });
  if (!build) {
    throw new Error('Missing BUILD_OR_ARTIFACT argument');
  }
  return build;
}

export async function runUpdatePlatformCli(
  argv: string[] = process.argv.slice(2),
  prompt: PromptAdapter = interactivePromptAdapter
): Promise<void> {
  const args = parseUpdatePlatformArgs(argv);
  const build = await resolvePlatformBuild(args, prompt, Boolean(process.stdin.isTTY));

  await updatePlatform(
    { ...args, build },
    {
      prebuiltsDir: PREBUILTS_NDK_DIR,
      androidDir: ANDROID_DIR,
      runner: processCommandRunner,
      log: consoleOperationLog
    }
  );
}
