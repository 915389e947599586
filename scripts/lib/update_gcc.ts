import fs from 'fs-extra';
import path from 'node:path';

import { extractArchive } from './build_server.js';
import { parseCliArguments } from './cli_args.js';
import { consoleOperationLog } from './operation_log.js';
import { ANDROID_DIR, PREBUILTS_NDK_DIR } from './paths.js';
import {
  commandContext,
  processCommandRunner,
  runLogged,
  type WorkflowContext
} from './process.js';
import { gitAdd, gitCommit, gitRemove, startBranch } from './vcs.js';

export const NDK_HOSTS = ['darwin-x86_64', 'linux-x86_64', 'windows', 'windows-x86_64'] as const;
export type NdkHost = (typeof NDK_HOSTS)[number];

export const GCC_ARCHITECTURES = ['arm', 'arm64', 'mips', 'mips64', 'x86', 'x86_64'] as const;
export type GccArchitecture = (typeof GCC_ARCHITECTURES)[number];

export const GCC_VERSION = '4.9';
export const BUILD_SERVER_URL = 'https://android-build-uber.corp.google.com';
const DOWNLOAD_TIMEOUT_SECONDS = '60';
const DOWNLOAD_DIR = '.download';
const INSTALL_DIR = 'current';

const TOOLCHAIN_BY_ARCH: Record<GccArchitecture, string> = {
  arm: 'arm-linux-androideabi',
  arm64: 'aarch64-linux-android',
  mips: 'mipsel-linux-android',
  mips64: 'mips64el-linux-android',
  x86: 'x86',
  x86_64: 'x86_64'
};

// Windows packages are built on Linux.
const BUILD_HOST_BY_HOST: Record<NdkHost, string> = {
  'darwin-x86_64': 'mac',
  'linux-x86_64': 'linux',
  windows: 'linux',
  'windows-x86_64': 'linux'
};

const BUILD_NAME_PREFIX_BY_HOST: Record<Exclude<NdkHost, 'darwin-x86_64'>, string> = {
  'linux-x86_64': 'linux',
  windows: 'win',
  'windows-x86_64': 'win64'
};

export function archToToolchain(arch: GccArchitecture): string {
  return TOOLCHAIN_BY_ARCH[arch];
}

export function hostToBuildHost(host: NdkHost): string {
  return BUILD_HOST_BY_HOST[host];
}

/** Build target name on the build server, e.g. `win_x86`; Darwin builds use the bare arch. */
export function gccBuildName(host: NdkHost, arch: GccArchitecture): string {
  if (host === 'darwin-x86_64') {
    return arch;
  }
  return `${BUILD_NAME_PREFIX_BY_HOST[host]}_${arch}`;
}

export function gccPackageName(host: NdkHost, arch: GccArchitecture): string {
  return `gcc-${arch}-${host}.tar.bz2`;
}

export function gccDownloadUrl(
  branch: string,
  host: NdkHost,
  arch: GccArchitecture,
  build: string,
  baseUrl: string = BUILD_SERVER_URL
): string {
  const target = `${branch}-${hostToBuildHost(host)}-${gccBuildName(host, arch)}`;
  return `${baseUrl}/builds/${target}/${build}/${gccPackageName(host, arch)}`;
}

export interface UpdateGccArgs {
  build: string;
  branch: string;
  useCurrentBranch: boolean;
}

export function parseUpdateGccArgs(argv: string[]): UpdateGccArgs {
  const parsed = parseCliArguments(argv, {
    booleanFlags: ['use-current-branch'],
    valueOptions: ['branch'],
    maxPositionals: 1
  });

  const build = parsed.positionals[0];
  if (build === undefined) {
    throw new Error('Missing BUILD argument');
  }

  return {
    build,
    branch: parsed.options.get('branch') ?? 'aosp-gcc',
    useCurrentBranch: parsed.flags.has('use-current-branch')
  };
}

interface DownloadedPackage {
  host: NdkHost;
  arch: GccArchitecture;
  packagePath: string;
}

export async function updateGcc(args: UpdateGccArgs, context: WorkflowContext): Promise<void> {
  const { log, prebuiltsDir } = context;
  const commands = commandContext(context);

  if (!args.useCurrentBranch) {
    await startBranch(commands, context.androidDir, `update-gcc-${args.build}`);
  }

  const downloadDir = path.join(prebuiltsDir, DOWNLOAD_DIR);
  if (await fs.pathExists(downloadDir)) {
    log.removeTree(downloadDir);
    await fs.remove(downloadDir);
  }
  log.makeDirs(downloadDir);
  await fs.ensureDir(downloadDir);

  const packages: DownloadedPackage[] = [];
  for (const host of NDK_HOSTS) {
    for (const arch of GCC_ARCHITECTURES) {
      const url = gccDownloadUrl(args.branch, host, arch, args.build);
      const packagePath = path.join(downloadDir, gccPackageName(host, arch));
      log.info(`Downloading ${url} to ${packagePath}`);
      await runLogged(
        commands,
        ['sso_client', '--location', '--request_timeout', DOWNLOAD_TIMEOUT_SECONDS, url],
        { stdoutFile: packagePath }
      );
      packages.push({ host, arch, packagePath });
    }
  }

  const installSubdir = path.join(INSTALL_DIR, 'toolchains');
  for (const { host, arch, packagePath } of packages) {
    const toolchain = `${archToToolchain(arch)}-${GCC_VERSION}`;
    const toolchainPath = path.join(installSubdir, host, toolchain);
    const absoluteToolchainPath = path.join(prebuiltsDir, toolchainPath);

    if (await fs.pathExists(absoluteToolchainPath)) {
      log.info(`Removing old ${host} ${toolchain}...`);
      await gitRemove(commands, toolchainPath, ['-rf', '--ignore-unmatch']);

      // git rm leaves empty directories behind.
      if (await fs.pathExists(absoluteToolchainPath)) {
        log.removeTree(absoluteToolchainPath);
        await fs.remove(absoluteToolchainPath);
      }
    }

    const hostDir = path.join(prebuiltsDir, installSubdir, host);
    await fs.ensureDir(hostDir);

    log.info(`Extracting ${packagePath}...`);
    await extractArchive(commands, packagePath, hostDir);

    log.info(`Adding ${host} ${toolchain} files to index...`);
    await gitAdd(commands, toolchainPath);
  }

  log.info('Committing update...');
  await gitCommit(commands, `Update prebuilt GCC to build ${args.build}.`);

  log.removeTree(downloadDir);
  await fs.remove(downloadDir);
}

export async function runUpdateGccCli(argv: string[] = process.argv.slice(2)): Promise<void> {
  await updateGcc(parseUpdateGccArgs(argv), {
    prebuiltsDir: PREBUILTS_NDK_DIR,
    androidDir: ANDROID_DIR,
    runner: processCommandRunner,
    log: consoleOperationLog
  });
}
