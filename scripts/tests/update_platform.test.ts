import assert from 'node:assert/strict';
import fs from 'fs-extra';
import path from 'node:path';
import test from 'node:test';

import { AliasCollisionError, MetadataFormatError } from '../lib/platforms/errors.js';
import type { CommandRunOptions } from '../lib/process.js';
import type { PromptAdapter } from '../lib/prompts.js';
import {
  platformCommitMessage,
  resolvePlatformBuild,
  updatePlatform,
  type UpdatePlatformArgs,
  type UpdatePlatformRequest
} from '../lib/update_platform.js';
import { MockCommandRunner, RecordingOperationLog } from './fakes.js';
import { listDirectoryNames, seedPlatformDirectories, withTempDir, writeFixtureFile } from './test_fs.js';

const DEFAULT_REQUEST: UpdatePlatformRequest = {
  build: '9000',
  download: true,
  branch: 'aosp-master',
  bug: 'None',
  useCurrentBranch: false,
  metadataPath: null
};

interface Checkout {
  androidDir: string;
  prebuiltsDir: string;
  binDir: string;
}

async function seedCheckout(root: string): Promise<Checkout> {
  const prebuiltsDir = path.join(root, 'prebuilts', 'ndk');
  const binDir = path.join(root, 'bin');
  await fs.ensureDir(prebuiltsDir);
  await writeFixtureFile(
    root,
    'ndk/meta/platforms.json',
    `{ "min": 21, "max": 33, "aliases": { "Q": 29 } }`
  );
  await writeFixtureFile(root, 'bin/fetch_artifact', '#!/bin/sh');
  await fs.chmod(path.join(binDir, 'fetch_artifact'), 0o755);
  return { androidDir: root, prebuiltsDir, binDir };
}

function extractPlatformPackage(platforms: string[]) {
  return async (argv: readonly string[]): Promise<void> => {
    const destination = argv[argv.indexOf('-C') + 1];
    await writeFixtureFile(destination, 'NOTICE', 'license text');
    await writeFixtureFile(destination, 'sysroot/usr/include/stdio.h', '#pragma once');
    await seedPlatformDirectories(path.join(destination, 'platforms'), platforms);
  };
}

async function downloadPlatformPackage(
  _argv: readonly string[],
  options: CommandRunOptions
): Promise<void> {
  await writeFixtureFile(options.cwd ?? '.', 'ndk_platform.tar.bz2', 'archive');
}

test('platformCommitMessage names the build and bug', () => {
  assert.equal(
    platformCommitMessage(true, '9000', 'b/1'),
    'Update NDK platform prebuilts to build 9000.\n\nTest: ndk/checkbuild.py && ndk/run_tests.py\nBug: b/1\n'
  );
  assert.equal(
    platformCommitMessage(false, '/tmp/pkg.tar.bz2', 'None'),
    'Update NDK platform prebuilts with local artifact.\n\nTest: ndk/checkbuild.py && ndk/run_tests.py\nBug: None\n'
  );
});

test('updatePlatform downloads, extracts, reconciles and commits', async () => {
  await withTempDir('update-platform-download-', async (root) => {
    const { androidDir, prebuiltsDir, binDir } = await seedCheckout(root);
    await writeFixtureFile(prebuiltsDir, 'platform/stale.txt', 'old');

    const runner = new MockCommandRunner({
      fetch_artifact: downloadPlatformPackage,
      tar: extractPlatformPackage(['android-16', 'android-21', 'android-Q', 'android-Weird'])
    });
    const log = new RecordingOperationLog();

    await updatePlatform(DEFAULT_REQUEST, {
      prebuiltsDir,
      androidDir,
      runner,
      log,
      env: { PATH: binDir }
    });

    const installPath = path.join(prebuiltsDir, 'platform');
    const packagePath = path.join(prebuiltsDir, 'ndk_platform.tar.bz2');
    assert.deepEqual(runner.commands(), [
      ['repo', 'start', 'update-platform-9000', '.'],
      ['git', 'rm', '-r', '--ignore-unmatch', 'platform'],
      [
        path.join(binDir, 'fetch_artifact'),
        '--use_oauth2',
        '--branch',
        'aosp-master',
        '--target=ndk',
        '--bid',
        '9000',
        'ndk_platform.tar.bz2'
      ],
      ['tar', 'xf', packagePath, '--strip-components=1', '-C', installPath],
      ['git', 'add', 'platform'],
      ['git', 'commit', '-m', platformCommitMessage(true, '9000', 'None')]
    ]);
    assert.ok(runner.calls.every((call) => call.options.cwd === prebuiltsDir));

    assert.deepEqual(await listDirectoryNames(installPath), ['platforms', 'sysroot']);
    assert.deepEqual(await listDirectoryNames(path.join(installPath, 'platforms')), [
      'android-21',
      'android-29'
    ]);
    assert.equal(
      await fs.readFile(path.join(installPath, 'sysroot', 'NOTICE'), 'utf8'),
      'license text\n'
    );
    assert.equal(await fs.pathExists(packagePath), false);

    assert.deepEqual(
      log.operations.filter((entry) => entry.op !== 'command'),
      [
        { op: 'removeTree', path: installPath },
        { op: 'makeDirs', path: installPath },
        { op: 'removeFile', path: packagePath },
        {
          op: 'rename',
          from: path.join(installPath, 'NOTICE'),
          to: path.join(installPath, 'sysroot', 'NOTICE')
        },
        { op: 'removeTree', path: path.join(installPath, 'platforms', 'android-16') },
        {
          op: 'rename',
          from: path.join(installPath, 'platforms', 'android-Q'),
          to: path.join(installPath, 'platforms', 'android-29')
        },
        { op: 'removeTree', path: path.join(installPath, 'platforms', 'android-Weird') }
      ]
    );
  });
});

test('updatePlatform installs a local artifact on the current branch', async () => {
  await withTempDir('update-platform-local-', async (root) => {
    const { androidDir, prebuiltsDir } = await seedCheckout(root);
    const artifact = path.join(root, 'ndk_platform.tar.bz2');
    await writeFixtureFile(root, 'ndk_platform.tar.bz2', 'archive');

    const runner = new MockCommandRunner({ tar: extractPlatformPackage(['android-30']) });
    const log = new RecordingOperationLog();

    await updatePlatform(
      { ...DEFAULT_REQUEST, build: artifact, download: false, useCurrentBranch: true, bug: 'b/7' },
      { prebuiltsDir, androidDir, runner, log, env: { PATH: '' } }
    );

    const installPath = path.join(prebuiltsDir, 'platform');
    assert.deepEqual(runner.commands(), [
      ['git', 'rm', '-r', '--ignore-unmatch', 'platform'],
      ['tar', 'xf', artifact, '--strip-components=1', '-C', installPath],
      ['git', 'add', 'platform'],
      ['git', 'commit', '-m', platformCommitMessage(false, artifact, 'b/7')]
    ]);
    assert.equal(await fs.pathExists(artifact), true);
    assert.deepEqual(log.messages(), [`Using local artifact at ${artifact}`]);
  });
});

test('updatePlatform starts the branch through pore in a pore tree', async () => {
  await withTempDir('update-platform-pore-', async (root) => {
    const { androidDir, prebuiltsDir, binDir } = await seedCheckout(root);
    await fs.ensureDir(path.join(root, '.pore'));
    await writeFixtureFile(root, 'bin/pore', '#!/bin/sh');
    await fs.chmod(path.join(binDir, 'pore'), 0o755);

    const runner = new MockCommandRunner({
      fetch_artifact: downloadPlatformPackage,
      tar: extractPlatformPackage(['android-21'])
    });

    await updatePlatform(DEFAULT_REQUEST, {
      prebuiltsDir,
      androidDir,
      runner,
      log: new RecordingOperationLog(),
      env: { PATH: binDir }
    });

    assert.deepEqual(runner.commands()[0], [path.join(binDir, 'pore'), 'start', 'update-platform-9000']);
  });
});

test('updatePlatform fails before touching anything when the metadata is invalid', async () => {
  await withTempDir('update-platform-bad-metadata-', async (root) => {
    const { androidDir, prebuiltsDir } = await seedCheckout(root);
    await writeFixtureFile(root, 'ndk/meta/platforms.json', `{ "min": 21, "aliases": {} }`);
    const runner = new MockCommandRunner();

    await assert.rejects(
      updatePlatform(DEFAULT_REQUEST, {
        prebuiltsDir,
        androidDir,
        runner,
        log: new RecordingOperationLog()
      }),
      MetadataFormatError
    );
    assert.deepEqual(runner.calls, []);
  });
});

test('updatePlatform does not stage or commit after an alias collision', async () => {
  await withTempDir('update-platform-collision-', async (root) => {
    const { androidDir, prebuiltsDir, binDir } = await seedCheckout(root);
    const runner = new MockCommandRunner({
      fetch_artifact: downloadPlatformPackage,
      tar: extractPlatformPackage(['android-29', 'android-Q'])
    });

    await assert.rejects(
      updatePlatform(
        { ...DEFAULT_REQUEST, useCurrentBranch: true },
        { prebuiltsDir, androidDir, runner, log: new RecordingOperationLog(), env: { PATH: binDir } }
      ),
      AliasCollisionError
    );

    assert.deepEqual(
      runner.commands().map((argv) => argv.slice(0, 2)),
      [
        ['git', 'rm'],
        [path.join(binDir, 'fetch_artifact'), '--use_oauth2'],
        ['tar', 'xf']
      ]
    );
  });
});

test('updatePlatform explains how to install fetch_artifact when it is missing', async () => {
  await withTempDir('update-platform-no-fetch-', async (root) => {
    const { androidDir, prebuiltsDir } = await seedCheckout(root);
    const runner = new MockCommandRunner();

    await assert.rejects(
      updatePlatform(
        { ...DEFAULT_REQUEST, useCurrentBranch: true },
        { prebuiltsDir, androidDir, runner, log: new RecordingOperationLog(), env: { PATH: '' } }
      ),
      /cannot find fetch_artifact in PATH/
    );
  });
});

class MockPromptAdapter implements PromptAdapter {
  readonly inputCalls: Array<{ message: string; defaultValue?: string }> = [];

  constructor(private readonly answer: string) {}

  async input(options: { message: string; defaultValue?: string }): Promise<string> {
    this.inputCalls.push(options);
    return this.answer;
  }
}

const NO_BUILD: UpdatePlatformArgs = { ...DEFAULT_REQUEST, build: null };

test('resolvePlatformBuild prompts for a missing build on a terminal', async () => {
  const prompt = new MockPromptAdapter('9001');
  assert.equal(await resolvePlatformBuild(NO_BUILD, prompt, true), '9001');
  assert.deepEqual(prompt.inputCalls, [{ message: 'Build number to pull from the build server:' }]);
});

test('resolvePlatformBuild keeps an explicit build and never prompts', async () => {
  const prompt = new MockPromptAdapter('unused');
  assert.equal(await resolvePlatformBuild({ ...NO_BUILD, build: '42' }, prompt, true), '42');
  assert.deepEqual(prompt.inputCalls, []);
});

test('resolvePlatformBuild fails without a terminal or an answer', async () => {
  await assert.rejects(
    resolvePlatformBuild(NO_BUILD, new MockPromptAdapter('9001'), false),
    /Missing BUILD_OR_ARTIFACT argument/
  );
  await assert.rejects(
    resolvePlatformBuild(NO_BUILD, new MockPromptAdapter(''), true),
    /Missing BUILD_OR_ARTIFACT argument/
  );
});
