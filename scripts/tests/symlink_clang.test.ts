import assert from 'node:assert/strict';
import fs from 'fs-extra';
import path from 'node:path';
import test from 'node:test';

import { latestClangBuild, prebuiltHost, symlinkClang } from '../lib/symlink_clang.js';
import { MockCommandRunner, RecordingOperationLog } from './fakes.js';
import { withTempDir } from './test_fs.js';

test('latestClangBuild picks the highest numeric clang build', async () => {
  await withTempDir('clang-latest-', async (root) => {
    for (const name of ['clang-2690385', 'clang-3859424', 'clang-r416183b', 'clang-stable', 'other']) {
      await fs.ensureDir(path.join(root, name));
    }

    assert.equal(await latestClangBuild(root), '3859424');
  });
});

test('latestClangBuild fails when no numeric build exists', async () => {
  await withTempDir('clang-none-', async (root) => {
    await fs.ensureDir(path.join(root, 'clang-r1'));
    await assert.rejects(latestClangBuild(root), /No numeric clang-\* builds found/);
  });
});

test('prebuiltHost maps NDK host tags to prebuilt host tags', () => {
  assert.equal(prebuiltHost('windows'), 'windows-x86_32');
  assert.equal(prebuiltHost('darwin-x86_64'), 'darwin-x86');
});

test('symlinkClang relinks every host to the latest build and commits', async () => {
  await withTempDir('clang-symlink-', async (root) => {
    const toolchains = path.join(root, 'prebuilts', 'ndk', 'current', 'toolchains');
    for (const host of ['darwin-x86_64', 'linux-x86_64', 'windows', 'windows-x86_64']) {
      await fs.ensureDir(path.join(toolchains, host));
    }
    await fs.ensureDir(path.join(root, 'prebuilts/clang/host/linux-x86/clang-100'));
    await fs.ensureDir(path.join(root, 'prebuilts/clang/host/linux-x86/clang-200'));
    const linuxLink = path.join(toolchains, 'linux-x86_64', 'llvm');
    await fs.symlink('stale-target', linuxLink);

    const runner = new MockCommandRunner({
      git: async (argv) => {
        if (argv[1] === 'rm') {
          await fs.remove(argv[argv.length - 1]);
        }
      }
    });

    await symlinkClang(
      { build: null, useCurrentBranch: false },
      {
        prebuiltsDir: path.join(root, 'prebuilts', 'ndk'),
        androidDir: root,
        runner,
        log: new RecordingOperationLog()
      }
    );

    const link = (host: string) => path.join(toolchains, host, 'llvm');
    assert.deepEqual(runner.commands(), [
      ['repo', 'start', 'update-clang-200', '.'],
      ['git', 'add', link('darwin-x86_64')],
      ['git', 'rm', linuxLink],
      ['git', 'add', linuxLink],
      ['git', 'add', link('windows')],
      ['git', 'add', link('windows-x86_64')],
      ['git', 'commit', '-m', 'Update prebuilt Clang to build 200.']
    ]);

    assert.equal(await fs.readlink(link('darwin-x86_64')), '../../../../clang/host/darwin-x86/clang-200');
    assert.equal(await fs.readlink(linuxLink), '../../../../clang/host/linux-x86/clang-200');
  });
});
