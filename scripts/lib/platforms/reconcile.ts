import fg from 'fast-glob';
import fs from 'fs-extra';
import path from 'node:path';

import { silentOperationLog, type OperationLog } from '../operation_log.js';
import { AliasCollisionError } from './errors.js';
import type { PlatformsMetadata } from './metadata.js';
import {
  DEFAULT_PLATFORM_PREFIX,
  parsePlatformDirectoryName,
  platformDirectoryName,
  type ParsedPlatformName
} from './names.js';

export interface PlatformDirectoryEntry extends ParsedPlatformName {
  path: string;
  name: string;
}

export type RemovalReason = 'below-minimum' | 'above-maximum' | 'unknown-codename';

export type PlatformDisposition =
  | { kind: 'keep' }
  | { kind: 'rename'; targetName: string }
  | { kind: 'remove'; reason: RemovalReason };

export interface PlatformDecision {
  entry: PlatformDirectoryEntry;
  disposition: PlatformDisposition;
}

export interface ReconcileOptions {
  prefix?: string;
  log?: OperationLog;
  /** Compute every decision without touching the filesystem. */
  check?: boolean;
}

export interface ReconcileReport {
  decisions: PlatformDecision[];
}

function assertPrefix(prefix: string): void {
  if (!prefix || prefix.includes('-') || prefix.includes('/')) {
    throw new Error(`Invalid platform directory prefix '${prefix}'`);
  }
}

/**
 * Lists `<prefix>-*` entries directly under `platformsRoot` in code-point
 * order of their names, so every run and every host walks them identically.
 */
export function listPlatformDirectories(
  platformsRoot: string,
  prefix: string = DEFAULT_PLATFORM_PREFIX
): PlatformDirectoryEntry[] {
  assertPrefix(prefix);

  // fast-glob hides a missing cwd; surface it as the ENOENT it is.
  if (!fs.statSync(platformsRoot).isDirectory()) {
    throw new Error(`${platformsRoot} is not a directory`);
  }

  const names = fg.sync(`${fg.escapePath(prefix)}-*`, {
    cwd: platformsRoot,
    onlyFiles: false,
    deep: 1,
    dot: true
  });

  return names.sort().map((name) => ({
    ...parsePlatformDirectoryName(name),
    path: path.join(platformsRoot, name),
    name
  }));
}

export function planPlatformDisposition(
  entry: ParsedPlatformName,
  metadata: PlatformsMetadata
): PlatformDisposition {
  const { parsed } = entry;

  if (parsed.kind === 'numeric') {
    if (parsed.level < metadata.minimum) {
      return { kind: 'remove', reason: 'below-minimum' };
    }
    if (parsed.level > metadata.maximum) {
      return { kind: 'remove', reason: 'above-maximum' };
    }
    return { kind: 'keep' };
  }

  if (Object.hasOwn(metadata.aliases, parsed.codename)) {
    return {
      kind: 'rename',
      targetName: platformDirectoryName(entry.prefix, metadata.aliases[parsed.codename])
    };
  }

  return { kind: 'remove', reason: 'unknown-codename' };
}

function assertNoAliasCollisions(platformsRoot: string, decisions: PlatformDecision[]): void {
  const existing = new Set(decisions.map(({ entry }) => entry.name));
  const claimed = new Map<string, PlatformDirectoryEntry>();

  for (const { entry, disposition } of decisions) {
    if (disposition.kind !== 'rename') {
      continue;
    }

    const targetPath = path.join(platformsRoot, disposition.targetName);
    if (existing.has(disposition.targetName)) {
      throw new AliasCollisionError(entry.path, targetPath);
    }

    const previous = claimed.get(disposition.targetName);
    if (previous) {
      throw new AliasCollisionError(entry.path, targetPath, previous.path);
    }
    claimed.set(disposition.targetName, entry);
  }
}

/**
 * Rewrites the platform directories under `platformsRoot` so that only
 * numeric releases inside `[minimum, maximum]` remain and aliased codenames
 * take their numeric names. Unknown codenames are deleted.
 *
 * Mutations are applied one entry at a time with no rollback: a failure
 * part-way leaves earlier entries changed, and the caller must re-extract the
 * package before retrying. Alias collisions visible in the initial listing are
 * reported before anything is touched.
 */
export function reconcilePlatforms(
  platformsRoot: string,
  metadata: PlatformsMetadata,
  options: ReconcileOptions = {}
): ReconcileReport {
  const log = options.log ?? silentOperationLog;
  const decisions = listPlatformDirectories(platformsRoot, options.prefix).map((entry) => ({
    entry,
    disposition: planPlatformDisposition(entry, metadata)
  }));

  assertNoAliasCollisions(platformsRoot, decisions);

  if (options.check) {
    return { decisions };
  }

  for (const { entry, disposition } of decisions) {
    switch (disposition.kind) {
      case 'keep':
        break;
      case 'remove':
        log.removeTree(entry.path);
        fs.removeSync(entry.path);
        break;
      case 'rename': {
        const targetPath = path.join(platformsRoot, disposition.targetName);
        if (fs.pathExistsSync(targetPath)) {
          throw new AliasCollisionError(entry.path, targetPath);
        }
        log.rename(entry.path, targetPath);
        fs.renameSync(entry.path, targetPath);
        break;
      }
    }
  }

  return { decisions };
}
