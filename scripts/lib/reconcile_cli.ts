import path from 'node:path';

import { parseCliArguments } from './cli_args.js';
import { consoleOperationLog, type OperationLog } from './operation_log.js';
import { defaultPlatformsMetadataPath } from './paths.js';
import { loadPlatformsMetadata } from './platforms/metadata.js';
import { DEFAULT_PLATFORM_PREFIX } from './platforms/names.js';
import {
  reconcilePlatforms,
  type PlatformDecision,
  type ReconcileReport
} from './platforms/reconcile.js';
import { verifyAllNumeric } from './platforms/verify.js';

export interface ReconcilePlatformsArgs {
  platformsRoot: string;
  metadataPath: string;
  prefix: string;
  check: boolean;
}

export function parseReconcilePlatformsArgs(argv: string[]): ReconcilePlatformsArgs {
  const parsed = parseCliArguments(argv, {
    booleanFlags: ['check'],
    valueOptions: ['metadata', 'prefix'],
    maxPositionals: 1
  });

  const platformsRoot = parsed.positionals[0];
  if (platformsRoot === undefined) {
    throw new Error('Missing PLATFORMS_DIR argument');
  }

  return {
    platformsRoot: path.resolve(platformsRoot),
    metadataPath: path.resolve(parsed.options.get('metadata') ?? defaultPlatformsMetadataPath()),
    prefix: parsed.options.get('prefix') ?? DEFAULT_PLATFORM_PREFIX,
    check: parsed.flags.has('check')
  };
}

export function describeDecision({ entry, disposition }: PlatformDecision): string {
  switch (disposition.kind) {
    case 'keep':
      return `keep ${entry.name}`;
    case 'rename':
      return `rename ${entry.name} -> ${disposition.targetName}`;
    case 'remove':
      return `remove ${entry.name} (${disposition.reason})`;
  }
}

export function summarizeReport(report: ReconcileReport): string {
  const counts = { keep: 0, rename: 0, remove: 0 };
  for (const { disposition } of report.decisions) {
    counts[disposition.kind] += 1;
  }
  return `kept=${counts.keep} renamed=${counts.rename} removed=${counts.remove}`;
}

/**
 * Reconciles an already-extracted platforms directory. With `check`, nothing
 * is changed and the run fails when any directory would be renamed or removed.
 */
export function runReconcilePlatforms(
  args: ReconcilePlatformsArgs,
  log: OperationLog = consoleOperationLog
): ReconcileReport {
  const metadata = loadPlatformsMetadata(args.metadataPath);
  const report = reconcilePlatforms(args.platformsRoot, metadata, {
    prefix: args.prefix,
    check: args.check,
    log
  });

  if (args.check) {
    const pending = report.decisions.filter(({ disposition }) => disposition.kind !== 'keep');
    for (const decision of pending) {
      log.info(`Would ${describeDecision(decision)}`);
    }
    if (pending.length > 0) {
      throw new Error(`${pending.length} platform directories are out of date in ${args.platformsRoot}`);
    }
    log.info('reconcile_platforms check passed.');
    return report;
  }

  verifyAllNumeric(args.platformsRoot, args.prefix);
  log.info(`Reconciled ${args.platformsRoot}: ${summarizeReport(report)}`);
  return report;
}
