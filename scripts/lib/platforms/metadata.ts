import fs from 'fs-extra';

import { MetadataFormatError } from './errors.js';

export interface PlatformsMetadata {
  readonly minimum: number;
  readonly maximum: number;
  readonly aliases: Readonly<Record<string, number>>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function readLevel(
  data: Record<string, unknown>,
  shortKey: string,
  longKey: string,
  source: string
): number {
  const hasShort = Object.hasOwn(data, shortKey);
  const hasLong = Object.hasOwn(data, longKey);

  if (!hasShort && !hasLong) {
    throw new MetadataFormatError(source, `missing required field '${shortKey}'`);
  }

  const shortValue = data[shortKey];
  const longValue = data[longKey];
  if (hasShort && hasLong && shortValue !== longValue) {
    throw new MetadataFormatError(
      source,
      `'${shortKey}' and '${longKey}' disagree (${String(shortValue)} vs ${String(longValue)})`
    );
  }

  const value = hasShort ? shortValue : longValue;
  const key = hasShort ? shortKey : longKey;
  if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
    throw new MetadataFormatError(source, `'${key}' must be an integer, got ${JSON.stringify(value)}`);
  }

  return value;
}

function readAliases(data: Record<string, unknown>, source: string): Record<string, number> {
  if (!Object.hasOwn(data, 'aliases')) {
    throw new MetadataFormatError(source, "missing required field 'aliases'");
  }

  const raw = data.aliases;
  if (!isRecord(raw)) {
    throw new MetadataFormatError(source, "'aliases' must be an object mapping codenames to levels");
  }

  const aliases: Array<[string, number]> = [];
  for (const [codename, level] of Object.entries(raw)) {
    if (typeof level !== 'number' || !Number.isSafeInteger(level)) {
      throw new MetadataFormatError(
        source,
        `alias '${codename}' must map to an integer, got ${JSON.stringify(level)}`
      );
    }
    aliases.push([codename, level]);
  }

  return Object.fromEntries(aliases);
}

/**
 * Validates an already-decoded metadata document. The range keys are spelled
 * `min`/`max` in the NDK's `meta/platforms.json`; `minimum`/`maximum` are
 * accepted as well. Nothing is defaulted.
 */
export function parsePlatformsMetadata(data: unknown, source = '<inline>'): PlatformsMetadata {
  if (!isRecord(data)) {
    throw new MetadataFormatError(source, 'expected a JSON object at the top level');
  }

  const minimum = readLevel(data, 'min', 'minimum', source);
  const maximum = readLevel(data, 'max', 'maximum', source);
  if (minimum > maximum) {
    throw new MetadataFormatError(source, `minimum ${minimum} is greater than maximum ${maximum}`);
  }

  const aliases = Object.freeze(readAliases(data, source));
  return Object.freeze({ minimum, maximum, aliases });
}

export function loadPlatformsMetadata(filePath: string): PlatformsMetadata {
  if (!fs.pathExistsSync(filePath)) {
    throw new MetadataFormatError(filePath, 'file not found');
  }

  const text = fs.readFileSync(filePath, 'utf8');
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new MetadataFormatError(filePath, `not valid JSON (${detail})`, { cause: error });
  }

  return parsePlatformsMetadata(data, filePath);
}
