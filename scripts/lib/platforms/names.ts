export const DEFAULT_PLATFORM_PREFIX = 'android';

export type ParsedPlatformToken =
  | { kind: 'numeric'; level: number }
  | { kind: 'codename'; codename: string };

export interface ParsedPlatformName {
  prefix: string;
  rawToken: string;
  parsed: ParsedPlatformToken;
}

const NUMERIC_TOKEN = /^(0|[1-9][0-9]*)$/;

/**
 * Parses a release token. Only plain base-10 digits without a leading zero
 * count as numeric; anything else (signs, whitespace, `029`) is a codename.
 */
export function parsePlatformToken(token: string): ParsedPlatformToken {
  if (NUMERIC_TOKEN.test(token)) {
    const level = Number(token);
    if (Number.isSafeInteger(level)) {
      return { kind: 'numeric', level };
    }
  }

  return { kind: 'codename', codename: token };
}

export function parsePlatformDirectoryName(name: string): ParsedPlatformName {
  const separator = name.indexOf('-');
  if (separator < 0) {
    return { prefix: name, rawToken: '', parsed: { kind: 'codename', codename: '' } };
  }

  const prefix = name.slice(0, separator);
  const rawToken = name.slice(separator + 1);
  return { prefix, rawToken, parsed: parsePlatformToken(rawToken) };
}

export function platformDirectoryName(prefix: string, level: number): string {
  return `${prefix}-${level}`;
}
