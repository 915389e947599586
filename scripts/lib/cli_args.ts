export interface CliArgumentSpec {
  booleanFlags?: readonly string[];
  valueOptions?: readonly string[];
  /** Short spellings, e.g. `{ '-b': 'bug' }`. */
  aliases?: Readonly<Record<string, string>>;
  maxPositionals?: number;
}

export interface ParsedCliArguments {
  positionals: string[];
  flags: Set<string>;
  options: Map<string, string>;
}

function resolveOptionKey(
  token: string,
  spec: CliArgumentSpec
): { key: string; inlineValue: string | undefined } {
  if (!token.startsWith('--')) {
    const aliased = spec.aliases?.[token];
    if (!aliased) {
      throw new Error(`Unknown option '${token}'`);
    }
    return { key: aliased, inlineValue: undefined };
  }

  const body = token.slice(2);
  const separator = body.indexOf('=');
  const key = (separator >= 0 ? body.slice(0, separator) : body).trim();
  if (!key) {
    throw new Error(`Invalid option '${token}'`);
  }

  return { key, inlineValue: separator >= 0 ? body.slice(separator + 1) : undefined };
}

export function parseCliArguments(args: string[], spec: CliArgumentSpec): ParsedCliArguments {
  const booleanFlags = new Set(spec.booleanFlags ?? []);
  const valueOptions = new Set(spec.valueOptions ?? []);
  const maxPositionals = spec.maxPositionals ?? 0;
  const parsed: ParsedCliArguments = {
    positionals: [],
    flags: new Set(),
    options: new Map()
  };

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];

    if (token.length < 2 || !token.startsWith('-')) {
      if (parsed.positionals.length >= maxPositionals) {
        throw new Error(`Unexpected argument '${token}'`);
      }
      parsed.positionals.push(token);
      continue;
    }

    const { key, inlineValue } = resolveOptionKey(token, spec);

    if (booleanFlags.has(key)) {
      if (inlineValue !== undefined) {
        throw new Error(`Option '--${key}' does not take a value`);
      }
      parsed.flags.add(key);
      continue;
    }

    if (!valueOptions.has(key)) {
      throw new Error(`Unknown option '--${key}'`);
    }

    let value = inlineValue;
    if (value === undefined) {
      const next = args[index + 1];
      if (next === undefined || next.startsWith('-')) {
        throw new Error(`Missing value for option '--${key}'`);
      }
      value = next;
      index += 1;
    }

    parsed.options.set(key, value);
  }

  return parsed;
}

export function assertExclusiveFlags(parsed: ParsedCliArguments, names: readonly string[]): void {
  const present = names.filter((name) => parsed.flags.has(name));
  if (present.length > 1) {
    throw new Error(`Options ${present.map((name) => `'--${name}'`).join(' and ')} cannot be combined`);
  }
}
