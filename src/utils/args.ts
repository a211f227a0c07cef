export interface FlagSpec {
  type: 'boolean' | 'string';
  short?: string;
}

export interface ArgSpec {
  [key: string]: FlagSpec;
}

export interface ParsedArgs {
  flags: Record<string, string | boolean>;
  positional: string[];
  /** Flags missing from the ArgSpec, as written */
  unknown: string[];
}

/**
 * Splits `args` into flags and positionals. Supports `--long`, `--long=value`,
 * combined short flags (`-vi`) and `--` to end flag parsing. Parsing also
 * stops at the first positional when `stopAtPositional` is set, so a command
 * can pass the remaining words through untouched.
 */
export function parseArgs(
  args: readonly string[],
  spec: ArgSpec,
  options: { stopAtPositional?: boolean } = {},
): ParsedArgs {
  const flags: Record<string, string | boolean> = {};
  const positional: string[] = [];
  const unknown: string[] = [];

  const shortMap = new Map<string, string>();
  for (const [long, def] of Object.entries(spec)) {
    if (def.short) shortMap.set(def.short, long);
    flags[long] = def.type === 'boolean' ? false : '';
  }

  let stopFlags = false;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (stopFlags || !arg.startsWith('-') || arg === '-' || /^-\d/.test(arg)) {
      positional.push(arg);
      if (options.stopAtPositional) stopFlags = true;
      continue;
    }

    if (arg === '--') {
      stopFlags = true;
      continue;
    }

    if (arg.startsWith('--')) {
      const eqIdx = arg.indexOf('=');
      const name = eqIdx === -1 ? arg.slice(2) : arg.slice(2, eqIdx);
      const def = spec[name];
      if (!def) {
        unknown.push(arg);
      } else if (def.type === 'boolean') {
        flags[name] = true;
      } else {
        flags[name] = eqIdx === -1 ? (args[++i] ?? '') : arg.slice(eqIdx + 1);
      }
      continue;
    }

    const chars = arg.slice(1);
    for (let j = 0; j < chars.length; j++) {
      const longName = shortMap.get(chars[j]);
      if (longName === undefined) {
        unknown.push('-' + chars[j]);
        continue;
      }
      if (spec[longName].type === 'string') {
        // Rest of chars or next arg is value
        const rest = chars.slice(j + 1);
        flags[longName] = rest || (args[++i] ?? '');
        break;
      }
      flags[longName] = true;
    }
  }

  return { flags, positional, unknown };
}
