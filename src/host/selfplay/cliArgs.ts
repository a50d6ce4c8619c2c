export interface SelfPlayCliOptions {
  games: number;
  seed: number;
  rows: number;
  cols: number;
}

type ParsedArgs = Record<string, string | boolean>;

function parseFlags(argv: ReadonlyArray<string>): ParsedArgs {
  const args: ParsedArgs = {};
  for (let i = 2; i < argv.length; i += 1) {
    const raw = argv[i];
    if (!raw.startsWith('--')) {
      continue;
    }
    const eqIndex = raw.indexOf('=');
    if (eqIndex !== -1) {
      args[raw.slice(2, eqIndex)] = raw.slice(eqIndex + 1);
      continue;
    }
    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith('--')) {
      args[raw.slice(2)] = next;
      i += 1;
    } else {
      args[raw.slice(2)] = true;
    }
  }
  return args;
}

function readInteger(args: ParsedArgs, key: string, fallback: number, min: number): number {
  const raw = args[key];
  if (raw === undefined) {
    return fallback;
  }
  const value = typeof raw === 'string' ? Number(raw) : NaN;
  if (!Number.isInteger(value) || value < min) {
    throw new RangeError(`--${key} must be an integer >= ${min} (got ${String(raw)})`);
  }
  return value;
}

/**
 * Parse `--games`, `--seed`, `--rows` and `--cols` (either `--flag=value`
 * or `--flag value`) over configured defaults. `argv` is `process.argv`
 * shaped: the first two entries are skipped.
 */
export function parseSelfPlayArgs(
  argv: ReadonlyArray<string>,
  defaults: SelfPlayCliOptions
): SelfPlayCliOptions {
  const args = parseFlags(argv);
  return {
    games: readInteger(args, 'games', defaults.games, 1),
    seed: readInteger(args, 'seed', defaults.seed, 0),
    rows: readInteger(args, 'rows', defaults.rows, 1),
    cols: readInteger(args, 'cols', defaults.cols, 1),
  };
}
