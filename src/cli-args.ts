export type CliCommand =
  | { name: 'import-sites'; limit?: number }
  | { name: 'download-csvs' }
  | { name: 'upload-production' }
  | { name: 'calculate-profiles'; recompute: boolean }
  | { name: 'run-all'; limit?: number };

export const CLI_USAGE = `Usage: solar-pipeline <command> [options]

Commands:
  import-sites [--limit N]          Import sites from the monitoring API
  download-csvs                     Download production CSVs for discovered sites
  upload-production                 Ingest downloaded CSVs
  calculate-profiles [--recompute]  Build reference years for uploaded sites
  run-all [--limit N]               Run every stage in order`;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(`${message}\n\n${CLI_USAGE}`);
    this.name = 'CliUsageError';
  }
}

/**
 * Parse `<command> [--limit N | --limit=N] [--recompute]`.
 */
export function parseCliArgs(argv: string[]): CliCommand {
  const name: string | undefined = argv[0];
  const rest = argv.slice(1);
  const flags = new Map<string, string | true>();

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (!arg.startsWith('--')) {
      throw new CliUsageError(`Unexpected argument '${arg}'`);
    }
    const [key, inlineValue] = arg.slice(2).split('=', 2);
    if (inlineValue !== undefined) {
      flags.set(key, inlineValue);
    } else if (key === 'limit' && i + 1 < rest.length) {
      flags.set(key, rest[++i]);
    } else {
      flags.set(key, true);
    }
  }

  const allowed = (...keys: string[]) => {
    for (const key of flags.keys()) {
      if (!keys.includes(key)) {
        throw new CliUsageError(`Unknown option '--${key}' for '${name}'`);
      }
    }
  };

  switch (name) {
    case 'import-sites':
      allowed('limit');
      return { name: 'import-sites', limit: parseLimit(flags.get('limit')) };
    case 'run-all':
      allowed('limit');
      return { name: 'run-all', limit: parseLimit(flags.get('limit')) };
    case 'download-csvs':
      allowed();
      return { name: 'download-csvs' };
    case 'upload-production':
      allowed();
      return { name: 'upload-production' };
    case 'calculate-profiles':
      allowed('recompute');
      return { name: 'calculate-profiles', recompute: flags.has('recompute') };
    case undefined:
      throw new CliUsageError('Missing command');
    default:
      throw new CliUsageError(`Unknown command '${name}'`);
  }
}

function parseLimit(value: string | true | undefined): number | undefined {
  if (value === undefined) return undefined;
  const limit = value === true ? NaN : Number(value);
  if (!Number.isInteger(limit) || limit < 0) {
    throw new CliUsageError('--limit must be a non-negative integer');
  }
  return limit;
}
