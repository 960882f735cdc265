/**
 * Command-line argument parsing for secret-inject.
 */
import { usageError } from './errors.js';
import { TEMPLATE_FORMATS, type TemplateFormat } from './types.js';

export interface CommonFlags {
  dryRun: boolean;
  backup: boolean;
  force: boolean;
  verbose: boolean;
  noCache: boolean;
  cacheTtlSeconds?: number;
  vault?: string;
  field?: string;
  account?: string;
  format?: TemplateFormat;
}

export type CliCommand =
  | { command: 'help' }
  | { command: 'version' }
  | {
      command: 'inject';
      template?: string;
      stdin: boolean;
      output?: string;
      flags: CommonFlags;
    }
  | { command: 'inject-all'; flags: CommonFlags }
  | {
      command: 'validate';
      template: string;
      check: boolean;
      strict: boolean;
      flags: CommonFlags;
    };

export const USAGE = `
secret-inject - render configuration templates with secrets from 1Password

Usage:
  secret-inject inject <template> [options]   Render one template
  secret-inject inject --stdin [options]      Render standard input
  secret-inject inject-all [options]          Render every discovered template
  secret-inject validate <template> [options] Show format and tokens, check secrets

Options:
  -o, --output <path>    Output file (default: template path without .template/.tmpl/.tpl)
  -d, --dry-run          Report what would be written, touch nothing
  -f, --format <fmt>     Force a format: ${TEMPLATE_FORMATS.join(', ')}
  -b, --backup           Copy the existing output to <output>.backup before replacing it
      --force            Replace differing outputs without asking
      --stdin            Read the template from standard input
      --vault <name>     1Password vault (default: Employee)
      --field <name>     Item field holding the secret (default: credential)
      --account <alias>  1Password account alias
      --cache-ttl <s>    Cache TTL in seconds (default: 300)
      --no-cache         Disable the secret cache
      --no-check         validate: do not look secrets up
      --strict           validate: fail on files mixing formats
      --verbose          Debug logging
  -h, --help             Show this help message
      --version          Show the version

Template formats (detected in this order):
  go            {{ op://Vault/NAME/field }}
  double-brace  {{NAME}}
  env           \${NAME}
  custom        %%NAME%%
  env-simple    $NAME

Exit codes: 0 success, 1 missing secrets or write failure, 2 usage error.
`;

function isTemplateFormat(value: string): value is TemplateFormat {
  return (TEMPLATE_FORMATS as readonly string[]).includes(value);
}

/**
 * Parse `argv` (without the node and script entries).
 *
 * @throws InjectError (USAGE) on unknown options, missing values or arguments
 */
export function parseArgs(argv: string[]): CliCommand {
  const flags: CommonFlags = {
    dryRun: false,
    backup: false,
    force: false,
    verbose: false,
    noCache: false,
  };
  const positionals: string[] = [];
  let output: string | undefined;
  let stdin = false;
  let check = true;
  let strict = false;

  const takeValue = (i: number, option: string): string => {
    const value = argv[i + 1];
    if (value === undefined || value.startsWith('-')) {
      throw usageError(`Option ${option} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '-h':
      case '--help':
        return { command: 'help' };
      case '--version':
        return { command: 'version' };
      case '-o':
      case '--output':
        output = takeValue(i++, arg);
        break;
      case '-d':
      case '--dry-run':
        flags.dryRun = true;
        break;
      case '-f':
      case '--format': {
        const value = takeValue(i++, arg);
        if (!isTemplateFormat(value)) {
          throw usageError(
            `Unknown format: ${value} (expected one of ${TEMPLATE_FORMATS.join(', ')})`,
          );
        }
        flags.format = value;
        break;
      }
      case '-b':
      case '--backup':
        flags.backup = true;
        break;
      case '--force':
        flags.force = true;
        break;
      case '--stdin':
        stdin = true;
        break;
      case '--vault':
        flags.vault = takeValue(i++, arg);
        break;
      case '--field':
        flags.field = takeValue(i++, arg);
        break;
      case '--account':
        flags.account = takeValue(i++, arg);
        break;
      case '--cache-ttl': {
        const raw = takeValue(i++, arg);
        const seconds = Number(raw);
        if (!Number.isInteger(seconds) || seconds < 0) {
          throw usageError(`--cache-ttl expects a whole number of seconds, got ${raw}`);
        }
        flags.cacheTtlSeconds = seconds;
        break;
      }
      case '--no-cache':
        flags.noCache = true;
        break;
      case '--no-check':
        check = false;
        break;
      case '--strict':
        strict = true;
        break;
      case '--verbose':
        flags.verbose = true;
        break;
      default:
        if (arg.startsWith('-') && arg !== '-') {
          throw usageError(`Unknown option: ${arg}`);
        }
        positionals.push(arg);
    }
  }

  const [command, ...rest] = positionals;
  switch (command) {
    case undefined:
      throw usageError('No command given');
    case 'inject': {
      // "-" as the template means standard input
      if (!stdin && rest.length === 1 && rest[0] === '-') {
        return { command: 'inject', stdin: true, output, flags };
      }
      if (stdin && rest.length > 0) {
        throw usageError('Cannot specify a template file together with --stdin');
      }
      if (!stdin && rest.length !== 1) {
        throw usageError('inject expects exactly one template file');
      }
      return { command: 'inject', template: rest[0], stdin, output, flags };
    }
    case 'inject-all':
      if (rest.length > 0) {
        throw usageError('inject-all takes no file arguments');
      }
      if (output !== undefined) {
        throw usageError('--output cannot be used with inject-all');
      }
      return { command: 'inject-all', flags };
    case 'validate':
      if (rest.length !== 1) {
        throw usageError('validate expects exactly one template file');
      }
      return { command: 'validate', template: rest[0], check, strict, flags };
    default:
      throw usageError(`Unknown command: ${command}`);
  }
}
