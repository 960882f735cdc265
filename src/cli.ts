#!/usr/bin/env node
/**
 * secret-inject CLI
 *
 * Reads the environment once, builds the resolver and secret source, and
 * maps results to exit codes: 0 success, 1 missing secrets or write
 * failures, 2 usage or configuration errors.
 */
import fs from 'fs';
import os from 'os';
import path from 'path';
import { pathToFileURL } from 'url';

import { confirm, isCancel } from '@clack/prompts';

import { injectAll } from './batch.js';
import { type CliCommand, type CommonFlags, USAGE, parseArgs } from './cli-args.js';
import { type InjectConfig, loadConfig } from './config.js';
import { defaultOutputPath, discoverTemplates, isTemplatePath } from './discovery.js';
import { ErrorCodes, InjectError } from './errors.js';
import { logger, setLogLevel } from './logger.js';
import {
  type RenderOptions,
  renderContent,
  renderTemplate,
  substituteContent,
} from './renderer.js';
import {
  countMissing,
  formatBatchSummary,
  formatRenderReport,
  formatTokenLine,
  formatValidation,
} from './report.js';
import { SecretResolver } from './resolver.js';
import { OnePasswordSource } from './secret-source.js';
import type { OverwriteConflict, RenderResult, SecretSource } from './types.js';
import { validateTemplate } from './validate.js';

export interface CliDeps {
  env: Record<string, string | undefined>;
  cwd: string;
  homeDir: string;
  /** Standard output: rendered text and reports. */
  write: (text: string) => void;
  /** Standard error: usage and error messages. */
  writeError: (text: string) => void;
  readStdin: () => Promise<string>;
  /** Whether overwrite confirmation can be asked interactively. */
  interactive: boolean;
  createSource: (config: InjectConfig) => SecretSource;
  /** Asked after the conflict's diff has been written to `write`. */
  confirmOverwrite: (conflict: OverwriteConflict) => Promise<boolean>;
}

// Rendered stdin output holds secrets; keep it private to the owner
const STDIN_OUTPUT_MODE = 0o600;

function readVersion(): string {
  try {
    const pkgPath = new URL('../package.json', import.meta.url);
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg) {
      return String(pkg.version);
    }
  } catch (err) {
    logger.debug({ err }, 'Could not read package version');
  }
  return 'unknown';
}

async function readAll(stream: NodeJS.ReadableStream): Promise<string> {
  let data = '';
  for await (const chunk of stream) {
    data += chunk.toString();
  }
  return data;
}

function createOnePasswordSource(config: InjectConfig): SecretSource {
  return new OnePasswordSource({
    command: config.opCommand,
    vault: config.vault,
    field: config.field,
    account: config.account,
    fallbackAccounts: config.fallbackAccounts,
    accountMap: config.accountMap,
    timeoutMs: config.timeoutMs,
  });
}

async function promptOverwrite(conflict: OverwriteConflict): Promise<boolean> {
  const answer = await confirm({
    message: `Overwrite ${conflict.outputPath}?`,
    initialValue: false,
  });
  return !isCancel(answer) && answer === true;
}

export function defaultDeps(): CliDeps {
  return {
    env: process.env,
    cwd: process.cwd(),
    homeDir: os.homedir(),
    write: (text) => process.stdout.write(text),
    writeError: (text) => process.stderr.write(text),
    readStdin: () => readAll(process.stdin),
    interactive: Boolean(process.stdin.isTTY && process.stdout.isTTY),
    createSource: createOnePasswordSource,
    confirmOverwrite: promptOverwrite,
  };
}

/** Apply command-line overrides on top of the environment configuration. */
function withFlags(config: InjectConfig, flags: CommonFlags): InjectConfig {
  return {
    ...config,
    dryRun: config.dryRun || flags.dryRun,
    cacheEnabled: config.cacheEnabled && !flags.noCache,
    cacheTtlMs:
      flags.cacheTtlSeconds !== undefined
        ? flags.cacheTtlSeconds * 1000
        : config.cacheTtlMs,
    vault: flags.vault ?? config.vault,
    field: flags.field ?? config.field,
    account: flags.account ?? config.account,
  };
}

async function warnIfSignedOut(source: SecretSource): Promise<void> {
  if (source instanceof OnePasswordSource && !(await source.isSignedIn())) {
    logger.warn('Not signed in to 1Password; run: eval $(op signin)');
  }
}

async function runCommand(
  cmd: Exclude<CliCommand, { command: 'help' } | { command: 'version' }>,
  deps: CliDeps,
): Promise<number> {
  const config = withFlags(loadConfig(deps.env), cmd.flags);
  const source = deps.createSource(config);
  const resolver = new SecretResolver(source, {
    ttlMs: config.cacheTtlMs,
    cacheEnabled: config.cacheEnabled,
  });
  const mode = config.dryRun ? 'dry-run' : 'apply';
  const print = (lines: string[]) => deps.write(`${lines.join('\n')}\n`);
  const renderOptions: RenderOptions = {
    mode,
    resolver,
    format: cmd.flags.format,
    backup: cmd.flags.backup,
    force: cmd.flags.force,
    confirmOverwrite: deps.interactive
      ? (conflict) => {
          deps.write(`${conflict.diff}\n`);
          return deps.confirmOverwrite(conflict);
        }
      : undefined,
  };

  const reportRender = (result: RenderResult): number => {
    print(formatRenderReport(result));
    if (mode === 'dry-run' && result.diff) print([result.diff]);
    const failed = result.outcome === 'write-failed' || countMissing(result.tokens) > 0;
    return failed ? 1 : 0;
  };

  switch (cmd.command) {
    case 'inject': {
      if (cmd.stdin) {
        const text = await deps.readStdin();
        if (cmd.output) {
          const outputPath = path.resolve(deps.cwd, cmd.output);
          return reportRender(
            await renderContent(text, 'stdin', outputPath, STDIN_OUTPUT_MODE, renderOptions),
          );
        }

        const substitution = await substituteContent(text, renderOptions);
        const missing = substitution.tokens.filter((t) => t.status === 'missing');
        for (const token of missing) deps.writeError(`${formatTokenLine(token)}\n`);

        if (mode === 'dry-run') {
          const bytes = Buffer.byteLength(substitution.content, 'utf-8');
          print([
            `[DRY RUN] stdin -> stdout: would write ${bytes} bytes, ${missing.length} missing`,
            ...substitution.tokens.map(formatTokenLine),
          ]);
        } else {
          deps.write(substitution.content);
        }
        return missing.length > 0 ? 1 : 0;
      }

      if (cmd.template === undefined) {
        throw new InjectError(ErrorCodes.USAGE, 'inject expects a template file');
      }
      const templatePath = path.resolve(deps.cwd, cmd.template);
      if (!cmd.output && !isTemplatePath(templatePath)) {
        logger.warn({ templatePath }, 'No template extension and no --output; rendering in place');
      }
      const outputPath = cmd.output
        ? path.resolve(deps.cwd, cmd.output)
        : defaultOutputPath(templatePath);

      return reportRender(await renderTemplate(templatePath, outputPath, renderOptions));
    }

    case 'inject-all': {
      const templates = await discoverTemplates({
        homeDir: deps.homeDir,
        cwd: deps.cwd,
        locations: config.templateLocations,
      });
      if (templates.length === 0) {
        print(['No template files found']);
        return 0;
      }
      print([`Found ${templates.length} template files:`, ...templates.map((t) => `  • ${t}`), '']);
      if (mode === 'dry-run') {
        print(['Running in dry-run mode - no files will be modified', '']);
      } else {
        await warnIfSignedOut(source);
      }

      const summary = await injectAll(templates, renderOptions);
      print(formatBatchSummary(summary));
      return summary.exitCode;
    }

    case 'validate': {
      const report = await validateTemplate(path.resolve(deps.cwd, cmd.template), {
        resolver,
        check: cmd.check,
        strict: cmd.strict,
        format: cmd.flags.format,
      });
      print(formatValidation(report));
      return report.ok ? 0 : 1;
    }
  }
}

/**
 * Run the CLI with `argv` (arguments after the script name).
 * Resolves to the process exit code.
 */
export async function run(
  argv: string[],
  overrides: Partial<CliDeps> = {},
): Promise<number> {
  const deps: CliDeps = { ...defaultDeps(), ...overrides };

  let cmd: CliCommand;
  try {
    cmd = parseArgs(argv);
  } catch (err) {
    if (err instanceof InjectError) {
      deps.writeError(`Error: ${err.message}\n${USAGE}`);
      return 2;
    }
    throw err;
  }

  if (cmd.command === 'help') {
    deps.write(USAGE);
    return 0;
  }
  if (cmd.command === 'version') {
    deps.write(`secret-inject v${readVersion()}\n`);
    return 0;
  }
  if (cmd.flags.verbose) setLogLevel('debug');

  try {
    return await runCommand(cmd, deps);
  } catch (err) {
    if (!(err instanceof InjectError)) throw err;
    deps.writeError(`Error: ${err.message} (${err.code})\n`);
    return err.code === ErrorCodes.USAGE || err.code === ErrorCodes.INVALID_CONFIG
      ? 2
      : 1;
  }
}

// Guard: only run when executed directly (also through an npm bin symlink)
const isDirectRun =
  process.argv[1] !== undefined &&
  fs.existsSync(process.argv[1]) &&
  import.meta.url === pathToFileURL(fs.realpathSync(process.argv[1])).href;

if (isDirectRun) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      logger.fatal({ err }, 'secret-inject failed');
      process.exit(1);
    });
}
