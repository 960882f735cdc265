/**
 * Template renderer.
 *
 * One render runs Scanning -> Resolving -> Substituting, then either
 * Writing (apply) or Reporting (dry-run). Missing secrets never stop the
 * pipeline: their tokens stay literal and are reported per token. Write
 * errors are reported through the result's outcome, not thrown.
 */
import crypto from 'crypto';
import fs from 'fs';
import path from 'path';

import { lineDiff, maskSecrets } from './diff.js';
import { binaryTemplateError, templateNotFoundError } from './errors.js';
import { logger } from './logger.js';
import type { SecretResolver } from './resolver.js';
import { scanTemplate } from './scanner.js';
import { substituteTokens } from './template.js';
import type {
  DetectedFormat,
  OverwriteConflict,
  RenderMode,
  RenderResult,
  TemplateFormat,
  TokenReport,
} from './types.js';

export interface SubstituteOptions {
  resolver: SecretResolver;
  /** Force a format instead of detecting one. */
  format?: TemplateFormat;
  /** When false, no token is resolved and every token is reported as skipped. Default: true */
  resolveSecrets?: boolean;
}

export interface RenderOptions extends SubstituteOptions {
  mode: RenderMode;
  /** Copy an existing destination to `<output>.backup` before replacing it. */
  backup?: boolean;
  /** Replace a differing destination without asking. */
  force?: boolean;
  /**
   * Asked before a differing destination is replaced. Without it (and
   * without `force`) the destination is left alone.
   */
  confirmOverwrite?: (conflict: OverwriteConflict) => Promise<boolean>;
}

export interface SubstitutionResult {
  format: DetectedFormat;
  otherFormats: TemplateFormat[];
  tokens: TokenReport[];
  content: string;
  /** Resolved values, kept only for masking previews. */
  secretValues: string[];
}

/**
 * Resolve and substitute the tokens of `template` in memory.
 */
export async function substituteContent(
  template: string,
  options: SubstituteOptions,
): Promise<SubstitutionResult> {
  const scan = scanTemplate(template, options.format);
  const resolveSecrets = options.resolveSecrets ?? true;

  const tokens: TokenReport[] = [];
  const values: Record<string, string> = {};

  for (const name of scan.tokens) {
    if (!resolveSecrets) {
      tokens.push({ name, status: 'skipped' });
      continue;
    }
    const resolution = await options.resolver.resolve(name);
    if (resolution.status === 'resolved') {
      values[name] = resolution.value;
      tokens.push({ name, status: 'resolved', cached: resolution.cached });
    } else {
      tokens.push({
        name,
        status: 'missing',
        reason: resolution.reason,
        detail: resolution.detail,
      });
    }
  }

  return {
    format: scan.format,
    otherFormats: scan.otherFormats,
    tokens,
    content: substituteTokens(template, scan.format, values),
    secretValues: Object.values(values),
  };
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

export function readTemplate(templatePath: string): { content: string; mode: number } {
  let content: string;
  let mode: number;
  try {
    content = fs.readFileSync(templatePath, 'utf-8');
    mode = fs.statSync(templatePath).mode & 0o777;
  } catch (err) {
    if (isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'EISDIR')) {
      throw templateNotFoundError(templatePath);
    }
    throw err;
  }
  if (content.includes('\0')) {
    throw binaryTemplateError(templatePath);
  }
  return { content, mode };
}

function readExisting(outputPath: string): string | null {
  try {
    return fs.readFileSync(outputPath, 'utf-8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return null;
    throw err;
  }
}

/**
 * Write via a temp file in the destination directory, then rename, so a
 * failed write never leaves a half-written config behind.
 */
export function writeAtomic(outputPath: string, content: string, mode: number): void {
  const dir = path.dirname(outputPath);
  fs.mkdirSync(dir, { recursive: true });
  const tempPath = path.join(
    dir,
    `.${path.basename(outputPath)}.tmp-${crypto.randomBytes(4).toString('hex')}`,
  );
  try {
    fs.writeFileSync(tempPath, content, { encoding: 'utf-8', mode });
    // writeFileSync's mode is filtered through the umask
    fs.chmodSync(tempPath, mode);
    fs.renameSync(tempPath, outputPath);
  } catch (err) {
    fs.rmSync(tempPath, { force: true });
    throw err;
  }
}

/**
 * Render `templatePath` into `outputPath`.
 *
 * @throws InjectError when the template is missing or binary
 */
export async function renderTemplate(
  templatePath: string,
  outputPath: string,
  options: RenderOptions,
): Promise<RenderResult> {
  const template = readTemplate(templatePath);
  return renderContent(template.content, templatePath, outputPath, template.mode, options);
}

/**
 * Render template text that is already in memory into `outputPath`, with
 * the same preview, consent, backup and atomic-write rules as a file.
 *
 * @param templatePath - Where the text came from, for reports (may be `stdin`)
 * @param fileMode     - Permission bits of the written output
 */
export async function renderContent(
  text: string,
  templatePath: string,
  outputPath: string,
  fileMode: number,
  options: RenderOptions,
): Promise<RenderResult> {
  const substitution = await substituteContent(text, options);

  if (substitution.otherFormats.length > 0) {
    logger.warn(
      {
        templatePath,
        format: substitution.format,
        ignored: substitution.otherFormats,
      },
      'Template mixes placeholder formats; only the first detected format is substituted',
    );
  }

  let previous: string | null = null;
  let readError: string | undefined;
  try {
    previous = readExisting(outputPath);
  } catch (err) {
    readError = err instanceof Error ? err.message : String(err);
    logger.error({ outputPath, err }, 'Failed to read existing output');
  }
  const content = substitution.content;
  const changed = previous !== content;

  const result: RenderResult = {
    templatePath,
    outputPath,
    mode: options.mode,
    format: substitution.format,
    otherFormats: substitution.otherFormats,
    tokens: substitution.tokens,
    content,
    bytes: Buffer.byteLength(content, 'utf-8'),
    previous,
    changed,
    diff: changed
      ? maskSecrets(lineDiff(previous, content), substitution.secretValues)
      : '',
    outcome: 'previewed',
  };

  if (readError !== undefined) {
    return { ...result, outcome: 'write-failed', writeError: readError };
  }

  if (options.mode === 'dry-run') {
    return result;
  }

  if (!changed) {
    logger.debug({ outputPath }, 'Output already up to date');
    return { ...result, outcome: 'unchanged' };
  }

  if (previous !== null && !options.force) {
    const approved = options.confirmOverwrite
      ? await options.confirmOverwrite({ outputPath, diff: result.diff })
      : false;
    if (!approved) {
      logger.info({ outputPath }, 'Overwrite declined, destination left as is');
      return { ...result, outcome: 'declined' };
    }
  }

  let backupPath: string | undefined;
  try {
    if (options.backup && previous !== null) {
      backupPath = `${outputPath}.backup`;
      fs.copyFileSync(outputPath, backupPath);
      logger.debug({ backupPath }, 'Created backup');
    }
    writeAtomic(outputPath, content, fileMode);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ outputPath, err }, 'Failed to write rendered template');
    return { ...result, backupPath, outcome: 'write-failed', writeError: message };
  }

  logger.info(
    { templatePath, outputPath, bytes: result.bytes },
    'Rendered template written',
  );
  return { ...result, backupPath, outcome: 'written' };
}
