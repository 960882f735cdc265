/**
 * Batch driver behind `inject-all`.
 *
 * Templates are rendered one at a time, in order, so output and error
 * reporting stay deterministic and the credential store never sees
 * concurrent calls on the same session. Every token of every template is
 * warmed into the resolver first, so shared tokens cost one lookup.
 */
import fs from 'fs';

import { defaultOutputPath } from './discovery.js';
import { logger } from './logger.js';
import { type RenderOptions, renderTemplate } from './renderer.js';
import { scanTemplate } from './scanner.js';
import type { RenderResult } from './types.js';

export type BatchOptions = RenderOptions;

export interface FileReport {
  templatePath: string;
  outputPath: string;
  result?: RenderResult;
  /** Set when the template could not be rendered at all. */
  error?: string;
}

export interface BatchSummary {
  files: FileReport[];
  written: number;
  unchanged: number;
  previewed: number;
  declined: number;
  failed: number;
  /** Files with no template syntax, copied through unchanged. */
  passthrough: number;
  resolved: number;
  missing: number;
  skipped: number;
  exitCode: 0 | 1;
}

/**
 * Exit status for a set of renders: 1 when any token is missing or any
 * file failed, 0 otherwise. Declined overwrites do not count as failures.
 */
export function exitCodeFor(files: FileReport[]): 0 | 1 {
  for (const file of files) {
    if (file.error || !file.result) return 1;
    if (file.result.outcome === 'write-failed') return 1;
    if (file.result.tokens.some((t) => t.status === 'missing')) return 1;
  }
  return 0;
}

export function summarize(files: FileReport[]): BatchSummary {
  const summary: BatchSummary = {
    files,
    written: 0,
    unchanged: 0,
    previewed: 0,
    declined: 0,
    failed: 0,
    passthrough: 0,
    resolved: 0,
    missing: 0,
    skipped: 0,
    exitCode: exitCodeFor(files),
  };

  for (const file of files) {
    const result = file.result;
    if (!result) {
      summary.failed++;
      continue;
    }
    switch (result.outcome) {
      case 'written':
        summary.written++;
        break;
      case 'unchanged':
        summary.unchanged++;
        break;
      case 'previewed':
        summary.previewed++;
        break;
      case 'declined':
        summary.declined++;
        break;
      case 'write-failed':
        summary.failed++;
        break;
    }
    if (result.format === 'none') summary.passthrough++;
    for (const token of result.tokens) {
      summary[token.status]++;
    }
  }
  return summary;
}

function collectTokens(templates: string[]): string[] {
  const names: string[] = [];
  for (const templatePath of templates) {
    try {
      const content = fs.readFileSync(templatePath, 'utf-8');
      names.push(...scanTemplate(content).tokens);
    } catch (err) {
      // Reported again, per file, when the template is rendered
      logger.debug({ templatePath, err }, 'Could not pre-scan template');
    }
  }
  return names;
}

/**
 * Render each template to its default output path.
 */
export async function injectAll(
  templates: string[],
  options: BatchOptions,
): Promise<BatchSummary> {
  if ((options.resolveSecrets ?? true) && templates.length > 0) {
    await options.resolver.warm(collectTokens(templates));
  }

  const files: FileReport[] = [];
  for (const templatePath of templates) {
    const outputPath = defaultOutputPath(templatePath);
    try {
      const result = await renderTemplate(templatePath, outputPath, options);
      files.push({ templatePath, outputPath, result });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ templatePath, err }, 'Failed to render template');
      files.push({ templatePath, outputPath, error: message });
    }
  }

  const summary = summarize(files);
  logger.info(
    {
      files: files.length,
      written: summary.written,
      failed: summary.failed,
      missing: summary.missing,
    },
    'Batch injection finished',
  );
  return summary;
}
