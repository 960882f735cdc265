/**
 * Human-readable report lines for the CLI. Secret values never appear
 * here; only token names, statuses and byte counts.
 */
import type { BatchSummary, FileReport } from './batch.js';
import type { RenderResult, TokenReport } from './types.js';
import type { ValidationReport } from './validate.js';

export function countMissing(tokens: TokenReport[]): number {
  return tokens.filter((t) => t.status === 'missing').length;
}

export function formatTokenLine(token: TokenReport): string {
  switch (token.status) {
    case 'resolved':
      return `  ✓ ${token.name}${token.cached ? ' (cached)' : ''}`;
    case 'missing':
      return `  ✗ ${token.name} (${token.reason}${token.detail ? `: ${token.detail}` : ''})`;
    case 'skipped':
      return `  - ${token.name} (not checked)`;
  }
}

/**
 * One-line status of a render, e.g.
 * `[DRY RUN] app.conf.tmpl -> app.conf: would write 42 bytes, 0 missing`.
 */
export function formatRenderLine(result: RenderResult): string {
  const missing = countMissing(result.tokens);
  const target = `${result.templatePath} -> ${result.outputPath}`;
  switch (result.outcome) {
    case 'previewed':
      return `[DRY RUN] ${target}: would write ${result.bytes} bytes, ${missing} missing`;
    case 'written':
      return `Wrote ${target}: ${result.bytes} bytes, ${missing} missing`;
    case 'unchanged':
      return `Unchanged ${target}: ${missing} missing`;
    case 'declined':
      return `Skipped ${target}: overwrite declined`;
    case 'write-failed':
      return `Failed ${target}: ${result.writeError ?? 'write failed'}`;
  }
}

export function formatRenderReport(result: RenderResult): string[] {
  const lines = [formatRenderLine(result)];
  if (result.format === 'none') {
    lines.push('  (no template syntax, copied through unchanged)');
  }
  lines.push(...result.tokens.map(formatTokenLine));
  return lines;
}

function formatFileReport(file: FileReport): string[] {
  if (file.result) return formatRenderReport(file.result);
  return [`Failed ${file.templatePath}: ${file.error ?? 'unknown error'}`];
}

export function formatBatchSummary(summary: BatchSummary): string[] {
  const lines = summary.files.flatMap(formatFileReport);
  lines.push(
    '',
    '=== Summary ===',
    `Files: ${summary.files.length} (written ${summary.written}, unchanged ${summary.unchanged}, ` +
      `previewed ${summary.previewed}, declined ${summary.declined}, failed ${summary.failed})`,
    `Tokens: ${summary.resolved} resolved, ${summary.missing} missing, ${summary.skipped} skipped`,
  );
  if (summary.passthrough > 0) {
    lines.push(`No template syntax: ${summary.passthrough}`);
  }
  return lines;
}

export function formatValidation(report: ValidationReport): string[] {
  const lines = [`Validating: ${report.templatePath}`];
  if (report.format === 'none') {
    lines.push('  No template tokens detected');
    return lines;
  }
  lines.push(`  Format: ${report.format}`);
  if (report.otherFormats.length > 0) {
    lines.push(`  Also present (left literal): ${report.otherFormats.join(', ')}`);
  }
  lines.push(`  Tokens: ${report.tokens.length}`);
  lines.push(...report.tokens.map(formatTokenLine));
  for (const problem of report.problems) {
    lines.push(`  ! ${problem}`);
  }
  lines.push(report.ok ? '  OK' : '  INVALID');
  return lines;
}
