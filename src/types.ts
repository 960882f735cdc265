/**
 * Shared types for the template scanner, secret resolver and renderer.
 */

/**
 * Placeholder syntaxes, listed in detection priority order.
 * Delimited syntaxes come first so that `${X}` is never read as `$X`.
 */
export const TEMPLATE_FORMATS = [
  'go',
  'double-brace',
  'env',
  'custom',
  'env-simple',
] as const;

export type TemplateFormat = (typeof TEMPLATE_FORMATS)[number];

/** A detected format, or `none` when the content has no template syntax. */
export type DetectedFormat = TemplateFormat | 'none';

export interface ScanResult {
  format: DetectedFormat;
  /** Distinct token names under `format`, in order of first appearance. */
  tokens: string[];
  /** Lower-priority formats that also occur in the content (left literal). */
  otherFormats: TemplateFormat[];
}

// ---------------------------------------------------------------------------
// Secret resolution
// ---------------------------------------------------------------------------

export type MissingReason =
  | 'not-found'
  | 'not-signed-in'
  | 'empty-output'
  | 'command-failed'
  | 'timeout'
  | 'unavailable';

export type SecretFetchResult =
  | { ok: true; value: string }
  | { ok: false; reason: MissingReason; detail?: string };

/**
 * A credential store the resolver can query one token at a time.
 * Implementations report failures as values and never throw.
 */
export interface SecretSource {
  readonly name: string;
  fetch(tokenName: string): Promise<SecretFetchResult>;
}

export type Resolution =
  | { status: 'resolved'; value: string; cached: boolean }
  | { status: 'missing'; reason: MissingReason; detail?: string };

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

export type RenderMode = 'apply' | 'dry-run';

export type TokenReport =
  | { name: string; status: 'resolved'; cached: boolean }
  | { name: string; status: 'missing'; reason: MissingReason; detail?: string }
  | { name: string; status: 'skipped' };

export type RenderOutcome =
  | 'written'
  | 'unchanged'
  | 'previewed'
  | 'declined'
  | 'write-failed';

/** Handed to the caller before an existing, different destination is replaced. */
export interface OverwriteConflict {
  outputPath: string;
  /** Line diff between the current destination and the rendered text, secrets masked. */
  diff: string;
}

export interface RenderResult {
  templatePath: string;
  outputPath: string;
  mode: RenderMode;
  format: DetectedFormat;
  otherFormats: TemplateFormat[];
  tokens: TokenReport[];
  content: string;
  bytes: number;
  /** Destination content before this render, or null when it did not exist. */
  previous: string | null;
  changed: boolean;
  diff: string;
  outcome: RenderOutcome;
  backupPath?: string;
  writeError?: string;
}
