/**
 * Format-aware token substitution.
 *
 * Each template format has one pattern whose first capture group is the
 * token name. Substitution replaces the whole delimited token (`${NAME}`,
 * not just `NAME`). Unknown tokens are left in place so a missing secret
 * stays visible in the rendered file instead of being blanked.
 */
import type { DetectedFormat, TemplateFormat } from './types.js';

const NAME = '[A-Za-z_][A-Za-z0-9_]*';

const PATTERN_SOURCES: Record<TemplateFormat, string> = {
  // {{ op://Vault/NAME/field }} - vault and field are free-form path segments
  go: `\\{\\{\\s*op://[^/\\s}]+/(${NAME})/[^}\\s]+\\s*\\}\\}`,
  'double-brace': `\\{\\{(${NAME})\\}\\}`,
  env: `\\$\\{(${NAME})\\}`,
  custom: `%%(${NAME})%%`,
  // The lookahead keeps $FOO from matching inside $FOOBAR
  'env-simple': `\\$(${NAME})(?![A-Za-z0-9_])`,
};

/**
 * Build a fresh global pattern for `format`.
 * A new RegExp per call avoids sharing `lastIndex` state between scans.
 */
export function tokenPattern(format: TemplateFormat): RegExp {
  return new RegExp(PATTERN_SOURCES[format], 'g');
}

/**
 * Replace tokens of `format` in `template` with values from `values`.
 *
 * - Tokens with a matching key are replaced with the associated value.
 * - Tokens with no matching key are left unchanged (not blanked).
 * - Replacement is single-pass: injected values are never re-scanned, and
 *   `$&`-style sequences in values are inserted literally.
 * - Format `none` returns the template untouched.
 */
export function substituteTokens(
  template: string,
  format: DetectedFormat,
  values: Record<string, string>,
): string {
  if (format === 'none') return template;
  return template.replace(tokenPattern(format), (match, name: string) => {
    return Object.prototype.hasOwnProperty.call(values, name)
      ? values[name]
      : match;
  });
}
