/**
 * Token scanner: classifies a template's placeholder syntax and lists the
 * distinct token names written in it.
 */
import { tokenPattern } from './template.js';
import {
  type DetectedFormat,
  type ScanResult,
  TEMPLATE_FORMATS,
  type TemplateFormat,
} from './types.js';

function formatsPresent(content: string): TemplateFormat[] {
  return TEMPLATE_FORMATS.filter((format) => tokenPattern(format).test(content));
}

/**
 * Detect the format of `content`: the first format in priority order with at
 * least one match, or `none`.
 */
export function detectFormat(content: string): DetectedFormat {
  return formatsPresent(content)[0] ?? 'none';
}

/**
 * Distinct token names of `format` in `content`, ordered by first appearance.
 */
export function extractTokens(content: string, format: TemplateFormat): string[] {
  const seen = new Set<string>();
  for (const match of content.matchAll(tokenPattern(format))) {
    seen.add(match[1]);
  }
  return [...seen];
}

/**
 * Scan a template. A single format governs the whole file; tokens written
 * in any other syntax are reported through `otherFormats` and left alone.
 *
 * @param content - Template text
 * @param forced  - Use this format instead of detecting one
 */
export function scanTemplate(
  content: string,
  forced?: TemplateFormat,
): ScanResult {
  const present = formatsPresent(content);
  const format: DetectedFormat = forced ?? present.at(0) ?? 'none';
  if (format === 'none') {
    return { format, tokens: [], otherFormats: [] };
  }
  return {
    format,
    tokens: extractTokens(content, format),
    otherFormats: present.filter((f) => f !== format),
  };
}
