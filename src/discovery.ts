/**
 * Template discovery for `inject-all`.
 *
 * Template files are identified by extension (.template, .tmpl, .tpl) and
 * looked for in a fixed set of home-relative directories, plus the current
 * directory (three levels deep) when it is not the home directory.
 */
import fs from 'fs';
import path from 'path';

import fg from 'fast-glob';

import { logger } from './logger.js';

export const TEMPLATE_EXTENSIONS = ['template', 'tmpl', 'tpl'] as const;

export const DEFAULT_TEMPLATE_LOCATIONS = [
  '.aws',
  '.config',
  '.ssh',
  'configs',
  'templates',
  '.templates',
];

const TEMPLATE_GLOB = `**/*.{${TEMPLATE_EXTENSIONS.join(',')}}`;
const CWD_SCAN_DEPTH = 3;

export interface DiscoveryOptions {
  homeDir: string;
  cwd: string;
  /** Home-relative directories to search. Default: DEFAULT_TEMPLATE_LOCATIONS */
  locations?: string[];
}

/** True when `filePath` ends in one of the template extensions. */
export function isTemplatePath(filePath: string): boolean {
  return TEMPLATE_EXTENSIONS.some((ext) => filePath.endsWith(`.${ext}`));
}

/**
 * Output path for a template: the path with its template extension removed.
 * Paths without a template extension are rendered in place.
 */
export function defaultOutputPath(templatePath: string): string {
  for (const ext of TEMPLATE_EXTENSIONS) {
    const suffix = `.${ext}`;
    if (templatePath.endsWith(suffix) && templatePath.length > suffix.length) {
      return templatePath.slice(0, -suffix.length);
    }
  }
  return templatePath;
}

function isDirectory(dir: string): boolean {
  try {
    return fs.statSync(dir).isDirectory();
  } catch {
    return false;
  }
}

async function globTemplates(dir: string, deep?: number): Promise<string[]> {
  return fg(TEMPLATE_GLOB, {
    cwd: dir,
    absolute: true,
    onlyFiles: true,
    dot: true,
    followSymbolicLinks: false,
    suppressErrors: true,
    ignore: ['**/node_modules/**', '**/.git/**'],
    ...(deep !== undefined ? { deep } : {}),
  });
}

/**
 * Find every template file in the configured locations.
 * Returns absolute paths, de-duplicated and sorted.
 */
export async function discoverTemplates(
  options: DiscoveryOptions,
): Promise<string[]> {
  const found = new Set<string>();
  const locations = options.locations ?? DEFAULT_TEMPLATE_LOCATIONS;

  for (const location of locations) {
    const dir = path.resolve(options.homeDir, location);
    if (!isDirectory(dir)) continue;
    for (const file of await globTemplates(dir)) found.add(path.normalize(file));
  }

  const cwd = path.resolve(options.cwd);
  if (cwd !== path.resolve(options.homeDir)) {
    for (const file of await globTemplates(cwd, CWD_SCAN_DEPTH)) {
      found.add(path.normalize(file));
    }
  }

  const templates = [...found].sort();
  logger.debug({ count: templates.length }, 'Template discovery finished');
  return templates;
}
