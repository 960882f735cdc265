/**
 * secret-inject - render configuration templates with secrets from a
 * credential store.
 *
 * @example
 * ```ts
 * import { SecretResolver, OnePasswordSource, renderTemplate } from 'secret-inject';
 *
 * const resolver = new SecretResolver(new OnePasswordSource({ vault: 'Private' }));
 * const result = await renderTemplate('gitconfig.tmpl', 'gitconfig', { mode: 'dry-run', resolver });
 * console.log(result.bytes, result.tokens);
 * ```
 */
export { scanTemplate, detectFormat, extractTokens } from './scanner.js';
export { substituteTokens, tokenPattern } from './template.js';
export { SecretCache } from './cache.js';
export { SecretResolver, DEFAULT_CACHE_TTL_MS } from './resolver.js';
export type { ResolverOptions, WarmSummary } from './resolver.js';
export {
  OnePasswordSource,
  StaticSecretSource,
  classifyOpFailure,
} from './secret-source.js';
export type { OnePasswordSourceOptions, SpawnFn, SpawnedProcess } from './secret-source.js';
export { renderContent, renderTemplate, substituteContent } from './renderer.js';
export type { RenderOptions, SubstituteOptions, SubstitutionResult } from './renderer.js';
export { injectAll, summarize, exitCodeFor } from './batch.js';
export type { BatchOptions, BatchSummary, FileReport } from './batch.js';
export {
  discoverTemplates,
  defaultOutputPath,
  isTemplatePath,
  DEFAULT_TEMPLATE_LOCATIONS,
  TEMPLATE_EXTENSIONS,
} from './discovery.js';
export { validateTemplate } from './validate.js';
export type { ValidateOptions, ValidationReport } from './validate.js';
export { loadConfig } from './config.js';
export type { InjectConfig } from './config.js';
export { InjectError, ErrorCodes } from './errors.js';
export type { ErrorCode } from './errors.js';
export { TEMPLATE_FORMATS } from './types.js';
export type {
  DetectedFormat,
  MissingReason,
  OverwriteConflict,
  RenderMode,
  RenderOutcome,
  RenderResult,
  Resolution,
  ScanResult,
  SecretFetchResult,
  SecretSource,
  TemplateFormat,
  TokenReport,
} from './types.js';
