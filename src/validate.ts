/**
 * Template validation: reports the detected format and tokens, and
 * optionally checks that every token resolves.
 */
import type { SecretResolver } from './resolver.js';
import { readTemplate, substituteContent } from './renderer.js';
import type { DetectedFormat, TemplateFormat, TokenReport } from './types.js';

export interface ValidateOptions {
  resolver: SecretResolver;
  /** Resolve each token against the store. Default: true */
  check?: boolean;
  /** Treat a file mixing placeholder formats as invalid. Default: false */
  strict?: boolean;
  format?: TemplateFormat;
}

export interface ValidationReport {
  templatePath: string;
  format: DetectedFormat;
  otherFormats: TemplateFormat[];
  tokens: TokenReport[];
  problems: string[];
  ok: boolean;
}

/**
 * @throws InjectError when the template is missing or binary
 */
export async function validateTemplate(
  templatePath: string,
  options: ValidateOptions,
): Promise<ValidationReport> {
  const { content } = readTemplate(templatePath);
  const substitution = await substituteContent(content, {
    resolver: options.resolver,
    format: options.format,
    resolveSecrets: options.check ?? true,
  });

  const problems: string[] = [];
  for (const token of substitution.tokens) {
    if (token.status === 'missing') {
      problems.push(`Missing secret: ${token.name} (${token.reason})`);
    }
  }
  if (options.strict && substitution.otherFormats.length > 0) {
    problems.push(
      `Mixed formats: ${substitution.format} is used, ${substitution.otherFormats.join(', ')} would be left literal`,
    );
  }

  return {
    templatePath,
    format: substitution.format,
    otherFormats: substitution.otherFormats,
    tokens: substitution.tokens,
    problems,
    ok: problems.length === 0,
  };
}
