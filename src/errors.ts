/**
 * Error codes for conditions that stop a single template or the CLI.
 * Per-token failures are not errors; they are reported as `missing` tokens.
 */
export const ErrorCodes = {
  TEMPLATE_NOT_FOUND: 'INJECT_ERR_TEMPLATE_NOT_FOUND',
  BINARY_TEMPLATE: 'INJECT_ERR_BINARY_TEMPLATE',
  USAGE: 'INJECT_ERR_USAGE',
  INVALID_CONFIG: 'INJECT_ERR_INVALID_CONFIG',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class InjectError extends Error {
  public readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = 'InjectError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InjectError);
    }
  }
}

export function templateNotFoundError(templatePath: string): InjectError {
  return new InjectError(
    ErrorCodes.TEMPLATE_NOT_FOUND,
    `Template not found: ${templatePath}`,
  );
}

export function binaryTemplateError(templatePath: string): InjectError {
  return new InjectError(
    ErrorCodes.BINARY_TEMPLATE,
    `Cannot process binary file: ${templatePath}`,
  );
}

export function usageError(message: string): InjectError {
  return new InjectError(ErrorCodes.USAGE, message);
}

export function invalidConfigError(message: string): InjectError {
  return new InjectError(ErrorCodes.INVALID_CONFIG, message);
}
