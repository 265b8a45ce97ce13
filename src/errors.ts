export type ToolprobeErrorCode =
  | 'NOT_FOUND'
  | 'VALIDATION_FAILED'
  | 'ACTIVATION_FAILED'
  | 'INVALID_ARGUMENT'
  | 'INVALID_ARCHITECTURE'
  | 'GENERATOR_SELECTION_FAILED'
  | 'CONFIG_INVALID';

export type ToolprobeErrorOptions = {
  suggestion?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
};

export class ToolprobeError extends Error {
  override name = 'ToolprobeError';
  readonly code: ToolprobeErrorCode;
  readonly suggestion?: string;
  readonly details?: Record<string, unknown>;

  constructor(code: ToolprobeErrorCode, message: string, opts: ToolprobeErrorOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.code = code;
    this.suggestion = opts.suggestion;
    this.details = opts.details;
  }
}

/** No toolchain, generator or architecture matched the request. */
export class NotFoundError extends ToolprobeError {
  override name = 'NotFoundError';

  constructor(message: string, opts: ToolprobeErrorOptions = {}) {
    super('NOT_FOUND', message, opts);
  }
}

/** Found, but unusable; `missing` names what is absent. */
export class ValidationError extends ToolprobeError {
  override name = 'ValidationError';
  readonly missing: readonly string[];

  constructor(message: string, missing: readonly string[] = [], opts: ToolprobeErrorOptions = {}) {
    super('VALIDATION_FAILED', message, opts);
    this.missing = Object.freeze([...missing]);
  }
}

/** Environment mutation failed; the environment was left as it was. */
export class ActivationError extends ToolprobeError {
  override name = 'ActivationError';

  constructor(message: string, opts: ToolprobeErrorOptions = {}) {
    super('ACTIVATION_FAILED', message, opts);
  }
}

function validValuesSuggestion(valid: readonly string[]): string {
  return `valid values are: ${valid.join(', ')}`;
}

export class InvalidArgumentError extends ToolprobeError {
  override name = 'InvalidArgumentError';
  readonly validValues: readonly string[];

  constructor(
    message: string,
    validValues: readonly string[],
    opts: ToolprobeErrorOptions = {},
    code: ToolprobeErrorCode = 'INVALID_ARGUMENT',
  ) {
    const suggestion = opts.suggestion ?? (validValues.length ? validValuesSuggestion(validValues) : undefined);
    const full = validValues.length ? `${message} (${validValuesSuggestion(validValues)})` : message;
    super(code, full, { ...opts, suggestion });
    this.validValues = Object.freeze([...validValues]);
  }
}

export class InvalidArchitectureError extends InvalidArgumentError {
  override name = 'InvalidArchitectureError';

  constructor(message: string, validValues: readonly string[], opts: ToolprobeErrorOptions = {}) {
    super(message, validValues, opts, 'INVALID_ARCHITECTURE');
  }
}

export class GeneratorSelectionError extends ToolprobeError {
  override name = 'GeneratorSelectionError';

  constructor(message: string, opts: ToolprobeErrorOptions = {}) {
    super('GENERATOR_SELECTION_FAILED', message, opts);
  }
}

export class ConfigError extends ToolprobeError {
  override name = 'ConfigError';

  constructor(message: string, opts: ToolprobeErrorOptions = {}) {
    super('CONFIG_INVALID', message, opts);
  }
}

export type DetectionErrorType =
  | 'timeout'
  | 'file_not_found'
  | 'permission'
  | 'validation'
  | 'invalid_argument'
  | 'detection';

/** Structured, serializable failure of one detection component. */
export type DetectionError = {
  component: string;
  errorType: DetectionErrorType;
  message: string;
  suggestion?: string;
};

const defaultSuggestions: Record<DetectionErrorType, string> = {
  timeout: 'The tool took too long to respond; check that it is not waiting for input or a license prompt.',
  file_not_found: 'Ensure the toolchain is installed and the referenced path exists.',
  permission: 'Check file permissions or run from an account that can execute the toolchain.',
  validation: 'Reinstall the toolchain or repair the installation so all expected tools are present.',
  invalid_argument: 'Check the requested family and architecture names.',
  detection: 'Ensure compiler is installed and accessible in system PATH or standard locations.',
};

function errnoCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  const code = err.code;
  return typeof code === 'string' ? code : undefined;
}

export function classifyError(err: unknown): DetectionErrorType {
  if (err instanceof InvalidArgumentError) return 'invalid_argument';
  if (err instanceof ValidationError) return 'validation';
  if (err instanceof NotFoundError) return 'file_not_found';
  const code = errnoCode(err);
  if (code === 'ETIMEDOUT') return 'timeout';
  if (code === 'ENOENT' || code === 'ENOTDIR') return 'file_not_found';
  if (code === 'EACCES' || code === 'EPERM') return 'permission';
  return 'detection';
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function toDetectionError(component: string, err: unknown): DetectionError {
  const errorType = classifyError(err);
  const suggestion =
    err instanceof ToolprobeError && err.suggestion ? err.suggestion : defaultSuggestions[errorType];
  return { component, errorType, message: errorMessage(err), suggestion };
}
