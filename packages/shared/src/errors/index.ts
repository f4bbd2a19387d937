/**
 * Custom error hierarchy for polyschema
 */

export type ErrorCategory =
  | 'PARSE'
  | 'TYPE'
  | 'VALIDATOR'
  | 'DRIFT'
  | 'INHERITANCE'
  | 'CONFIGURATION'
  | 'UNKNOWN';

export type ErrorSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface ErrorContext {
  category: ErrorCategory;
  severity: ErrorSeverity;
  retryable: boolean;
  schema?: string;
  field?: string;
  target?: string;
  sourcePath?: string;
  [key: string]: unknown;
}

/**
 * Locates an error inside a schema: which schema, field and target it concerns.
 */
export interface SchemaLocation {
  schema?: string;
  field?: string;
  target?: string;
  sourcePath?: string;
}

/**
 * Render a location as a message prefix, e.g. `[Venue.capacity -> storage]`
 */
export function formatLocation(location: SchemaLocation): string {
  const parts: string[] = [];
  const subject = [location.schema, location.field].filter(Boolean).join('.');
  if (subject) parts.push(subject);
  if (location.target) parts.push(`-> ${location.target}`);
  if (location.sourcePath) parts.push(`(${location.sourcePath})`);
  return parts.length > 0 ? `[${parts.join(' ')}] ` : '';
}

/**
 * Base error class for polyschema
 */
export class SchemaCompilerError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(message);
    this.name = 'SchemaCompilerError';
    this.code = code;
    this.context = {
      ...context,
      category: context.category ?? 'UNKNOWN',
      severity: context.severity ?? 'MEDIUM',
      retryable: context.retryable ?? false,
    };
    this.timestamp = new Date();

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

/**
 * Malformed or incomplete schema description. Aborts that file only.
 */
export class ParseError extends SchemaCompilerError {
  constructor(message: string, location: SchemaLocation = {}) {
    super(`${formatLocation(location)}${message}`, 'E1001', {
      category: 'PARSE',
      severity: 'HIGH',
      retryable: false,
      ...location,
    });
    this.name = 'ParseError';
  }
}

/**
 * Logical type, or per-target override type, that a target cannot represent
 */
export class UnsupportedTypeError extends SchemaCompilerError {
  public readonly unsupportedType: string;

  constructor(unsupportedType: string, reason: string, location: SchemaLocation = {}) {
    super(`${formatLocation(location)}Unsupported type '${unsupportedType}': ${reason}`, 'E2001', {
      category: 'TYPE',
      severity: 'HIGH',
      retryable: false,
      unsupportedType,
      ...location,
    });
    this.name = 'UnsupportedTypeError';
    this.unsupportedType = unsupportedType;
  }
}

/**
 * Unrecognized validator name attached to a field
 */
export class ValidatorError extends SchemaCompilerError {
  public readonly validator: string;

  constructor(validator: string, supported: readonly string[], location: SchemaLocation = {}) {
    super(
      `${formatLocation(location)}Unsupported validator '${validator}'. Supported validators: ${supported.join(', ')}`,
      'E3001',
      {
        category: 'VALIDATOR',
        severity: 'HIGH',
        retryable: false,
        validator,
        ...location,
      }
    );
    this.name = 'ValidatorError';
    this.validator = validator;
  }
}

/**
 * Regenerated artifact differs from the committed one. Reported, never thrown.
 */
export class DriftError extends SchemaCompilerError {
  public readonly artifactPath: string;

  constructor(artifactPath: string, location: SchemaLocation = {}) {
    super(
      `${formatLocation(location)}Generated artifact ${artifactPath} is out of sync with its schema; regenerate it`,
      'E4001',
      {
        category: 'DRIFT',
        severity: 'MEDIUM',
        retryable: false,
        artifactPath,
        ...location,
      }
    );
    this.name = 'DriftError';
    this.artifactPath = artifactPath;
  }
}

/**
 * Broken `extends` chains
 */
export class InheritanceError extends SchemaCompilerError {
  constructor(message: string, code: string, location: SchemaLocation = {}) {
    super(`${formatLocation(location)}${message}`, code, {
      category: 'INHERITANCE',
      severity: 'CRITICAL',
      retryable: false,
      ...location,
    });
    this.name = 'InheritanceError';
  }
}

export class InheritanceCycleError extends InheritanceError {
  public readonly chain: readonly string[];

  constructor(chain: readonly string[], location: SchemaLocation = {}) {
    super(`Cyclic extends chain: ${chain.join(' -> ')}`, 'E5001', location);
    this.name = 'InheritanceCycleError';
    this.chain = chain;
  }
}

export class ParentSchemaNotFoundError extends InheritanceError {
  public readonly parent: string;

  constructor(parent: string, location: SchemaLocation = {}) {
    super(`Parent schema '${parent}' could not be loaded`, 'E5002', location);
    this.name = 'ParentSchemaNotFoundError';
    this.parent = parent;
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends SchemaCompilerError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E6001', {
      category: 'CONFIGURATION',
      severity: 'CRITICAL',
      retryable: false,
      ...context,
    });
    this.name = 'ConfigurationError';
  }
}

export function isSchemaCompilerError(error: unknown): error is SchemaCompilerError {
  return error instanceof SchemaCompilerError;
}

/**
 * Helper to wrap unknown errors
 */
export function wrapError(error: unknown, context: Partial<ErrorContext> = {}): SchemaCompilerError {
  if (error instanceof SchemaCompilerError) {
    return error;
  }

  if (error instanceof Error) {
    return new SchemaCompilerError(error.message, 'E9999', {
      category: 'UNKNOWN',
      severity: 'MEDIUM',
      retryable: false,
      originalError: error.name,
      ...context,
    });
  }

  return new SchemaCompilerError(String(error), 'E9999', {
    category: 'UNKNOWN',
    severity: 'MEDIUM',
    retryable: false,
    ...context,
  });
}
