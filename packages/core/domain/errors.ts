/**
 * Error Hierarchy
 *
 * All errors extend ConvergeError with an error code and a recoverable flag.
 * Recoverable errors leave the live object unconverged and let the run move
 * on; fatal errors stop the run and name the offending entity's path.
 *
 * @module packages/core/domain/errors
 */

// ============================================================================
// Error Codes
// ============================================================================

/**
 * Error code categories:
 * - DECLARATION_*: Declared tree construction errors (1xxx)
 * - CONFIG_*: Declared schema file errors (2xxx)
 * - RECONCILE_*: Alignment errors (3xxx)
 * - DRIVER_*: Backend driver errors (4xxx)
 */
export const ErrorCodes = {
  // Declaration errors (1xxx)
  DECLARATION_INVALID_CHILD: 'E1001',
  DECLARATION_DUPLICATE_CHILD: 'E1002',
  DECLARATION_CHILD_NOT_FOUND: 'E1003',
  DECLARATION_ATTRIBUTES: 'E1004',
  DECLARATION_INVALID_VALUE: 'E1005',

  // Configuration errors (2xxx)
  CONFIG_NOT_FOUND: 'E2001',
  CONFIG_PARSE_ERROR: 'E2002',
  CONFIG_VALIDATION_ERROR: 'E2003',
  CONFIG_CONNECTION_MISSING: 'E2004',

  // Reconciliation errors (3xxx)
  RECONCILE_TYPE_MISMATCH: 'E3001',
  RECONCILE_DETAIL_NOT_FOUND: 'E3002',
  RECONCILE_ATTRIBUTE_NOT_ALTERED: 'E3003',
  RECONCILE_RENAME_NOT_VERIFIED: 'E3004',
  RECONCILE_CREATE_NOT_VERIFIED: 'E3005',
  RECONCILE_ATTRIBUTE_UNREADABLE: 'E3006',
  RECONCILE_OBJECT_NOT_FOUND: 'E3007',
  RECONCILE_OPERATION_REFUSED: 'E3008',

  // Driver errors (4xxx)
  DRIVER_CONNECTION_FAILED: 'E4001',
  DRIVER_STATEMENT_FAILED: 'E4002',
  DRIVER_CLOSED: 'E4003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ============================================================================
// Base Error Class
// ============================================================================

export interface ConvergeErrorOptions {
  code: ErrorCode;
  recoverable?: boolean;
  suggestion?: string;
  details?: string[];
  cause?: Error;
}

/**
 * Base error class for all reconciler errors
 *
 * Features:
 * - Unique error code for identification
 * - Recoverable flag separating skips from run-stopping failures
 * - Cause chain for root cause analysis
 * - Suggestion text for operator guidance
 */
export class ConvergeError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode;

  /** Whether alignment may continue past this error */
  readonly recoverable: boolean;

  /** Suggested action for the operator */
  readonly suggestion?: string;

  /** Additional details about the error */
  readonly details?: string[];

  constructor(message: string, options: ConvergeErrorOptions) {
    super(message, { cause: options.cause });
    this.name = 'ConvergeError';
    this.code = options.code;
    this.recoverable = options.recoverable ?? false;
    this.suggestion = options.suggestion;
    this.details = options.details;
  }

  /**
   * Format error for display
   */
  toDisplayString(): string {
    let output = `${this.message} [${this.code}]`;
    if (this.details && this.details.length > 0) {
      output += '\n' + this.details.map((d) => `  - ${d}`).join('\n');
    }
    if (this.suggestion) {
      output += `\n\nSuggestion: ${this.suggestion}`;
    }
    return output;
  }

  /**
   * Format error for JSON output
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      recoverable: this.recoverable,
      suggestion: this.suggestion,
      details: this.details,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

// ============================================================================
// Declaration Errors
// ============================================================================

/**
 * Declared tree is structurally invalid
 */
export class DeclarationError extends ConvergeError {
  constructor(
    message: string,
    options: {
      code?: ErrorCode;
      suggestion?: string;
      details?: string[];
    } = {}
  ) {
    super(message, {
      code: options.code ?? ErrorCodes.DECLARATION_INVALID_VALUE,
      recoverable: false,
      suggestion: options.suggestion,
      details: options.details,
    });
    this.name = 'DeclarationError';
  }
}

/**
 * Child type not allowed under the parent type
 */
export class InvalidChildError extends DeclarationError {
  readonly parentType: string;
  readonly childType: string;

  constructor(parentType: string, childType: string, allowed: readonly string[]) {
    super(`A ${childType} cannot be a child of a ${parentType}`, {
      code: ErrorCodes.DECLARATION_INVALID_CHILD,
      suggestion:
        allowed.length > 0
          ? `A ${parentType} accepts: ${allowed.join(', ')}.`
          : `A ${parentType} has no children.`,
    });
    this.name = 'InvalidChildError';
    this.parentType = parentType;
    this.childType = childType;
  }
}

/**
 * Two siblings of one type share an identity key
 */
export class DuplicateChildError extends DeclarationError {
  readonly parentPath: string;
  readonly childType: string;
  readonly key: string;

  constructor(parentPath: string, childType: string, key: string) {
    super(`Duplicate ${childType} "${key}" under ${parentPath}`, {
      code: ErrorCodes.DECLARATION_DUPLICATE_CHILD,
      suggestion: `Declare each ${childType} once per parent.`,
    });
    this.name = 'DuplicateChildError';
    this.parentPath = parentPath;
    this.childType = childType;
    this.key = key;
  }
}

/**
 * Declared child lookup failed
 */
export class ChildNotFoundError extends DeclarationError {
  readonly parentPath: string;
  readonly childName: string;

  constructor(parentPath: string, childName: string, childType?: string) {
    super(
      childType
        ? `No ${childType} named "${childName}" under ${parentPath}`
        : `No child named "${childName}" under ${parentPath}`,
      { code: ErrorCodes.DECLARATION_CHILD_NOT_FOUND }
    );
    this.name = 'ChildNotFoundError';
    this.parentPath = parentPath;
    this.childName = childName;
  }
}

/**
 * Declared attribute names differ from the registered set
 */
export class AttributeSetError extends DeclarationError {
  readonly entityType: string;

  constructor(entityType: string, missing: readonly string[], unexpected: readonly string[]) {
    const details = [
      ...missing.map((name) => `missing attribute: ${name}`),
      ...unexpected.map((name) => `unexpected attribute: ${name}`),
    ];
    super(`Invalid attribute set for ${entityType}`, {
      code: ErrorCodes.DECLARATION_ATTRIBUTES,
      details,
    });
    this.name = 'AttributeSetError';
    this.entityType = entityType;
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Declared schema file errors
 */
export class ConfigError extends ConvergeError {
  constructor(
    message: string,
    options: {
      code?: ErrorCode;
      suggestion?: string;
      details?: string[];
      cause?: Error;
    } = {}
  ) {
    super(message, {
      code: options.code ?? ErrorCodes.CONFIG_PARSE_ERROR,
      recoverable: false,
      suggestion: options.suggestion ?? 'Check your schema file for syntax errors.',
      details: options.details,
      cause: options.cause,
    });
    this.name = 'ConfigError';
  }
}

/**
 * Schema file not found
 */
export class ConfigNotFoundError extends ConfigError {
  readonly filePath: string;

  constructor(filePath: string) {
    super(`Schema file not found: ${filePath}`, {
      code: ErrorCodes.CONFIG_NOT_FOUND,
      suggestion: 'Specify a path with -f/--file.',
    });
    this.name = 'ConfigNotFoundError';
    this.filePath = filePath;
  }
}

/**
 * Schema file validation failed
 */
export class ConfigValidationError extends ConfigError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('Schema validation failed', {
      code: ErrorCodes.CONFIG_VALIDATION_ERROR,
      details: issues,
      suggestion: 'Fix the validation errors listed above.',
    });
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

// ============================================================================
// Reconciliation Errors
// ============================================================================

/**
 * Alignment failure bound to one entity
 */
export class ReconcileError extends ConvergeError {
  /** Qualified path of the offending entity */
  readonly path: string;

  constructor(
    message: string,
    options: {
      code: ErrorCode;
      path: string;
      recoverable?: boolean;
      suggestion?: string;
      details?: string[];
      cause?: Error;
    }
  ) {
    super(`${message} (${options.path})`, {
      code: options.code,
      recoverable: options.recoverable ?? false,
      suggestion: options.suggestion,
      details: options.details,
      cause: options.cause,
    });
    this.name = 'ReconcileError';
    this.path = options.path;
  }
}

export class TypeMismatchError extends ReconcileError {
  constructor(path: string, declaredType: string, reflectedType: string) {
    super(`Cannot align a declared ${declaredType} with a live ${reflectedType}`, {
      code: ErrorCodes.RECONCILE_TYPE_MISMATCH,
      path,
    });
    this.name = 'TypeMismatchError';
  }
}

export class DetailNotFoundError extends ReconcileError {
  constructor(path: string) {
    super('Detail query returned no row', {
      code: ErrorCodes.RECONCILE_DETAIL_NOT_FOUND,
      path,
      suggestion: 'The object was removed while alignment was running. Run alignment again.',
    });
    this.name = 'DetailNotFoundError';
  }
}

/**
 * The live server accepted a change but reports a different value afterwards
 */
export class AttributeNotAlteredError extends ReconcileError {
  readonly attribute: string;

  constructor(path: string, attribute: string, expected: string, actual: string) {
    super(`Attribute "${attribute}" was not altered`, {
      code: ErrorCodes.RECONCILE_ATTRIBUTE_NOT_ALTERED,
      path,
      details: [`expected: ${expected}`, `actual: ${actual}`],
    });
    this.name = 'AttributeNotAlteredError';
    this.attribute = attribute;
  }
}

export class RenameNotVerifiedError extends ReconcileError {
  constructor(path: string, newName: string) {
    super(`Rename to "${newName}" could not be verified`, {
      code: ErrorCodes.RECONCILE_RENAME_NOT_VERIFIED,
      path,
    });
    this.name = 'RenameNotVerifiedError';
  }
}

export class CreateNotVerifiedError extends ReconcileError {
  constructor(path: string) {
    super('Created object does not match its declaration', {
      code: ErrorCodes.RECONCILE_CREATE_NOT_VERIFIED,
      path,
    });
    this.name = 'CreateNotVerifiedError';
  }
}

export class AttributeUnreadableError extends ReconcileError {
  readonly attribute: string;

  constructor(path: string, attribute: string, reason: string) {
    super(`Attribute "${attribute}" cannot be read: ${reason}`, {
      code: ErrorCodes.RECONCILE_ATTRIBUTE_UNREADABLE,
      path,
    });
    this.name = 'AttributeUnreadableError';
    this.attribute = attribute;
  }
}

/**
 * Live object the operation needs does not exist
 */
export class ObjectNotFoundError extends ReconcileError {
  constructor(path: string, what: string) {
    super(`${what} does not exist`, {
      code: ErrorCodes.RECONCILE_OBJECT_NOT_FOUND,
      path,
      recoverable: true,
    });
    this.name = 'ObjectNotFoundError';
  }
}

/**
 * Operation the engine will not perform against this object
 */
export class OperationRefusedError extends ReconcileError {
  constructor(path: string, reason: string, recoverable = true) {
    super(reason, {
      code: ErrorCodes.RECONCILE_OPERATION_REFUSED,
      path,
      recoverable,
    });
    this.name = 'OperationRefusedError';
  }
}

// ============================================================================
// Driver Errors
// ============================================================================

export class DriverError extends ConvergeError {
  /** Statement text that failed, when there was one */
  readonly statement?: string;

  constructor(
    message: string,
    options: {
      code?: ErrorCode;
      statement?: string;
      cause?: Error;
    } = {}
  ) {
    super(message, {
      code: options.code ?? ErrorCodes.DRIVER_STATEMENT_FAILED,
      recoverable: false,
      details: options.statement ? [options.statement] : undefined,
      cause: options.cause,
    });
    this.name = 'DriverError';
    this.statement = options.statement;
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Check if an error is a ConvergeError
 */
export function isConvergeError(error: unknown): error is ConvergeError {
  return error instanceof ConvergeError;
}

/**
 * Extract error code from any error
 */
export function getErrorCode(error: unknown): ErrorCode | string {
  if (error instanceof ConvergeError) {
    return error.code;
  }
  if (error instanceof Error && 'code' in error) {
    return String(error.code);
  }
  return 'UNKNOWN';
}
