/**
 * Custom Error Classes
 */

/**
 * Base error class for all encodeq errors
 */
export class EncodeqError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EncodeqError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Required external tools are absent. Fatal at startup.
 */
export class MissingDependencyError extends EncodeqError {
  public readonly missing: readonly string[];

  constructor(missing: readonly string[]) {
    super(
      `Missing required tool${missing.length === 1 ? '' : 's'}: ${missing.join(', ')}`,
      'MISSING_DEPENDENCY',
      { missing }
    );
    this.name = 'MissingDependencyError';
    this.missing = missing;
  }
}

/**
 * Metadata could not be read for a file
 */
export class ProbeError extends EncodeqError {
  constructor(filePath: string, reason: string) {
    super(
      `Could not read media info for ${filePath}: ${reason}`,
      'PROBE_ERROR',
      { filePath, reason }
    );
    this.name = 'ProbeError';
  }
}

/**
 * A queue file is unreadable or does not match the queue format
 */
export class QueueFormatError extends EncodeqError {
  constructor(filePath: string, reason: string) {
    super(
      `Invalid queue file ${filePath}: ${reason}`,
      'QUEUE_FORMAT_ERROR',
      { filePath, reason }
    );
    this.name = 'QueueFormatError';
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends EncodeqError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * External command error
 */
export class CommandExecutionError extends EncodeqError {
  public readonly exitCode: number;
  public readonly stderr: string;

  constructor(
    command: string,
    exitCode: number,
    stderr: string
  ) {
    super(
      `${command} failed with exit code ${exitCode}`,
      'COMMAND_EXECUTION_ERROR',
      { command, exitCode, stderr: stderr.substring(0, 1000) }
    );
    this.name = 'CommandExecutionError';
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/**
 * Human-readable message for anything thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
