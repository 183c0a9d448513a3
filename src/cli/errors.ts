/**
 * Error codes and exit codes for cmdkit applications
 *
 * Error codes appear in JSON error envelopes; exit codes follow the usual
 * Unix conventions so scripts can branch on them.
 */

/**
 * Machine-readable error codes
 */
export enum ErrorCode {
  /** Operation completed successfully */
  SUCCESS = 'SUCCESS',

  /** Unspecified error (generic fallback) */
  GENERAL_ERROR = 'GENERAL_ERROR',

  /** Invalid command arguments or flags */
  INVALID_ARGUMENTS = 'INVALID_ARGUMENTS',

  /** Configuration file missing, unreadable or invalid */
  CONFIG_ERROR = 'CONFIG_ERROR',

  /** Requested resource not found */
  NOT_FOUND = 'NOT_FOUND',

  /** Access denied or insufficient permissions */
  PERMISSION_DENIED = 'PERMISSION_DENIED',

  /** No command registered under the requested name */
  UNKNOWN_COMMAND = 'UNKNOWN_COMMAND',

  /** A command reported a failure */
  COMMAND_FAILED = 'COMMAND_FAILED',

  /** Registry or other HTTP request failed */
  NETWORK_ERROR = 'NETWORK_ERROR',

  /** Keychain access failed */
  CREDENTIAL_ERROR = 'CREDENTIAL_ERROR',

  /** Internal error */
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Process exit codes
 *
 * - 0: Success
 * - 1: General error
 * - 2-125: Specific errors
 */
export enum ExitCode {
  SUCCESS = 0,
  GENERAL_ERROR = 1,
  INVALID_ARGUMENTS = 2,
  CONFIG_ERROR = 3,
  NOT_FOUND = 4,
  PERMISSION_DENIED = 5,
}

export const ERROR_CODE_TO_EXIT_CODE: Record<ErrorCode, ExitCode> = {
  [ErrorCode.SUCCESS]: ExitCode.SUCCESS,
  [ErrorCode.GENERAL_ERROR]: ExitCode.GENERAL_ERROR,
  [ErrorCode.INVALID_ARGUMENTS]: ExitCode.INVALID_ARGUMENTS,
  [ErrorCode.CONFIG_ERROR]: ExitCode.CONFIG_ERROR,
  [ErrorCode.NOT_FOUND]: ExitCode.NOT_FOUND,
  [ErrorCode.PERMISSION_DENIED]: ExitCode.PERMISSION_DENIED,

  [ErrorCode.UNKNOWN_COMMAND]: ExitCode.INVALID_ARGUMENTS,
  [ErrorCode.COMMAND_FAILED]: ExitCode.GENERAL_ERROR,
  [ErrorCode.NETWORK_ERROR]: ExitCode.GENERAL_ERROR,
  [ErrorCode.CREDENTIAL_ERROR]: ExitCode.GENERAL_ERROR,
  [ErrorCode.INTERNAL_ERROR]: ExitCode.GENERAL_ERROR,
};

/**
 * Get the exit code for a given error code
 */
export function getExitCode(errorCode: ErrorCode): ExitCode {
  return ERROR_CODE_TO_EXIT_CODE[errorCode] ?? ExitCode.GENERAL_ERROR;
}

function isErrorCode(value: string): value is ErrorCode {
  return Object.values<string>(ErrorCode).includes(value);
}

/**
 * Get the exit code for an error code string, e.g. one read back from JSON
 */
export function getExitCodeFromString(errorCodeStr: string): ExitCode {
  if (isErrorCode(errorCodeStr)) {
    return ERROR_CODE_TO_EXIT_CODE[errorCodeStr];
  }
  return ExitCode.GENERAL_ERROR;
}

/**
 * Error carrying an error code and the exit code the process should use
 */
export class CliError extends Error {
  public readonly code: ErrorCode;
  public readonly exitCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    details?: Record<string, unknown>,
    exitCode?: number
  ) {
    super(message);
    this.name = 'CliError';
    this.code = code;
    this.exitCode = exitCode ?? getExitCode(code);
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): { code: string; message: string; details?: Record<string, unknown> } {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Error thrown by commands to fail with a message and an exit code.
 * `Command.safeExecute` turns it into a failed outcome instead of a crash.
 */
export class CommandError extends CliError {
  constructor(message: string, exitCode: number = ExitCode.GENERAL_ERROR, details?: Record<string, unknown>) {
    super(ErrorCode.COMMAND_FAILED, message, details, exitCode);
    this.name = 'CommandError';
  }
}

export function invalidArgumentsError(message: string, details?: Record<string, unknown>): CliError {
  return new CliError(ErrorCode.INVALID_ARGUMENTS, message, details);
}

export function configError(message: string, details?: Record<string, unknown>): CliError {
  return new CliError(ErrorCode.CONFIG_ERROR, message, details);
}

export function unknownCommandError(command: string): CliError {
  return new CliError(ErrorCode.UNKNOWN_COMMAND, `Unknown command: ${command}`, { command });
}

export function notFoundError(what: string, details?: Record<string, unknown>): CliError {
  return new CliError(ErrorCode.NOT_FOUND, `Not found: ${what}`, details);
}

/**
 * Extract a message from anything that was thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
