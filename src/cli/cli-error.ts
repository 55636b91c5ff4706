import { InvalidScaleError, LinkageValidationError, SolverOptionsError } from "../errors";
import { LinkageDocumentError } from "../LinkageDocument";

export const EXIT_USAGE = 1;
export const EXIT_INVALID_LINKAGE = 2;

export class CliError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = EXIT_USAGE) {
    super(message);
    this.name = "CliError";
    this.exitCode = exitCode;
  }
}

export function assert(condition: unknown, message: string, exitCode = EXIT_USAGE): asserts condition {
  if (!condition) {
    throw new CliError(message, exitCode);
  }
}

/**
 * Maps solver and document failures onto exit codes. Anything else is
 * rethrown untouched.
 */
export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }
  if (error instanceof LinkageValidationError) {
    const where = [error.bodyId && `body ${error.bodyId}`, error.pointId && `point ${error.pointId}`]
      .filter(Boolean)
      .join(", ");
    return new CliError(`[${error.code}] ${error.message}${where ? ` (${where})` : ""}`, EXIT_INVALID_LINKAGE);
  }
  if (
    error instanceof LinkageDocumentError ||
    error instanceof InvalidScaleError ||
    error instanceof SolverOptionsError
  ) {
    return new CliError(error.message, EXIT_USAGE);
  }
  throw error;
}
