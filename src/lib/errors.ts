export const ExitCodes = {
  Success: 0,
  Failure: 1,
  Usage: 2,
  Validation: 3,
  Consistency: 4,
  State: 5,
  Interrupted: 130,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

export class NixyError extends Error {
  public readonly code: ExitCode;

  constructor(message: string, code: ExitCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NixyError";
    this.code = code;
  }
}

export function usageError(message: string): NixyError {
  return new NixyError(message, ExitCodes.Usage);
}

export function validationError(message: string): NixyError {
  return new NixyError(message, ExitCodes.Validation);
}

export function consistencyError(message: string): NixyError {
  return new NixyError(message, ExitCodes.Consistency);
}

export function externalError(message: string, cause?: unknown): NixyError {
  return new NixyError(message, ExitCodes.Failure, { cause });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
