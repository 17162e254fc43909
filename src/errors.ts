export type SteganographyErrorCode =
  | 'InvalidFile'
  | 'InvalidDocument'
  | 'CapacityExceeded'
  | 'CapacityMismatch'
  | 'UsageError'
  | 'InvalidConfiguration';

/**
 * Base class for every failure the CLI reports to the user.
 * `exitCode` follows the BSD sysexits conventions.
 */
export class SteganographyError extends Error {
  constructor(
    message: string,
    public readonly code: SteganographyErrorCode,
    public readonly exitCode: number = 1,
  ) {
    super(message);
    this.name = 'SteganographyError';
  }
}

export class InvalidFileError extends SteganographyError {
  constructor(public readonly path: string, cause?: unknown) {
    super(`${path} is not a valid file`, 'InvalidFile', 66);
    this.name = 'InvalidFileError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class InvalidDocumentError extends SteganographyError {
  constructor(reason: string, public readonly source?: string) {
    super(
      source ? `${source} is not a valid svg image: ${reason}` : `Not a valid svg image: ${reason}`,
      'InvalidDocument',
      65,
    );
    this.name = 'InvalidDocumentError';
  }
}

export class CapacityExceededError extends SteganographyError {
  constructor(
    public readonly requiredBits: number,
    public readonly availableSlots: number,
  ) {
    super(
      `Message size is greater than carrier capacity (${requiredBits} bits needed, ${availableSlots} available)`,
      'CapacityExceeded',
      73,
    );
    this.name = 'CapacityExceededError';
  }
}

export class CapacityMismatchError extends SteganographyError {
  constructor(
    public readonly declaredBits: number,
    public readonly availableSlots: number,
    detail: string = 'header length exceeds available slots',
  ) {
    super(
      `Could not extract message: ${detail}. Stego-key incorrect or carrier image damaged`,
      'CapacityMismatch',
      65,
    );
    this.name = 'CapacityMismatchError';
  }
}

export class UsageError extends SteganographyError {
  constructor(message: string) {
    super(message, 'UsageError', 64);
    this.name = 'UsageError';
  }
}

export class ConfigurationError extends SteganographyError {
  constructor(public readonly variable: string, reason: string) {
    super(`Invalid value for ${variable}: ${reason}`, 'InvalidConfiguration', 78);
    this.name = 'ConfigurationError';
  }
}

export function isSteganographyError(error: unknown): error is SteganographyError {
  return error instanceof SteganographyError;
}
