import { ErrorCode } from '../types';

export class PrinterError extends Error {
  readonly code: ErrorCode;
  readonly details?: unknown;

  constructor(code: ErrorCode, message: string, options: { details?: unknown; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'PrinterError';
    this.code = code;
    this.details = options.details;
  }
}

export class ErrorHandler {
  static createError(code: ErrorCode, message: string, details?: unknown, cause?: unknown): PrinterError {
    return new PrinterError(code, message, { details, cause });
  }

  static hasCode(error: unknown, code: ErrorCode): boolean {
    return error instanceof PrinterError && error.code === code;
  }

  static isTransportError(error: unknown): boolean {
    return ErrorHandler.hasCode(error, ErrorCode.TransportFailed) ||
           ErrorHandler.hasCode(error, ErrorCode.ConnectionFailed) ||
           ErrorHandler.hasCode(error, ErrorCode.RequestTimeout);
  }

  static isPreconditionError(error: unknown): boolean {
    return ErrorHandler.hasCode(error, ErrorCode.MachineNotReady) ||
           ErrorHandler.hasCode(error, ErrorCode.AxisNotHomed) ||
           ErrorHandler.hasCode(error, ErrorCode.LimitsNotInitialized);
  }

  static formatError(error: unknown): string {
    if (error instanceof PrinterError) {
      return `[${error.code}] ${error.message}`;
    }
    if (error instanceof Error) {
      return error.message;
    }
    return String(error);
  }
}
