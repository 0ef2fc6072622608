import { ErrorCode } from '../src/types';
import { ErrorHandler, PrinterError } from '../src/utils/error-handler';

describe('ErrorHandler', () => {
  test('should format printer errors with their code', () => {
    const error = ErrorHandler.createError(ErrorCode.AxisNotHomed, "Axis 'X' not homed.");

    expect(ErrorHandler.formatError(error)).toBe("[AXIS_NOT_HOMED] Axis 'X' not homed.");
    expect(ErrorHandler.formatError(new Error('plain'))).toBe('plain');
    expect(ErrorHandler.formatError('text')).toBe('text');
  });

  test('should keep the cause', () => {
    const cause = new Error('socket hang up');
    const error = new PrinterError(ErrorCode.ConnectionFailed, 'GET /printer/info failed', { cause });

    expect(error.cause).toBe(cause);
    expect(error.name).toBe('PrinterError');
  });

  test('should classify errors', () => {
    expect(ErrorHandler.isTransportError(new PrinterError(ErrorCode.RequestTimeout, 'slow'))).toBe(true);
    expect(ErrorHandler.isTransportError(new PrinterError(ErrorCode.Timeout, 'slow'))).toBe(false);
    expect(ErrorHandler.isPreconditionError(new PrinterError(ErrorCode.MachineNotReady, 'busy'))).toBe(true);
    expect(ErrorHandler.hasCode(new Error('x'), ErrorCode.Timeout)).toBe(false);
  });
});
