// tests/helpers/assertions.ts
import { ErrorCode } from '../../src/types';
import { PrinterError } from '../../src/utils/error-handler';

export const expectPrinterError = async (
  promise: Promise<unknown>,
  code: ErrorCode,
  message?: string
): Promise<PrinterError> => {
  let caught: unknown;
  try {
    await promise;
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(PrinterError);
  if (!(caught instanceof PrinterError)) {
    throw new Error('Expected a PrinterError');
  }
  expect(caught.code).toBe(code);
  if (message !== undefined) {
    expect(caught.message).toBe(message);
  }
  return caught;
};
