// tests/helpers/test-data.ts
import { createPrinterConfig } from '../../src/config';
import { PrinterController } from '../../src/controller/PrinterController';
import { MockTransport } from '../../src/connections/MockTransport';
import { ConfirmFn, PrinterConfig } from '../../src/types';
import { FakeClock } from './test-clock';

export const TEST_URL = 'http://printer.local:7125';

export const createTestConfig = (overrides: Partial<PrinterConfig> = {}): PrinterConfig =>
  createPrinterConfig({ baseUrl: TEST_URL, ...overrides });

// 5 mm towards -X, 30 mm towards +X, 20 mm towards +Y, 12 mm below the nozzle
export const WHEEL_ENVELOPE = {
  attachMinX: -5,
  attachMaxX: 30,
  attachMinY: 0,
  attachMaxY: 20,
  attachMinZ: -12,
  attachMaxZ: 0,
};

export interface TestRig {
  controller: PrinterController;
  transport: MockTransport;
  clock: FakeClock;
}

export const createTestRig = async (
  overrides: Partial<PrinterConfig> = {},
  confirm?: ConfirmFn
): Promise<TestRig> => {
  const transport = new MockTransport();
  const clock = new FakeClock();
  const controller = await PrinterController.create(createTestConfig(overrides), {
    transport,
    clock,
    confirm,
  });
  transport.scripts.length = 0;
  transport.requests.length = 0;
  return { controller, transport, clock };
};
