import { HomingSystem } from '../src/operations/HomingSystem';
import { ErrorCode, PrinterEvent } from '../src/types';
import { expectPrinterError } from './helpers/assertions';
import { createTestRig, TestRig, WHEEL_ENVELOPE } from './helpers/test-data';

const PARK_SCRIPT = 'G90\nG1 X200.000 Y200.000 Z22.000 F1200';

describe('HomingSystem', () => {
  let rig: TestRig;
  let confirm: jest.Mock<boolean, [string]>;

  beforeEach(async () => {
    confirm = jest.fn<boolean, [string]>(() => true);
    rig = await createTestRig(WHEEL_ENVELOPE, confirm);
  });

  test('should ask for confirmation, home and park', async () => {
    const result = await rig.controller.home();

    expect(confirm).toHaveBeenCalledWith(
      'About to run G28 XYZ.\nCONFIRM: all attachments are REMOVED from the toolhead.'
    );
    expect(rig.transport.scripts).toEqual(['G28 XYZ', 'M400', PARK_SCRIPT]);
    expect(result.axes).toBe('XYZ');
    expect(result.parkedAt).toEqual({ x: 200, y: 200, z: 22 });
  });

  test('should accept an async confirmation', async () => {
    rig.controller.setConfirm(async () => true);

    await rig.controller.home();

    expect(rig.transport.scripts[0]).toBe('G28 XYZ');
  });

  test('should cancel when the operator declines', async () => {
    confirm.mockReturnValue(false);

    await expectPrinterError(
      rig.controller.home(),
      ErrorCode.HomingCancelled,
      'Homing cancelled by user (confirmation not received).'
    );
    expect(rig.transport.scripts).toEqual([]);
  });

  test('should cancel when no confirm callback is configured', async () => {
    rig.controller.setConfirm(undefined);

    await expectPrinterError(
      rig.controller.home(),
      ErrorCode.HomingCancelled,
      'Homing requires operator confirmation but no confirm callback is configured.'
    );
    expect(rig.transport.scripts).toEqual([]);
  });

  test('should skip the prompt when confirm is false', async () => {
    await rig.controller.home('XYZ', { confirm: false });

    expect(confirm).not.toHaveBeenCalled();
    expect(rig.transport.scripts).toEqual(['G28 XYZ', 'M400', PARK_SCRIPT]);
  });

  test('should not park after homing a subset of axes', async () => {
    const result = await rig.controller.home('z');

    expect(rig.transport.scripts).toEqual(['G28 Z', 'M400']);
    expect(result.parkedAt).toBeNull();
  });

  test('should not park when parkAfterHome is off', async () => {
    rig = await createTestRig({ ...WHEEL_ENVELOPE, parkAfterHome: false }, confirm);

    await rig.controller.home();

    expect(rig.transport.scripts).toEqual(['G28 XYZ', 'M400']);
  });

  test('should check readiness before asking', async () => {
    rig.transport.info = { state: 'error', state_message: 'MCU shutdown' };

    await expectPrinterError(rig.controller.home(), ErrorCode.MachineNotReady);
    expect(confirm).not.toHaveBeenCalled();
  });

  test('should emit homing events', async () => {
    const started = jest.fn();
    const completed = jest.fn();
    rig.controller.on(PrinterEvent.HomingStarted, started);
    rig.controller.on(PrinterEvent.HomingCompleted, completed);

    await rig.controller.home('yx');

    expect(started).toHaveBeenCalledWith('XY');
    expect(completed).toHaveBeenCalledWith('XY');
  });

  test('should park at the minimum safe height when it is higher', async () => {
    rig = await createTestRig({ ...WHEEL_ENVELOPE, minSafeZ: 40 }, confirm);

    expect(rig.controller.homingSystem.getParkPosition()).toEqual({ x: 200, y: 200, z: 40 });
  });

  test('should refuse to home when the park position is unreachable', async () => {
    rig = await createTestRig({ ...WHEEL_ENVELOPE, attachMaxZ: 5, minSafeZ: 400 }, confirm);

    await expectPrinterError(
      rig.controller.home(),
      ErrorCode.ValidationFailed,
      'Z=295.000 below minimum safe height 400.000'
    );
    expect(confirm).not.toHaveBeenCalled();
    expect(rig.transport.scripts).toEqual([]);
  });

  test('should home a subset of axes when only parking is unreachable', async () => {
    rig = await createTestRig({ ...WHEEL_ENVELOPE, attachMaxZ: 5, minSafeZ: 400 }, confirm);

    await rig.controller.home('XY');

    expect(rig.transport.scripts).toEqual(['G28 XY', 'M400']);
  });

  test('should time homing with the controller clock', async () => {
    rig.transport.onScript = script => {
      if (script.startsWith('G28')) {
        rig.clock.time += 1500;
      }
    };

    const result = await rig.controller.home('Z');

    expect(result.duration).toBe(1500);
  });

  test('should cap the park height at the top of the work area', async () => {
    rig = await createTestRig({ ...WHEEL_ENVELOPE, attachMaxZ: 5, minSafeZ: 400 }, confirm);

    expect(rig.controller.homingSystem.getParkPosition().z).toBe(295);
  });

  describe('normalizeAxes', () => {
    test('should upper-case and order axes', () => {
      expect(HomingSystem.normalizeAxes('zx')).toBe('XZ');
      expect(HomingSystem.normalizeAxes(' y ')).toBe('Y');
    });

    test('should reject unknown or repeated axes', () => {
      expect(() => HomingSystem.normalizeAxes('XA')).toThrow("Invalid homing axes 'XA' (expected letters from XYZ)");
      expect(() => HomingSystem.normalizeAxes('XX')).toThrow("Invalid homing axes 'XX' (expected letters from XYZ)");
      expect(() => HomingSystem.normalizeAxes('')).toThrow("Invalid homing axes '' (expected letters from XYZ)");
    });
  });
});
