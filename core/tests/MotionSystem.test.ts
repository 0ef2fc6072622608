import { ErrorCode, PrinterEvent } from '../src/types';
import { expectPrinterError } from './helpers/assertions';
import { createTestRig, TestRig, WHEEL_ENVELOPE } from './helpers/test-data';

describe('MotionSystem', () => {
  let rig: TestRig;

  beforeEach(async () => {
    rig = await createTestRig(WHEEL_ENVELOPE);
  });

  describe('moveAbsolute', () => {
    test('should send an absolute G1 move', async () => {
      const target = await rig.controller.moveAbsolute({ x: 100, y: 150, z: 50, speedMmS: 20 });

      expect(target).toEqual({ x: 100, y: 150, z: 50 });
      expect(rig.transport.scripts).toEqual(['G90\nG1 X100.000 Y150.000 Z50.000 F1200']);
    });

    test('should truncate the feed rate to whole mm/min', async () => {
      await rig.controller.moveAbsolute({ x: 100, y: 150, z: 50, speedMmS: 12.345 });

      expect(rig.transport.scripts).toEqual(['G90\nG1 X100.000 Y150.000 Z50.000 F740']);
    });

    test('should reject a target where the attachment leaves the work area', async () => {
      await expectPrinterError(
        rig.controller.moveAbsolute({ x: 390, y: 150, z: 50, speedMmS: 20 }),
        ErrorCode.ValidationFailed,
        'X+attachMaxX=420.000 out of range [0.000, 400.000]'
      );
      expect(rig.transport.scripts).toEqual([]);
    });

    test('should reject a target that drives the attachment into the bed', async () => {
      await expectPrinterError(
        rig.controller.moveAbsolute({ x: 100, y: 150, z: 5, speedMmS: 20 }),
        ErrorCode.ValidationFailed,
        'Z+attachMinZ=-7.000 out of range [0.000, 300.000]'
      );
    });

    test('should reject a zero speed', async () => {
      await expectPrinterError(
        rig.controller.moveAbsolute({ x: 100, y: 150, z: 50, speedMmS: 0 }),
        ErrorCode.ValidationFailed,
        'speedMmS must be > 0 (got 0)'
      );
    });

    test('should emit moveCompleted with the target', async () => {
      const listener = jest.fn();
      rig.controller.on(PrinterEvent.MoveCompleted, listener);

      await rig.controller.moveAbsolute({ x: 100, y: 150, z: 50, speedMmS: 20 });

      expect(listener).toHaveBeenCalledWith({ x: 100, y: 150, z: 50 });
    });

    test('should skip waiting when wait is false', async () => {
      rig.transport.movingSequence = [true];

      await rig.controller.moveAbsolute({ x: 100, y: 150, z: 50, speedMmS: 20, wait: false });

      expect(rig.clock.sleeps).toEqual([]);
    });

    test('should not emit moveCompleted for a move that was only queued', async () => {
      const listener = jest.fn();
      rig.controller.on(PrinterEvent.MoveCompleted, listener);

      await rig.controller.moveAbsolute({ x: 100, y: 150, z: 50, speedMmS: 20, wait: false });
      await rig.controller.safeYPass({ x: 100, yStart: 20, yEnd: 250, zSafe: 50, zContact: 40, wait: false });

      expect(listener).not.toHaveBeenCalled();
      expect(rig.transport.scripts).not.toContain('M400');
    });
  });

  describe('with a minimum safe height', () => {
    beforeEach(async () => {
      rig = await createTestRig({ ...WHEEL_ENVELOPE, minSafeZ: 30 });
    });

    test('should reject travel moves below the floor', async () => {
      await expectPrinterError(
        rig.controller.moveAbsolute({ x: 100, y: 150, z: 20, speedMmS: 20 }),
        ErrorCode.ValidationFailed,
        'Z=20.000 below minimum safe height 30.000'
      );
    });

    test('should allow contact moves below the floor', async () => {
      await rig.controller.moveAbsolute({ x: 100, y: 150, z: 20, speedMmS: 20, contact: true });

      expect(rig.transport.scripts).toEqual(['G90\nG1 X100.000 Y150.000 Z20.000 F1200']);
    });
  });

  describe('moveRelative', () => {
    beforeEach(() => {
      rig.transport.setToolhead({ position: [100, 100, 50, 0] });
    });

    test('should move by the given deltas from the current position', async () => {
      const result = await rig.controller.moveRelative({ dx: 10, dz: -5, speedMmS: 10 });

      expect(result).toEqual({
        from: { x: 100, y: 100, z: 50 },
        target: { x: 110, y: 100, z: 45 },
        clamped: false,
      });
      expect(rig.transport.scripts).toEqual(['G91\nG1 X10.000 Z-5.000 F600\nG90']);
    });

    test('should clamp a large Z step and warn', async () => {
      const warning = jest.fn();
      rig.controller.on(PrinterEvent.Warning, warning);

      const result = await rig.controller.moveRelative({ dz: 25, speedMmS: 10 });

      expect(result.clamped).toBe(true);
      expect(result.target).toEqual({ x: 100, y: 100, z: 60 });
      expect(rig.transport.scripts).toEqual(['G91\nG1 Z10.000 F600\nG90']);
      expect(warning).toHaveBeenCalledWith('Relative Z step 25 clamped to 10 (maxRelativeZStep=10)');
    });

    test('should keep the sign of a clamped downward step', async () => {
      const result = await rig.controller.moveRelative({ dz: -40, speedMmS: 10 });

      expect(result.target.z).toBe(40);
      expect(rig.transport.scripts).toEqual(['G91\nG1 Z-10.000 F600\nG90']);
    });

    test('should validate the resulting absolute position', async () => {
      rig.transport.setToolhead({ position: [380, 100, 50, 0] });

      await expectPrinterError(
        rig.controller.moveRelative({ dx: 5, speedMmS: 10 }),
        ErrorCode.ValidationFailed,
        'X+attachMaxX=415.000 out of range [0.000, 400.000]'
      );
      expect(rig.transport.scripts).toEqual([]);
    });

    test('should reject a move with no deltas', async () => {
      await expectPrinterError(
        rig.controller.moveRelative({ dx: 0, speedMmS: 10 }),
        ErrorCode.ValidationFailed,
        'Relative move needs at least one non-zero delta'
      );
    });
  });

  describe('moveLine', () => {
    test('should travel to the start then cut to the end', async () => {
      await rig.controller.moveLine({
        from: { x: 10, y: 10, z: 50 },
        to: { x: 200, y: 10, z: 50 },
        speedMmS: 10,
        travelSpeedMmS: 50,
      });

      expect(rig.transport.scripts).toEqual([
        'G90\nG1 X10.000 Y10.000 Z50.000 F3000\nG1 X200.000 Y10.000 Z50.000 F600',
      ]);
    });

    test('should use the line speed for travel by default', async () => {
      await rig.controller.moveLine({
        from: { x: 10, y: 10, z: 50 },
        to: { x: 20, y: 20, z: 50 },
        speedMmS: 10,
      });

      expect(rig.transport.scripts).toEqual([
        'G90\nG1 X10.000 Y10.000 Z50.000 F600\nG1 X20.000 Y20.000 Z50.000 F600',
      ]);
    });

    test('should reject the line when an endpoint is out of bounds', async () => {
      await expectPrinterError(
        rig.controller.moveLine({
          from: { x: 10, y: 10, z: 50 },
          to: { x: 10, y: 390, z: 50 },
          speedMmS: 10,
        }),
        ErrorCode.ValidationFailed,
        'Y+attachMaxY=410.000 out of range [0.000, 400.000]'
      );
      expect(rig.transport.scripts).toEqual([]);
    });
  });

  describe('safeYPass', () => {
    test('should lift, approach, lower, travel and lift again', async () => {
      const result = await rig.controller.safeYPass({
        x: 100,
        yStart: 20,
        yEnd: 250,
        zSafe: 50,
        zContact: 40,
        travelSpeedMmS: 60,
        approachSpeedMmS: 100,
      });

      const expected = [
        'G90',
        'G1 Z50.000 F480',
        'G1 X100.000 Y20.000 F6000',
        'G1 Z40.000 F480',
        'G1 Y250.000 F3600',
        'G1 Z50.000 F480',
      ].join('\n');
      expect(result).toEqual({ zSafe: 50, zContact: 40, script: expected });
      expect(rig.transport.scripts).toEqual([expected, 'M400']);
    });

    test('should require a safe height', async () => {
      await expectPrinterError(
        rig.controller.safeYPass({ x: 100, yStart: 20, yEnd: 250, zContact: 40 }),
        ErrorCode.ValidationFailed,
        'safeYPass needs zSafe or a configured minSafeZ'
      );
    });

    test('should reject a contact height that puts the attachment into the bed', async () => {
      await expectPrinterError(
        rig.controller.safeYPass({ x: 100, yStart: 20, yEnd: 250, zSafe: 50, zContact: 10 }),
        ErrorCode.ValidationFailed,
        'Z+attachMinZ=-2.000 out of range [0.000, 300.000]'
      );
      expect(rig.transport.scripts).toEqual([]);
    });

    describe('with a minimum safe height', () => {
      beforeEach(async () => {
        rig = await createTestRig({ ...WHEEL_ENVELOPE, minSafeZ: 30 });
      });

      test('should default the safe height to the floor', async () => {
        const result = await rig.controller.safeYPass({ x: 100, yStart: 20, yEnd: 250, zContact: 20 });

        expect(result.zSafe).toBe(30);
        expect(result.script).toBe([
          'G90',
          'G1 Z30.000 F480',
          'G1 X100.000 Y20.000 F1500',
          'G1 Z20.000 F480',
          'G1 Y250.000 F1500',
          'G1 Z30.000 F480',
        ].join('\n'));
      });

      test('should never travel below the contact height', async () => {
        const result = await rig.controller.safeYPass({ x: 100, yStart: 20, yEnd: 250, zContact: 40 });

        expect(result.zSafe).toBe(40);
      });
    });
  });
});
