import type { PrinterController } from '../controller/PrinterController';
import { home } from '../gcode/commands';
import { SafetySystem } from '../safety/SafetySystem';
import { ErrorCode, HomeOptions, IPosition, PrinterEvent } from '../types';
import { PrinterError } from '../utils/error-handler';
import { Logger } from '../utils/logger';
import { HomingResult } from './types';
import { MotionSystem } from './MotionSystem';

// Park height above Z=0, on top of the attachment's downward reach
const PARK_CLEARANCE_MM = 10;

export class HomingSystem {
  private controller: PrinterController;
  private safety: SafetySystem;
  private motion: MotionSystem;
  private logger = new Logger('HomingSystem');

  constructor(controller: PrinterController, safety: SafetySystem, motion: MotionSystem) {
    this.controller = controller;
    this.safety = safety;
    this.motion = motion;
  }

  /**
   * Runs G28 for `axes`. Homing with an attachment still mounted can crash it
   * into the endstops, so unless `confirm` is false the operator has to
   * acknowledge through the controller's confirm callback first.
   */
  async home(axes: string = 'XYZ', options: HomeOptions = {}): Promise<HomingResult> {
    const clock = this.controller.clock;
    const startTime = clock.now();
    const normalized = HomingSystem.normalizeAxes(axes);

    await this.controller.ensureReady();

    // An unreachable park position fails before anything is sent
    const parkPosition = this.controller.config.parkAfterHome && normalized === 'XYZ'
      ? this.getParkPosition()
      : null;
    if (parkPosition) {
      this.safety.assertPoint(parkPosition, this.controller.getLimitsCached());
    }

    if (options.confirm ?? true) {
      await this.requireConfirmation(normalized);
    }

    this.logger.info(`Homing ${normalized}...`);
    this.controller.emit(PrinterEvent.HomingStarted, normalized);

    await this.controller.sendGcode(home(normalized));
    await this.controller.waitMovesM400();

    const parkedAt = parkPosition ? await this.park(parkPosition) : null;

    const duration = clock.now() - startTime;
    this.logger.success(`Homing ${normalized} completed in ${duration}ms`);
    this.controller.emit(PrinterEvent.HomingCompleted, normalized);

    return { axes: normalized, duration, parkedAt };
  }

  /**
   * Park position after a full home: XY centre of the work area, Z high
   * enough for the attachment to hang clear of the bed.
   */
  getParkPosition(): IPosition {
    const limits = this.controller.getLimitsCached();
    const { attachMinZ, attachMaxZ } = this.safety.getEnvelope();

    let z = -attachMinZ + PARK_CLEARANCE_MM;
    const floor = this.safety.getSafeTravelHeight();
    if (floor !== undefined) {
      z = Math.max(z, floor);
    }
    z = Math.min(z, limits.z.max - attachMaxZ);

    return {
      x: (limits.x.min + limits.x.max) / 2,
      y: (limits.y.min + limits.y.max) / 2,
      z,
    };
  }

  private async park(position: IPosition): Promise<IPosition> {
    this.logger.info(`Parking at X=${position.x} Y=${position.y} Z=${position.z}`);
    return this.motion.moveAbsolute({
      ...position,
      speedMmS: this.controller.config.parkSpeedMmS,
    });
  }

  private async requireConfirmation(axes: string): Promise<void> {
    const confirm = this.controller.getConfirm();
    if (!confirm) {
      throw new PrinterError(
        ErrorCode.HomingCancelled,
        'Homing requires operator confirmation but no confirm callback is configured.'
      );
    }

    const prompt =
      `About to run ${home(axes)}.\n` +
      'CONFIRM: all attachments are REMOVED from the toolhead.';
    const accepted = await confirm(prompt);
    if (!accepted) {
      throw new PrinterError(ErrorCode.HomingCancelled, 'Homing cancelled by user (confirmation not received).');
    }
  }

  static normalizeAxes(axes: string): string {
    const normalized = axes.toUpperCase().replace(/\s+/g, '');
    if (!/^[XYZ]+$/.test(normalized) || new Set(normalized).size !== normalized.length) {
      throw new PrinterError(ErrorCode.ValidationFailed, `Invalid homing axes '${axes}' (expected letters from XYZ)`);
    }
    return ['X', 'Y', 'Z'].filter(axis => normalized.includes(axis)).join('');
  }
}
