import { AxisLimits, ErrorCode } from '../types';
import { PrinterError } from '../utils/error-handler';

/**
 * Axis bounds reported by the firmware. Fetched once during initialization and
 * reused until refreshed (after FIRMWARE_RESTART or a config change).
 */
export class LimitsCache {
  private limits: AxisLimits | null = null;

  update(limits: AxisLimits): void {
    this.limits = {
      x: { ...limits.x },
      y: { ...limits.y },
      z: { ...limits.z },
    };
  }

  get(): AxisLimits {
    if (!this.limits) {
      throw new PrinterError(
        ErrorCode.LimitsNotInitialized,
        'Limits are not initialized. Call initialize() or use PrinterController.create().'
      );
    }
    return this.limits;
  }

  isValid(): boolean {
    return this.limits !== null;
  }
}
