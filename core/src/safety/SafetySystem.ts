import { ISafetySystem, PointCheckOptions, ValidationResult } from '../interfaces/SafetySystem';
import { AttachmentEnvelope, AXES, AxisLimits, ErrorCode, IPosition } from '../types';
import { PrinterError } from '../utils/error-handler';
import { envelopeExtremes, envelopeKeys, pickEnvelope } from './envelope';

const fmt = (value: number) => value.toFixed(3);

export class SafetySystem implements ISafetySystem {
  private envelope: AttachmentEnvelope;

  constructor(envelope: AttachmentEnvelope, private minSafeZ?: number) {
    this.envelope = pickEnvelope(envelope);
  }

  getEnvelope(): AttachmentEnvelope {
    return { ...this.envelope };
  }

  getSafeTravelHeight(): number | undefined {
    return this.minSafeZ;
  }

  // Negative offsets are normal; only min <= max is required
  validateEnvelope(envelope: AttachmentEnvelope = this.envelope): ValidationResult {
    for (const axis of AXES) {
      const keys = envelopeKeys(axis);
      const min = envelope[keys.min];
      const max = envelope[keys.max];
      if (!Number.isFinite(min) || !Number.isFinite(max)) {
        return { isValid: false, error: `${keys.min} and ${keys.max} must be finite numbers` };
      }
      if (min > max) {
        return { isValid: false, error: `${keys.min} must be <= ${keys.max} (got ${min} > ${max})` };
      }
    }
    return { isValid: true };
  }

  /**
   * Checks that the whole attachment box around `point` stays inside `limits`.
   * Stops at the first violation.
   */
  validatePoint(point: IPosition, limits: AxisLimits, options: PointCheckOptions = {}): ValidationResult {
    for (const axis of AXES) {
      if (!Number.isFinite(point[axis])) {
        return { isValid: false, error: `${axis.toUpperCase()}=${point[axis]} is not a finite number` };
      }
    }

    for (const extreme of envelopeExtremes(point, this.envelope)) {
      const { min, max } = limits[extreme.axis];
      if (extreme.value < min || extreme.value > max) {
        return {
          isValid: false,
          error: `${extreme.name}=${fmt(extreme.value)} out of range [${fmt(min)}, ${fmt(max)}]`,
        };
      }
    }

    const enforceFloor = options.enforceFloor ?? true;
    if (enforceFloor && this.minSafeZ !== undefined && point.z < this.minSafeZ) {
      return {
        isValid: false,
        error: `Z=${fmt(point.z)} below minimum safe height ${fmt(this.minSafeZ)}`,
      };
    }

    return { isValid: true };
  }

  assertPoint(point: IPosition, limits: AxisLimits, options?: PointCheckOptions): void {
    SafetySystem.assertValid(this.validatePoint(point, limits, options), { point });
  }

  validateSpeed(name: string, value: number): ValidationResult {
    if (!Number.isFinite(value) || value <= 0) {
      return { isValid: false, error: `${name} must be > 0 (got ${value})` };
    }
    return { isValid: true };
  }

  static assertValid(result: ValidationResult, details?: unknown): void {
    if (!result.isValid) {
      throw new PrinterError(ErrorCode.ValidationFailed, result.error ?? 'Validation failed', { details });
    }
  }
}
