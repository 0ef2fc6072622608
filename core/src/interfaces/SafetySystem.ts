import { AttachmentEnvelope, AxisLimits, IPosition } from '../types';

export type ValidationResult = {
  isValid: boolean;
  error?: string;
};

export interface PointCheckOptions {
  /** Apply the minimum safe height. Contact points pass false. */
  enforceFloor?: boolean;
}

export interface ISafetySystem {
  validateEnvelope(envelope?: AttachmentEnvelope): ValidationResult;
  validatePoint(point: IPosition, limits: AxisLimits, options?: PointCheckOptions): ValidationResult;
  assertPoint(point: IPosition, limits: AxisLimits, options?: PointCheckOptions): void;
  validateSpeed(name: string, value: number): ValidationResult;
  getSafeTravelHeight(): number | undefined;
}
