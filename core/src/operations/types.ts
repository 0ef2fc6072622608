import { IPosition } from '../types';

export interface HomingResult {
  axes: string;
  duration: number;
  /** Where the toolhead was parked after homing, or null when it was not. */
  parkedAt: IPosition | null;
}

export interface YPassResult {
  zSafe: number;
  zContact: number;
  script: string;
}

export interface RelativeMoveResult {
  from: IPosition;
  target: IPosition;
  /** True when the requested Z step was limited to maxRelativeZStep. */
  clamped: boolean;
}

export interface ChamberControl {
  object: string;
  command: (tempC: number) => string;
}

export interface TemperatureWaitOptions {
  tolerance?: number;
  timeoutMs?: number;
  pollIntervalMs?: number;
}
