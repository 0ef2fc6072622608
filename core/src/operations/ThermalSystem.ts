import type { PrinterController } from '../controller/PrinterController';
import { bedTemperature, heaterTarget, temperatureFanTarget } from '../gcode/commands';
import { ErrorCode, SetTemperatureOptions, TemperatureReading } from '../types';
import { PrinterError } from '../utils/error-handler';
import { Logger } from '../utils/logger';
import { isRecord, toNumber } from '../utils/payload';
import { pollUntil, withinTolerance } from '../utils/poll';
import { ChamberControl, TemperatureWaitOptions } from './types';

export const BED_OBJECT = 'heater_bed';
export const BED_RANGE = { min: 0, max: 150 };
export const CHAMBER_RANGE = { min: 0, max: 90 };

/**
 * Klipper has no single chamber object name. Tried in this order; a
 * temperature_sensor has no target.
 */
export const CHAMBER_CANDIDATES: readonly string[] = [
  'temperature_sensor chamber',
  'heater_generic chamber',
  'temperature_fan chamber',
  'chamber',
];

export const CHAMBER_CONTROLS: readonly ChamberControl[] = [
  { object: 'heater_generic chamber', command: tempC => heaterTarget('chamber', tempC) },
  { object: 'temperature_fan chamber', command: tempC => temperatureFanTarget('chamber', tempC) },
];

export class ThermalSystem {
  private controller: PrinterController;
  private logger = new Logger('ThermalSystem');

  constructor(controller: PrinterController) {
    this.controller = controller;
  }

  async getBedTemperature(): Promise<TemperatureReading> {
    const status = await this.controller.queryObjects([BED_OBJECT]);
    const bed = status[BED_OBJECT];
    if (!isRecord(bed)) {
      throw new PrinterError(
        ErrorCode.ObjectNotFound,
        `Klipper object '${BED_OBJECT}' not found. Check printer.cfg configuration.`
      );
    }
    return ThermalSystem.readTemperature(bed, BED_OBJECT);
  }

  /** wait=false sends M140; wait=true sends M190, which returns once the bed is at temperature. */
  async setBedTemperature(tempC: number, options: SetTemperatureOptions = {}): Promise<void> {
    await this.controller.ensureReady();
    ThermalSystem.checkRange('Bed', tempC, BED_RANGE);

    const wait = options.wait ?? false;
    await this.controller.sendGcode(bedTemperature(tempC, wait));
    if (wait) {
      await this.controller.waitMovesM400();
    }
  }

  async getChamberTemperature(): Promise<TemperatureReading> {
    let lastError: unknown;

    for (const object of CHAMBER_CANDIDATES) {
      try {
        const status = await this.controller.queryObjects([object]);
        const data = status[object];
        if (isRecord(data)) {
          return ThermalSystem.readTemperature(data, object);
        }
      } catch (error) {
        this.logger.debug(`Chamber candidate '${object}' failed`, error);
        lastError = error;
      }
    }

    const chamberLike = await this.discoverChamberObjects();
    const hint = chamberLike.length > 0
      ? ` Available objects containing 'chamber': ${chamberLike.join(', ')}`
      : '';

    throw new PrinterError(
      ErrorCode.ObjectNotFound,
      'Chamber temperature object not found. ' +
        'Define it in Klipper config, e.g. [temperature_sensor chamber] or [heater_generic chamber].' +
        hint,
      { details: { candidates: CHAMBER_CANDIDATES, discovered: chamberLike }, cause: lastError }
    );
  }

  /**
   * Sets the chamber target through whichever control object exists,
   * heater_generic first. Returns the object that was used.
   */
  async setChamberTemperature(tempC: number, options: SetTemperatureOptions = {}): Promise<string> {
    await this.controller.ensureReady();
    ThermalSystem.checkRange('Chamber', tempC, CHAMBER_RANGE);

    let lastError: unknown;
    for (const control of CHAMBER_CONTROLS) {
      let present = false;
      try {
        const status = await this.controller.queryObjects([control.object]);
        present = isRecord(status[control.object]);
      } catch (error) {
        this.logger.debug(`Chamber control '${control.object}' probe failed`, error);
        lastError = error;
      }
      if (!present) continue;

      await this.controller.sendGcode(control.command(tempC));
      if (options.wait) {
        await this.waitForChamber(tempC);
      }
      return control.object;
    }

    throw new PrinterError(
      ErrorCode.ObjectNotFound,
      'Cannot set chamber temperature: neither [heater_generic chamber] ' +
        'nor [temperature_fan chamber] found in Klipper objects.',
      { cause: lastError }
    );
  }

  async waitForChamber(targetC: number, options: TemperatureWaitOptions = {}): Promise<TemperatureReading> {
    return this.waitForTemperature('chamber', () => this.getChamberTemperature(), targetC, options);
  }

  async waitForBed(targetC: number, options: TemperatureWaitOptions = {}): Promise<TemperatureReading> {
    return this.waitForTemperature('bed', () => this.getBedTemperature(), targetC, options);
  }

  async waitForTemperature(
    label: string,
    read: () => Promise<TemperatureReading>,
    targetC: number,
    options: TemperatureWaitOptions = {}
  ): Promise<TemperatureReading> {
    const tolerance = options.tolerance ?? 1.0;
    return pollUntil(
      async () => {
        const reading = await read();
        return { done: withinTolerance(reading.current, targetC, tolerance), value: reading };
      },
      {
        intervalMs: options.pollIntervalMs ?? 1000,
        timeoutMs: options.timeoutMs ?? this.controller.config.timeoutMs,
        clock: this.controller.clock,
        timeoutMessage: last => `Timeout waiting for ${label} to reach ${targetC}C (current=${last.current}C)`,
      }
    );
  }

  private async discoverChamberObjects(): Promise<string[]> {
    try {
      const objects = await this.controller.listObjects();
      return objects.filter(name => name.toLowerCase().includes('chamber'));
    } catch (error) {
      // Discovery only improves the error message
      this.logger.debug('Object discovery failed', error);
      return [];
    }
  }

  static readTemperature(data: Record<string, unknown>, object: string): TemperatureReading {
    const current = toNumber(data.temperature, `${object}.temperature`);
    const target = data.target === undefined || data.target === null
      ? null
      : toNumber(data.target, `${object}.target`);
    return { current, target, source: object };
  }

  static checkRange(label: string, tempC: number, range: { min: number; max: number }): void {
    if (!Number.isFinite(tempC) || tempC < range.min || tempC > range.max) {
      throw new PrinterError(
        ErrorCode.ValidationFailed,
        `${label} temperature out of expected range: ${tempC}C (allowed ${range.min}-${range.max}C)`
      );
    }
  }
}
