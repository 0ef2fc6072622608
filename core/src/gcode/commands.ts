import { IPosition } from '../types';

// Fixed command templates. Coordinates use 3 decimals, temperatures 1,
// feed rates are whole mm/min.

const mm = (value: number) => value.toFixed(3);
const celsius = (value: number) => value.toFixed(1);

export const ABSOLUTE_POSITIONING = 'G90';
export const RELATIVE_POSITIONING = 'G91';
export const WAIT_FOR_MOVES = 'M400';

/** mm/s to an integer mm/min feed rate, truncated. */
export function feedRate(speedMmS: number): number {
  return Math.trunc(speedMmS * 60);
}

export function linearMove(target: Partial<IPosition>, speedMmS: number): string {
  const words: string[] = ['G1'];
  if (target.x !== undefined) words.push(`X${mm(target.x)}`);
  if (target.y !== undefined) words.push(`Y${mm(target.y)}`);
  if (target.z !== undefined) words.push(`Z${mm(target.z)}`);
  words.push(`F${feedRate(speedMmS)}`);
  return words.join(' ');
}

export function home(axes: string): string {
  return `G28 ${axes.toUpperCase()}`;
}

export function velocityLimit(velocityMmS: number, accelMmS2: number): string {
  return `SET_VELOCITY_LIMIT VELOCITY=${velocityMmS.toFixed(3)} ACCEL=${accelMmS2.toFixed(1)}`;
}

export function bedTemperature(tempC: number, wait: boolean): string {
  return `${wait ? 'M190' : 'M140'} S${celsius(tempC)}`;
}

export function heaterTarget(heater: string, tempC: number): string {
  return `SET_HEATER_TEMPERATURE HEATER=${heater} TARGET=${celsius(tempC)}`;
}

export function temperatureFanTarget(fan: string, tempC: number): string {
  return `SET_TEMPERATURE_FAN_TARGET TEMPERATURE_FAN=${fan} TARGET=${celsius(tempC)}`;
}

export function script(lines: string[]): string {
  return lines.join('\n');
}
