import { AxisLimits, ErrorCode, IPosition, PrinterInfo, PrinterStatus, ToolheadStatus } from '../types';
import { PrinterError } from './error-handler';

// Moonraker replies are untyped JSON; these helpers narrow the parts we read.

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(message: string, details?: unknown): PrinterError {
  return new PrinterError(ErrorCode.InvalidResponse, message, { details });
}

export function resultOf(body: unknown, path: string): unknown {
  if (!isRecord(body) || !('result' in body)) {
    throw invalid(`Unexpected response from ${path}: missing 'result'`, body);
  }
  return body.result;
}

/** Numbers and numeric strings are accepted, like Klipper's own float() reads. */
export function toNumber(value: unknown, name: string): number {
  const parsed = typeof value === 'number' ? value
    : typeof value === 'string' && value.trim() !== '' ? Number(value)
    : NaN;
  if (!Number.isFinite(parsed)) {
    throw invalid(`Cannot convert ${name}='${String(value)}' to number`);
  }
  return parsed;
}

export function parsePrinterInfo(body: unknown): PrinterInfo {
  const result = resultOf(body, '/printer/info');
  if (!isRecord(result) || typeof result.state !== 'string') {
    throw invalid('Unexpected response from /printer/info: missing state', result);
  }
  return {
    ...result,
    state: result.state,
    state_message: typeof result.state_message === 'string' ? result.state_message : undefined,
  };
}

export function parseStatus(body: unknown): PrinterStatus {
  const result = resultOf(body, '/printer/objects/query');
  if (!isRecord(result) || !isRecord(result.status)) {
    throw invalid('Unexpected response from /printer/objects/query: missing status', result);
  }
  const { toolhead, ...objects } = result.status;
  return { ...objects, toolhead: isRecord(toolhead) ? parseToolhead(toolhead) : undefined };
}

function parseToolhead(raw: Record<string, unknown>): ToolheadStatus {
  const numbers = (value: unknown): number[] | undefined =>
    Array.isArray(value) ? value.map((v, i) => toNumber(v, `toolhead[${i}]`)) : undefined;

  return {
    ...raw,
    homed_axes: typeof raw.homed_axes === 'string' ? raw.homed_axes : undefined,
    moving: typeof raw.moving === 'boolean' ? raw.moving : undefined,
    position: numbers(raw.position),
    axis_minimum: numbers(raw.axis_minimum),
    axis_maximum: numbers(raw.axis_maximum),
  };
}

export function parseObjectList(body: unknown): string[] {
  const result = resultOf(body, '/printer/objects/list');
  if (!isRecord(result) || !Array.isArray(result.objects)) {
    throw invalid('Unexpected response from /printer/objects/list: missing objects', result);
  }
  return result.objects.filter((o): o is string => typeof o === 'string');
}

/** axis_minimum / axis_maximum carry [x, y, z, e]; the extruder entry is ignored. */
export function limitsFromToolhead(toolhead: ToolheadStatus | undefined): AxisLimits {
  const min = toolhead?.axis_minimum;
  const max = toolhead?.axis_maximum;
  if (!min || !max || min.length < 3 || max.length < 3) {
    throw invalid('Toolhead status has no axis_minimum/axis_maximum', toolhead);
  }
  return {
    x: { min: min[0], max: max[0] },
    y: { min: min[1], max: max[1] },
    z: { min: min[2], max: max[2] },
  };
}

export function positionFromToolhead(toolhead: ToolheadStatus | undefined): IPosition {
  const position = toolhead?.position;
  if (!position || position.length < 3) {
    throw invalid('Toolhead status has no position', toolhead);
  }
  return { x: position[0], y: position[1], z: position[2] };
}
