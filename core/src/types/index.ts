// Geometry
export type Axis = 'x' | 'y' | 'z';

export const AXES: readonly Axis[] = ['x', 'y', 'z'];

export interface IPosition {
  x: number;
  y: number;
  z: number;
}

export interface AxisRange {
  min: number;
  max: number;
}

export type AxisLimits = Record<Axis, AxisRange>;

/**
 * Bounding box of the accessory mounted on the toolhead, as offsets from the
 * toolhead reference point (usually the nozzle), in mm.
 *
 * An attachment sticking out 30 mm to +X and 5 mm to -X is
 * `{ attachMinX: -5, attachMaxX: 30 }`. A wheel hanging 12 mm below the
 * nozzle is `{ attachMinZ: -12, attachMaxZ: 0 }`.
 */
export interface AttachmentEnvelope {
  attachMinX: number;
  attachMaxX: number;
  attachMinY: number;
  attachMaxY: number;
  attachMinZ: number;
  attachMaxZ: number;
}

// Configuration
export interface PrinterConfig extends AttachmentEnvelope {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
  zSpeedMmS: number;
  minSafeZ?: number;
  maxRelativeZStep: number;
  parkAfterHome: boolean;
  parkSpeedMmS: number;
}

export type PrinterConfigInput = Partial<PrinterConfig> & { baseUrl: string };

// Moonraker payloads
export interface PrinterInfo {
  state: string;
  state_message?: string;
  [key: string]: unknown;
}

export interface ToolheadStatus {
  homed_axes?: string;
  moving?: boolean;
  position?: number[];
  axis_minimum?: number[];
  axis_maximum?: number[];
  [key: string]: unknown;
}

export type ObjectStatus = Record<string, unknown>;

/** Result of an objects query: one entry per requested Klipper object that exists. */
export interface PrinterStatus {
  toolhead?: ToolheadStatus;
  [object: string]: unknown;
}

// Thermals
export interface TemperatureReading {
  current: number;
  target: number | null;
  source: string;
}

export interface SetTemperatureOptions {
  wait?: boolean;
}

// Motion requests
export interface AbsoluteMove extends IPosition {
  speedMmS: number;
  wait?: boolean;
  /** Target is a contact point: the minimum safe height does not apply. */
  contact?: boolean;
}

export interface RelativeMove {
  dx?: number;
  dy?: number;
  dz?: number;
  speedMmS: number;
  wait?: boolean;
}

export interface LineMove {
  from: IPosition;
  to: IPosition;
  speedMmS: number;
  travelSpeedMmS?: number;
  wait?: boolean;
}

export interface YPass {
  x: number;
  yStart: number;
  yEnd: number;
  zContact: number;
  zSafe?: number;
  travelSpeedMmS?: number;
  approachSpeedMmS?: number;
  wait?: boolean;
}

export interface HomeOptions {
  confirm?: boolean;
}

export type ConfirmFn = (prompt: string) => boolean | Promise<boolean>;

export interface WaitOptions {
  pollIntervalMs?: number;
  timeoutMs?: number;
}

// Controller events
export enum PrinterEvent {
  Initialized = 'initialized',
  LimitsRefreshed = 'limitsRefreshed',
  GCodeSent = 'gcodeSent',
  Warning = 'warning',
  HomingStarted = 'homingStarted',
  HomingCompleted = 'homingCompleted',
  MoveCompleted = 'moveCompleted'
}

export interface PrinterEvents {
  [PrinterEvent.Initialized]: (limits: AxisLimits) => void;
  [PrinterEvent.LimitsRefreshed]: (limits: AxisLimits) => void;
  [PrinterEvent.GCodeSent]: (script: string) => void;
  [PrinterEvent.Warning]: (message: string) => void;
  [PrinterEvent.HomingStarted]: (axes: string) => void;
  [PrinterEvent.HomingCompleted]: (axes: string) => void;
  [PrinterEvent.MoveCompleted]: (target: IPosition) => void;
}

// Error types
export enum ErrorCode {
  TransportFailed = 'TRANSPORT_FAILED',
  ConnectionFailed = 'CONNECTION_FAILED',
  RequestTimeout = 'REQUEST_TIMEOUT',
  MachineNotReady = 'MACHINE_NOT_READY',
  AxisNotHomed = 'AXIS_NOT_HOMED',
  LimitsNotInitialized = 'LIMITS_NOT_INITIALIZED',
  InvalidConfig = 'INVALID_CONFIG',
  ValidationFailed = 'VALIDATION_FAILED',
  Timeout = 'TIMEOUT',
  ObjectNotFound = 'OBJECT_NOT_FOUND',
  InvalidResponse = 'INVALID_RESPONSE',
  HomingCancelled = 'HOMING_CANCELLED'
}
