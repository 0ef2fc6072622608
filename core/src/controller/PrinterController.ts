import { EventEmitter } from 'eventemitter3';
import { HttpTransport } from '../connections/HttpTransport';
import { velocityLimit, WAIT_FOR_MOVES } from '../gcode/commands';
import { ITransport } from '../interfaces/Transport';
import { HomingSystem } from '../operations/HomingSystem';
import { MotionSystem } from '../operations/MotionSystem';
import { ThermalSystem } from '../operations/ThermalSystem';
import { HomingResult, RelativeMoveResult, YPassResult } from '../operations/types';
import { SafetySystem } from '../safety/SafetySystem';
import { LimitsCache } from '../state/limits-cache';
import {
  AbsoluteMove,
  AxisLimits,
  ConfirmFn,
  ErrorCode,
  HomeOptions,
  IPosition,
  LineMove,
  PrinterConfig,
  PrinterEvent,
  PrinterEvents,
  PrinterInfo,
  PrinterStatus,
  RelativeMove,
  SetTemperatureOptions,
  TemperatureReading,
  WaitOptions,
  YPass,
} from '../types';
import { PrinterError } from '../utils/error-handler';
import { Logger } from '../utils/logger';
import { limitsFromToolhead, parseObjectList, parsePrinterInfo, parseStatus } from '../utils/payload';
import { Clock, pollUntil, systemClock } from '../utils/poll';

export enum ControllerState {
  Uninitialized = 'uninitialized',
  Ready = 'ready',
}

export interface ControllerOptions {
  transport?: ITransport;
  clock?: Clock;
  /** Operator acknowledgement asked before homing. */
  confirm?: ConfirmFn;
}

const STATUS_OBJECTS = ['toolhead', 'gcode_move', 'print_stats', 'webhooks'];

export class PrinterController extends EventEmitter<PrinterEvents> {
  readonly config: PrinterConfig;
  readonly clock: Clock;
  readonly safety: SafetySystem;
  public motionSystem: MotionSystem;
  public homingSystem: HomingSystem;
  public thermalSystem: ThermalSystem;
  private transport: ITransport;
  private limitsCache = new LimitsCache();
  private confirm: ConfirmFn | undefined;
  private logger = new Logger('PrinterController');

  constructor(config: PrinterConfig, options: ControllerOptions = {}) {
    super();
    this.config = config;
    this.clock = options.clock ?? systemClock;
    this.confirm = options.confirm;
    this.transport = options.transport ?? new HttpTransport({
      baseUrl: config.baseUrl,
      apiKey: config.apiKey,
      timeoutMs: config.timeoutMs,
    });
    this.safety = new SafetySystem(config, config.minSafeZ);
    this.motionSystem = new MotionSystem(this, this.safety);
    this.homingSystem = new HomingSystem(this, this.safety, this.motionSystem);
    this.thermalSystem = new ThermalSystem(this);
  }

  /** Builds a controller and initializes it before returning. */
  static async create(config: PrinterConfig, options: ControllerOptions = {}): Promise<PrinterController> {
    const controller = new PrinterController(config, options);
    await controller.initialize();
    return controller;
  }

  getState(): ControllerState {
    return this.limitsCache.isValid() ? ControllerState.Ready : ControllerState.Uninitialized;
  }

  getConfirm(): ConfirmFn | undefined {
    return this.confirm;
  }

  setConfirm(confirm: ConfirmFn | undefined): void {
    this.confirm = confirm;
  }

  // ---------------- Init / limits cache ----------------

  async initialize(): Promise<AxisLimits> {
    try {
      await this.ensureReady();
      SafetySystem.assertValid(this.safety.validateEnvelope(), this.safety.getEnvelope());
      const limits = await this.refreshLimits();
      this.logger.success(`Initialized: X[${limits.x.min}, ${limits.x.max}] Y[${limits.y.min}, ${limits.y.max}] Z[${limits.z.min}, ${limits.z.max}]`);
      this.emit(PrinterEvent.Initialized, limits);
      return limits;
    } catch (error) {
      this.logger.error('Initialization failed', error);
      throw error;
    }
  }

  /** Re-reads axis limits, e.g. after FIRMWARE_RESTART or a config change. */
  async refreshLimits(): Promise<AxisLimits> {
    const status = await this.queryStatus();
    const limits = limitsFromToolhead(status.toolhead);
    this.limitsCache.update(limits);
    this.emit(PrinterEvent.LimitsRefreshed, limits);
    return this.limitsCache.get();
  }

  getLimitsCached(): AxisLimits {
    return this.limitsCache.get();
  }

  // ---------------- Status ----------------

  async printerInfo(): Promise<PrinterInfo> {
    return parsePrinterInfo(await this.transport.get('/printer/info'));
  }

  async queryStatus(): Promise<PrinterStatus> {
    return this.queryObjects(STATUS_OBJECTS);
  }

  async queryObjects(objects: readonly string[]): Promise<PrinterStatus> {
    const params = Object.fromEntries(objects.map(name => [name, '']));
    return parseStatus(await this.transport.get('/printer/objects/query', params));
  }

  async listObjects(): Promise<string[]> {
    return parseObjectList(await this.transport.get('/printer/objects/list'));
  }

  async ensureReady(): Promise<void> {
    const info = await this.printerInfo();
    if (info.state !== 'ready') {
      const message = info.state_message ? ` ${info.state_message}` : '';
      throw new PrinterError(ErrorCode.MachineNotReady, `Printer not ready: ${info.state}${message}`, {
        details: info,
      });
    }
  }

  async ensureHomed(axes: string = 'xyz'): Promise<void> {
    const status = await this.queryStatus();
    const homed = status.toolhead?.homed_axes ?? '';
    for (const axis of axes.toLowerCase()) {
      if (!homed.toLowerCase().includes(axis)) {
        throw new PrinterError(
          ErrorCode.AxisNotHomed,
          `Axis '${axis.toUpperCase()}' not homed. homed_axes='${homed}'. Run home() first.`
        );
      }
    }
  }

  // ---------------- G-code ----------------

  async sendGcode(script: string): Promise<void> {
    this.logger.debug('G-code:', script.replace(/\n/g, ' | '));
    await this.transport.post('/printer/gcode/script', { script });
    this.emit(PrinterEvent.GCodeSent, script);
  }

  /** Blocks on the firmware side until the move queue drains. */
  async waitMovesM400(): Promise<void> {
    await this.sendGcode(WAIT_FOR_MOVES);
  }

  async waitMoves(options: WaitOptions = {}): Promise<void> {
    await pollUntil(
      async () => {
        const status = await this.queryStatus();
        const moving = status.toolhead?.moving ?? false;
        return { done: !moving, value: moving };
      },
      {
        intervalMs: options.pollIntervalMs ?? 200,
        timeoutMs: options.timeoutMs ?? 120000,
        clock: this.clock,
        timeoutMessage: () => 'Timeout waiting for moves to finish',
      }
    );
  }

  async setMotionLimits(velocityMmS: number, accelMmS2: number): Promise<void> {
    await this.ensureReady();
    SafetySystem.assertValid(this.safety.validateSpeed('velocityMmS', velocityMmS));
    SafetySystem.assertValid(this.safety.validateSpeed('accelMmS2', accelMmS2));
    await this.sendGcode(velocityLimit(velocityMmS, accelMmS2));
  }

  // ---------------- Operations ----------------

  async home(axes: string = 'XYZ', options: HomeOptions = {}): Promise<HomingResult> {
    return this.homingSystem.home(axes, options);
  }

  async moveAbsolute(move: AbsoluteMove): Promise<IPosition> {
    return this.motionSystem.moveAbsolute(move);
  }

  async moveRelative(move: RelativeMove): Promise<RelativeMoveResult> {
    return this.motionSystem.moveRelative(move);
  }

  async moveLine(move: LineMove): Promise<void> {
    return this.motionSystem.moveLine(move);
  }

  async safeYPass(pass: YPass): Promise<YPassResult> {
    return this.motionSystem.safeYPass(pass);
  }

  async getBedTemperature(): Promise<TemperatureReading> {
    return this.thermalSystem.getBedTemperature();
  }

  async setBedTemperature(tempC: number, options: SetTemperatureOptions = {}): Promise<void> {
    return this.thermalSystem.setBedTemperature(tempC, options);
  }

  async getChamberTemperature(): Promise<TemperatureReading> {
    return this.thermalSystem.getChamberTemperature();
  }

  async setChamberTemperature(tempC: number, options: SetTemperatureOptions = {}): Promise<string> {
    return this.thermalSystem.setChamberTemperature(tempC, options);
  }
}
