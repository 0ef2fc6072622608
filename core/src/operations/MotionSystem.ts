import type { PrinterController } from '../controller/PrinterController';
import {
  ABSOLUTE_POSITIONING,
  RELATIVE_POSITIONING,
  feedRate,
  linearMove,
  script,
} from '../gcode/commands';
import { SafetySystem } from '../safety/SafetySystem';
import { AbsoluteMove, ErrorCode, IPosition, LineMove, PrinterEvent, RelativeMove, YPass } from '../types';
import { PrinterError } from '../utils/error-handler';
import { Logger } from '../utils/logger';
import { positionFromToolhead } from '../utils/payload';
import { RelativeMoveResult, YPassResult } from './types';

export class MotionSystem {
  private controller: PrinterController;
  private safety: SafetySystem;
  private logger = new Logger('MotionSystem');

  constructor(controller: PrinterController, safety: SafetySystem) {
    this.controller = controller;
    this.safety = safety;
  }

  async moveAbsolute(move: AbsoluteMove): Promise<IPosition> {
    await this.preMoveCheck();
    this.requireSpeed('speedMmS', move.speedMmS);

    const target: IPosition = { x: move.x, y: move.y, z: move.z };
    this.safety.assertPoint(target, this.controller.getLimitsCached(), { enforceFloor: !move.contact });

    await this.controller.sendGcode(script([
      ABSOLUTE_POSITIONING,
      linearMove(target, move.speedMmS),
    ]));

    if (move.wait ?? true) {
      await this.controller.waitMoves();
      this.controller.emit(PrinterEvent.MoveCompleted, target);
    }
    return target;
  }

  /**
   * Moves by a delta from the current toolhead position. A Z step larger than
   * `maxRelativeZStep` is clamped to it, keeping the sign.
   */
  async moveRelative(move: RelativeMove): Promise<RelativeMoveResult> {
    await this.preMoveCheck();
    this.requireSpeed('speedMmS', move.speedMmS);

    const dx = move.dx ?? 0;
    const dy = move.dy ?? 0;
    let dz = move.dz ?? 0;
    if (dx === 0 && dy === 0 && dz === 0) {
      throw new PrinterError(ErrorCode.ValidationFailed, 'Relative move needs at least one non-zero delta');
    }

    const maxStep = this.controller.config.maxRelativeZStep;
    const clamped = Math.abs(dz) > maxStep;
    if (clamped) {
      const limited = Math.sign(dz) * maxStep;
      const message = `Relative Z step ${dz} clamped to ${limited} (maxRelativeZStep=${maxStep})`;
      this.logger.warn(message);
      this.controller.emit(PrinterEvent.Warning, message);
      dz = limited;
    }

    const status = await this.controller.queryStatus();
    const from = positionFromToolhead(status.toolhead);
    const target: IPosition = { x: from.x + dx, y: from.y + dy, z: from.z + dz };
    this.safety.assertPoint(target, this.controller.getLimitsCached());

    await this.controller.sendGcode(script([
      RELATIVE_POSITIONING,
      linearMove({
        x: dx !== 0 ? dx : undefined,
        y: dy !== 0 ? dy : undefined,
        z: dz !== 0 ? dz : undefined,
      }, move.speedMmS),
      ABSOLUTE_POSITIONING,
    ]));

    if (move.wait ?? true) {
      await this.controller.waitMoves();
      this.controller.emit(PrinterEvent.MoveCompleted, target);
    }
    return { from, target, clamped };
  }

  // The attachment box is convex, so a straight segment between two
  // accepted endpoints stays inside the limits.
  async moveLine(move: LineMove): Promise<void> {
    await this.preMoveCheck();
    this.requireSpeed('speedMmS', move.speedMmS);
    const travelSpeed = move.travelSpeedMmS ?? move.speedMmS;
    this.requireSpeed('travelSpeedMmS', travelSpeed);

    const limits = this.controller.getLimitsCached();
    this.safety.assertPoint(move.from, limits);
    this.safety.assertPoint(move.to, limits);

    await this.controller.sendGcode(script([
      ABSOLUTE_POSITIONING,
      linearMove(move.from, travelSpeed),
      linearMove(move.to, move.speedMmS),
    ]));

    if (move.wait ?? true) {
      await this.controller.waitMoves();
      this.controller.emit(PrinterEvent.MoveCompleted, { ...move.to });
    }
  }

  /**
   * Pass along Y only: lift to the safe height, approach (x, yStart), lower to
   * the contact height, travel to yEnd, lift again.
   */
  async safeYPass(pass: YPass): Promise<YPassResult> {
    await this.preMoveCheck();

    const travelSpeed = pass.travelSpeedMmS ?? 25;
    const approachSpeed = pass.approachSpeedMmS ?? 25;
    this.requireSpeed('travelSpeedMmS', travelSpeed);
    this.requireSpeed('approachSpeedMmS', approachSpeed);

    const configuredSafeZ = pass.zSafe ?? this.safety.getSafeTravelHeight();
    if (configuredSafeZ === undefined) {
      throw new PrinterError(
        ErrorCode.ValidationFailed,
        'safeYPass needs zSafe or a configured minSafeZ'
      );
    }
    // Never travel below the contact height
    const zSafe = Math.max(configuredSafeZ, pass.zContact);
    const { x, yStart, yEnd, zContact } = pass;

    const limits = this.controller.getLimitsCached();
    this.safety.assertPoint({ x, y: yStart, z: zSafe }, limits);
    this.safety.assertPoint({ x, y: yEnd, z: zSafe }, limits);
    this.safety.assertPoint({ x, y: yStart, z: zContact }, limits, { enforceFloor: false });
    this.safety.assertPoint({ x, y: yEnd, z: zContact }, limits, { enforceFloor: false });

    const zSpeed = this.controller.config.zSpeedMmS;
    const lines = script([
      ABSOLUTE_POSITIONING,
      linearMove({ z: zSafe }, zSpeed),
      linearMove({ x, y: yStart }, approachSpeed),
      linearMove({ z: zContact }, zSpeed),
      linearMove({ y: yEnd }, travelSpeed),
      linearMove({ z: zSafe }, zSpeed),
    ]);
    this.logger.debug(`Y pass at X=${x} from Y=${yStart} to Y=${yEnd}, F(z)=${feedRate(zSpeed)}`);
    await this.controller.sendGcode(lines);

    if (pass.wait ?? true) {
      await this.controller.waitMovesM400();
      this.controller.emit(PrinterEvent.MoveCompleted, { x, y: yEnd, z: zSafe });
    }
    return { zSafe, zContact, script: lines };
  }

  private async preMoveCheck(): Promise<void> {
    await this.controller.ensureReady();
    await this.controller.ensureHomed('xyz');
  }

  private requireSpeed(name: string, value: number): void {
    SafetySystem.assertValid(this.safety.validateSpeed(name, value));
  }
}
