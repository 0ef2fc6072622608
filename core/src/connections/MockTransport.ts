import { ITransport, QueryParams } from '../interfaces/Transport';
import { ErrorCode, ObjectStatus, PrinterInfo } from '../types';
import { PrinterError } from '../utils/error-handler';

/**
 * In-process stand-in for a Moonraker host. Objects are served from
 * `objects`; scripts posted to /printer/gcode/script are recorded.
 */
export class MockTransport implements ITransport {
  public info: PrinterInfo = { state: 'ready', state_message: 'Printer is ready' };
  public objects: Map<string, ObjectStatus> = new Map();
  public objectList: string[] | null = null;
  public scripts: string[] = [];
  public requests: Array<{ method: 'GET' | 'POST'; path: string; params?: QueryParams }> = [];
  /** Successive values reported for toolhead.moving; the last one sticks. */
  public movingSequence: boolean[] = [];
  public failures: Map<string, PrinterError> = new Map();
  public onScript: ((script: string) => void) | null = null;

  constructor() {
    this.objects.set('toolhead', {
      homed_axes: 'xyz',
      moving: false,
      position: [0, 0, 0, 0],
      axis_minimum: [0, 0, 0, -100],
      axis_maximum: [400, 400, 300, 100],
    });
  }

  setToolhead(fields: ObjectStatus): void {
    this.objects.set('toolhead', { ...this.objects.get('toolhead'), ...fields });
  }

  async get(path: string, params?: QueryParams): Promise<unknown> {
    this.requests.push({ method: 'GET', path, params });
    this.throwIfFailing(path);

    switch (path) {
      case '/printer/info':
        return { result: { ...this.info } };
      case '/printer/objects/query':
        return { result: { eventtime: 0, status: this.queryObjects(params ?? {}) } };
      case '/printer/objects/list':
        return { result: { objects: this.objectList ?? [...this.objects.keys()] } };
      default:
        throw new PrinterError(ErrorCode.TransportFailed, `GET ${path} failed: 404 Not Found`);
    }
  }

  async post(path: string, payload: unknown): Promise<unknown> {
    this.requests.push({ method: 'POST', path });
    this.throwIfFailing(path);

    if (path !== '/printer/gcode/script' || !MockTransport.isScriptPayload(payload)) {
      throw new PrinterError(ErrorCode.TransportFailed, `POST ${path} failed: 400 Bad Request`);
    }
    this.scripts.push(payload.script);
    this.onScript?.(payload.script);
    return { result: 'ok' };
  }

  private queryObjects(params: QueryParams): Record<string, unknown> {
    const status: Record<string, unknown> = {};
    for (const name of Object.keys(params)) {
      const object = this.objects.get(name);
      if (!object) continue;
      status[name] = name === 'toolhead' ? { ...object, moving: this.nextMoving(object) } : { ...object };
    }
    return status;
  }

  private nextMoving(toolhead: ObjectStatus): unknown {
    if (this.movingSequence.length === 0) return toolhead.moving;
    return this.movingSequence.length > 1 ? this.movingSequence.shift() : this.movingSequence[0];
  }

  private throwIfFailing(path: string): void {
    const failure = this.failures.get(path);
    if (failure) throw failure;
  }

  private static isScriptPayload(payload: unknown): payload is { script: string } {
    return typeof payload === 'object' && payload !== null &&
      'script' in payload && typeof payload.script === 'string';
  }
}
