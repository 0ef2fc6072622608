import { AttachmentEnvelope, Axis, AXES, IPosition } from '../types';

export const ZERO_ENVELOPE: AttachmentEnvelope = {
  attachMinX: 0,
  attachMaxX: 0,
  attachMinY: 0,
  attachMaxY: 0,
  attachMinZ: 0,
  attachMaxZ: 0,
};

export type EnvelopeKey = keyof AttachmentEnvelope;

export interface EnvelopeExtreme {
  axis: Axis;
  /** e.g. `X+attachMaxX` */
  name: string;
  value: number;
}

export function envelopeKeys(axis: Axis): { min: EnvelopeKey; max: EnvelopeKey } {
  switch (axis) {
    case 'x':
      return { min: 'attachMinX', max: 'attachMaxX' };
    case 'y':
      return { min: 'attachMinY', max: 'attachMaxY' };
    case 'z':
      return { min: 'attachMinZ', max: 'attachMaxZ' };
  }
}

export function pickEnvelope(source: AttachmentEnvelope): AttachmentEnvelope {
  return {
    attachMinX: source.attachMinX,
    attachMaxX: source.attachMaxX,
    attachMinY: source.attachMinY,
    attachMaxY: source.attachMaxY,
    attachMinZ: source.attachMinZ,
    attachMaxZ: source.attachMaxZ,
  };
}

/**
 * The six points of the attachment bounding box that can leave the work
 * area, in check order: X min, X max, Y min, Y max, Z min, Z max.
 */
export function envelopeExtremes(point: IPosition, envelope: AttachmentEnvelope): EnvelopeExtreme[] {
  const extremes: EnvelopeExtreme[] = [];
  for (const axis of AXES) {
    const keys = envelopeKeys(axis);
    for (const key of [keys.min, keys.max]) {
      extremes.push({
        axis,
        name: `${axis.toUpperCase()}+${key}`,
        value: point[axis] + envelope[key],
      });
    }
  }
  return extremes;
}
