import { InvalidScaleError } from './errors';
import type { BikeGeometry, LinkagePoint, RigidBody, SolverResult } from './types';

function assertScale(scaleMmPerPx: number): void {
  if (!Number.isFinite(scaleMmPerPx) || scaleMmPerPx <= 0) {
    throw new InvalidScaleError(`Scale must be a positive number of millimeters per pixel, got ${scaleMmPerPx}.`);
  }
}

/** @public */
export function strokeToPixels(strokeMm: number, scaleMmPerPx: number): number {
  assertScale(scaleMmPerPx);
  return strokeMm / scaleMmPerPx;
}

/** @public */
export function lengthToMillimeters(lengthPx: number, scaleMmPerPx: number): number {
  assertScale(scaleMmPerPx);
  return lengthPx * scaleMmPerPx;
}

/**
 * Derives millimeters per pixel from the known rear-centre length, i.e. the
 * distance between the bottom bracket and the rear axle.
 * @public
 */
export function scaleFromRearCenter(points: readonly LinkagePoint[], rearCenterMm: number): number {
  if (!Number.isFinite(rearCenterMm) || rearCenterMm <= 0) {
    throw new InvalidScaleError(`Rear centre must be a positive length in millimeters, got ${rearCenterMm}.`);
  }
  const bb = points.find(p => p.type === 'bb');
  const axle = points.find(p => p.type === 'rear_axle');
  if (bb === undefined || axle === undefined) {
    throw new InvalidScaleError('Rear-centre scaling needs both a bottom bracket and a rear axle point.');
  }
  const lengthPx = Math.hypot(axle.x - bb.x, axle.y - bb.y);
  if (lengthPx === 0) {
    throw new InvalidScaleError(`Bottom bracket '${bb.id}' and rear axle '${axle.id}' coincide.`);
  }
  return rearCenterMm / lengthPx;
}

/**
 * Picks the scale for a bike: an explicit value wins, otherwise it is derived
 * from the rear-centre length. Null when neither is known.
 * @public
 */
export function resolveScale(geometry: BikeGeometry, points: readonly LinkagePoint[]): number | null {
  if (geometry.scaleMmPerPx !== undefined) {
    assertScale(geometry.scaleMmPerPx);
    return geometry.scaleMmPerPx;
  }
  if (geometry.rearCenterMm !== undefined) {
    return scaleFromRearCenter(points, geometry.rearCenterMm);
  }
  return null;
}

/**
 * Converts body lengths from millimeters to pixels so they match the point
 * coordinates: `length0` on every body, and the shock `stroke`.
 * @public
 */
export function bodiesToPixels(bodies: readonly RigidBody[], scaleMmPerPx: number): RigidBody[] {
  assertScale(scaleMmPerPx);
  return bodies.map(body => ({
    ...body,
    stroke: body.stroke === undefined ? undefined : body.stroke / scaleMmPerPx,
    length0: body.length0 === undefined ? undefined : body.length0 / scaleMmPerPx,
  }));
}

/**
 * Converts stroke, shock length, travel and residual of every step to
 * millimeters. Leverage is a ratio and point positions stay in pixels.
 * @public
 */
export function resultToMillimeters(result: SolverResult, scaleMmPerPx: number): SolverResult {
  assertScale(scaleMmPerPx);
  return {
    rearAxlePointId: result.rearAxlePointId,
    steps: result.steps.map(step => ({
      ...step,
      shockStroke: step.shockStroke * scaleMmPerPx,
      shockLength: step.shockLength * scaleMmPerPx,
      rearTravel: step.rearTravel === null ? null : step.rearTravel * scaleMmPerPx,
      residual: step.residual * scaleMmPerPx,
    })),
  };
}
