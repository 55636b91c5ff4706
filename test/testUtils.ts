import type { LinkagePoint, PointType, RigidBody } from '../src/types';

/**
 * Conditional console.log that only outputs when VERBOSE=true environment variable is set.
 * This keeps test output clean by default while allowing detailed logging when needed.
 *
 * Run with verbose output:
 *   VERBOSE=true npm test
 */
export function testLog(...args: unknown[]): void {
  if (process.env.VERBOSE === 'true') {
    console.log(...args);
  }
}

export function point(id: string, type: PointType, x: number, y: number): LinkagePoint {
  return { id, type, x, y };
}

export function bar(id: string, pointIds: string[], extra: Partial<RigidBody> = {}): RigidBody {
  return { id, type: 'bar', pointIds, ...extra };
}

export function shock(id: string, pointIds: string[], stroke: number | undefined, extra: Partial<RigidBody> = {}): RigidBody {
  return { id, type: 'shock', pointIds, stroke, ...extra };
}

/**
 * Single-pivot swingarm: main pivot O at the origin, rear axle R on a bar of
 * length 10, and a shock from the frame mount F = (0, -10) to the axle.
 *
 * With shock length L the axle sits where |R| = 10 and |R - F| = L, so
 *   y = (L^2 - 200) / 20,  x = sqrt(100 - y^2)
 * and rear travel (initial y minus current y) is (200 - L^2) / 20.
 */
export const SWINGARM_REST = Math.hypot(10, 10);

export function swingarmLinkage(stroke = 4): { points: LinkagePoint[]; bodies: RigidBody[] } {
  return {
    points: [point('O', 'bb', 0, 0), point('F', 'fixed', 0, -10), point('R', 'rear_axle', 10, 0)],
    bodies: [bar('swingarm', ['O', 'R']), shock('shock', ['F', 'R'], stroke)],
  };
}

export function swingarmAxle(shockLength: number): { x: number; y: number; travel: number } {
  const y = (shockLength * shockLength - 200) / 20;
  return { x: Math.sqrt(100 - y * y), y, travel: -y };
}

/** A shock between two pinned frame points; it never moves anything. */
export function inertShock(stroke = 5): { points: LinkagePoint[]; body: RigidBody } {
  return {
    points: [point('S1', 'fixed', 100, 0), point('S2', 'fixed', 100, 50)],
    body: shock('inert', ['S1', 'S2'], stroke),
  };
}
