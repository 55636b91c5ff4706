import {
  DuplicatePointIdError,
  EmptyBodiesError,
  EmptyPointsError,
  InvalidShockBodyError,
  MissingShockBodyError,
  MissingShockStrokeError,
  MultipleShockBodiesError,
  UnknownPointReferenceError,
} from './errors';
import type { LinkagePoint, PointType, RigidBody } from './types';

/**
 * One distance constraint between two point indices.
 * @public
 */
export interface LinkEdge {
  readonly a: number;
  readonly b: number;
  /** Rest length at zero stroke, same unit as the coordinates */
  readonly restLength: number;
  readonly isDriver: boolean;
}

/**
 * Solver-ready form of a linkage. Frozen; valid for a single solve.
 * @public
 */
export interface CompiledLinkage {
  readonly pointIds: readonly string[];
  readonly initialX: readonly number[];
  readonly initialY: readonly number[];
  readonly edges: readonly LinkEdge[];
  readonly pinned: readonly boolean[];
  readonly rearAxleIndex: number | null;
  readonly driverBodyId: string;
  readonly driverEdgeIndex: number;
  readonly driverRestLength: number;
  readonly driverStroke: number;
}

const PINNED_POINT_TYPES: ReadonlySet<PointType> = new Set<PointType>(['bb', 'fixed']);

interface DriverInfo {
  bodyId: string;
  edgeIndex: number;
  restLength: number;
  stroke: number;
}

/**
 * Validates points and rigid bodies and compiles them into distance edges,
 * pinned flags and the shock driver.
 *
 * Bodies with fewer than two points are not structural and are skipped.
 * A `fixed` body pins every member point; a `closed` chain of three or more
 * points gets an extra segment back to its first point.
 *
 * @throws {@link LinkageValidationError} subclasses for every malformed input
 * @public
 */
export function compileLinkage(points: readonly LinkagePoint[], bodies: readonly RigidBody[]): CompiledLinkage {
  if (points.length === 0) {
    throw new EmptyPointsError();
  }
  if (bodies.length === 0) {
    throw new EmptyBodiesError();
  }

  const indexById = new Map<string, number>();
  points.forEach((p, i) => {
    if (indexById.has(p.id)) {
      throw new DuplicatePointIdError(p.id);
    }
    indexById.set(p.id, i);
  });

  const initialX = points.map(p => p.x);
  const initialY = points.map(p => p.y);
  const pinned = points.map(p => PINNED_POINT_TYPES.has(p.type));
  const rearAxle = points.findIndex(p => p.type === 'rear_axle');

  const resolve = (body: RigidBody, pointId: string): number => {
    const index = indexById.get(pointId);
    if (index === undefined) {
      throw new UnknownPointReferenceError(body.id, pointId);
    }
    return index;
  };

  const edges: LinkEdge[] = [];
  let driver: DriverInfo | null = null;

  for (const body of bodies) {
    const ids = body.pointIds;
    if (body.type === 'shock' && ids.length !== 2) {
      throw new InvalidShockBodyError(body.id, ids.length);
    }
    if (ids.length < 2) {
      continue;
    }

    if (body.type === 'fixed') {
      for (const id of ids) {
        pinned[resolve(body, id)] = true;
      }
    }

    for (const [aId, bId] of segmentPairs(ids, body.closed ?? false)) {
      const a = resolve(body, aId);
      const b = resolve(body, bId);
      const restLength = body.length0 ?? Math.hypot(initialX[b] - initialX[a], initialY[b] - initialY[a]);

      if (body.type !== 'shock') {
        edges.push({ a, b, restLength, isDriver: false });
        continue;
      }

      if (body.stroke === undefined) {
        throw new MissingShockStrokeError(body.id);
      }
      if (driver !== null) {
        throw new MultipleShockBodiesError(body.id, driver.bodyId);
      }
      edges.push({ a, b, restLength, isDriver: true });
      driver = { bodyId: body.id, edgeIndex: edges.length - 1, restLength, stroke: body.stroke };
    }
  }

  if (driver === null) {
    throw new MissingShockBodyError();
  }

  return Object.freeze({
    pointIds: Object.freeze(points.map(p => p.id)),
    initialX: Object.freeze(initialX),
    initialY: Object.freeze(initialY),
    edges: Object.freeze(edges.map(e => Object.freeze(e))),
    pinned: Object.freeze(pinned),
    rearAxleIndex: rearAxle === -1 ? null : rearAxle,
    driverBodyId: driver.bodyId,
    driverEdgeIndex: driver.edgeIndex,
    driverRestLength: driver.restLength,
    driverStroke: driver.stroke,
  });
}

function segmentPairs(ids: readonly string[], closed: boolean): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  for (let i = 0; i + 1 < ids.length; i++) {
    pairs.push([ids[i], ids[i + 1]]);
  }
  if (closed && ids.length > 2) {
    pairs.push([ids[ids.length - 1], ids[0]]);
  }
  return pairs;
}
