/**
 * Point roles understood by the linkage solver.
 * `bb` (bottom bracket) and `fixed` are pinned to the frame.
 * @public
 */
export const POINT_TYPES = ['bb', 'rear_axle', 'front_axle', 'free', 'fixed'] as const;
export type PointType = (typeof POINT_TYPES)[number];

/**
 * Rigid body kinds. Exactly one `shock` drives the mechanism.
 * @public
 */
export const BODY_TYPES = ['bar', 'shock', 'fixed', 'other'] as const;
export type BodyType = (typeof BODY_TYPES)[number];

/**
 * An identified 2D location, usually in image pixels.
 * @public
 */
export interface LinkagePoint {
  readonly id: string;
  readonly type: PointType;
  readonly x: number;
  readonly y: number;
  readonly name?: string;
}

/**
 * Ordered chain of points joined by rigid segments.
 * @public
 */
export interface RigidBody {
  readonly id: string;
  readonly type: BodyType;
  readonly pointIds: readonly string[];
  /** Adds a segment from the last point back to the first (default: false) */
  readonly closed?: boolean;
  /** Rest length of every segment; computed from the initial coordinates when absent */
  readonly length0?: number;
  /** Total shock travel, same unit as the coordinates. Shock bodies only. */
  readonly stroke?: number;
  readonly name?: string;
}

/**
 * Scale information stored alongside a bike's geometry.
 * @public
 */
export interface BikeGeometry {
  readonly rearCenterMm?: number;
  readonly scaleMmPerPx?: number;
}

/** @public */
export type Position = readonly [x: number, y: number];

/**
 * State of the linkage at one shock-stroke step.
 * @public
 */
export interface SolverStep {
  stepIndex: number;
  /** Shock compression at this step */
  shockStroke: number;
  /** Eye-to-eye length realized by the solved pose */
  shockLength: number;
  /** Upward rear axle movement since step 0, or null without a rear axle */
  rearTravel: number | null;
  /** d(rearTravel)/d(shockStroke) against the previous step */
  leverageRatio: number | null;
  /** Largest remaining |length - target| over all edges */
  residual: number;
  points: Record<string, Position>;
}

/**
 * Full sweep from zero to full shock stroke.
 * @public
 */
export interface SolverResult {
  rearAxlePointId: string | null;
  steps: SolverStep[];
}
