import type { LinkagePose } from './ConstraintSolver';
import type { CompiledLinkage } from './LinkageBuilder';
import type { Position, SolverResult, SolverStep } from './types';

/** Stroke deltas at or below this are treated as no movement. */
const MIN_STROKE_DELTA = 1e-9;

function distance(positions: Float64Array, a: number, b: number): number {
  return Math.hypot(positions[2 * b] - positions[2 * a], positions[2 * b + 1] - positions[2 * a + 1]);
}

/**
 * Largest |length - target| over all edges of a solved pose.
 */
export function constraintResidual(linkage: CompiledLinkage, pose: LinkagePose): number {
  let worst = 0;
  linkage.edges.forEach((edge, e) => {
    const target = e === linkage.driverEdgeIndex ? pose.driverTarget : edge.restLength;
    worst = Math.max(worst, Math.abs(distance(pose.positions, edge.a, edge.b) - target));
  });
  return worst;
}

/**
 * Leverage ratio as a backward finite difference of rear travel over stroke.
 * Null when either travel is missing or the stroke did not move.
 */
export function leverageBetween(previous: SolverStep | undefined, current: Omit<SolverStep, 'leverageRatio'>): number | null {
  if (previous === undefined || previous.rearTravel === null || current.rearTravel === null) {
    return null;
  }
  const ds = current.shockStroke - previous.shockStroke;
  if (Math.abs(ds) <= MIN_STROKE_DELTA) {
    return null;
  }
  return (current.rearTravel - previous.rearTravel) / ds;
}

/**
 * Turns the pose sweep into step records: realized shock length, rear axle
 * travel (positive when the axle moves up in image space), leverage ratio,
 * residual and per-point positions.
 * @public
 */
export function aggregateSteps(linkage: CompiledLinkage, poses: readonly LinkagePose[]): SolverResult {
  const { pointIds, rearAxleIndex } = linkage;
  const driver = linkage.edges[linkage.driverEdgeIndex];
  const rearY0 = rearAxleIndex === null ? null : linkage.initialY[rearAxleIndex];

  const steps: SolverStep[] = [];
  for (const pose of poses) {
    const { positions } = pose;

    // fromEntries defines own keys, so an id such as "__proto__" survives.
    const points: Record<string, Position> = Object.fromEntries(
      pointIds.map((id, i): [string, Position] => [id, [positions[2 * i], positions[2 * i + 1]]])
    );

    const partial = {
      stepIndex: pose.stepIndex,
      shockStroke: pose.stroke,
      shockLength: distance(positions, driver.a, driver.b),
      rearTravel: rearAxleIndex === null || rearY0 === null ? null : rearY0 - positions[2 * rearAxleIndex + 1],
      residual: constraintResidual(linkage, pose),
      points,
    };
    steps.push({ ...partial, leverageRatio: leverageBetween(steps[steps.length - 1], partial) });
  }

  return {
    rearAxlePointId: rearAxleIndex === null ? null : pointIds[rearAxleIndex],
    steps,
  };
}
