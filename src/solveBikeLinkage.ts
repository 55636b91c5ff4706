import { relaxLinkage, type SolverOptions } from './ConstraintSolver';
import { compileLinkage } from './LinkageBuilder';
import { aggregateSteps } from './ResultAggregator';
import type { LinkagePoint, RigidBody, SolverResult } from './types';

/**
 * Simulates a rear-suspension linkage through the full shock stroke.
 *
 * Expects exactly one rigid body of type `shock` with two points and a
 * `stroke`, in the same unit as the point coordinates. Returns positions,
 * rear travel and leverage at every step; travel and leverage are null when
 * no point is typed `rear_axle`.
 *
 * @example
 * ```ts
 * const result = solveBikeLinkage(points, bodies, { steps: 80, iterations: 100 });
 * const last = result.steps[result.steps.length - 1];
 * console.log(`travel=${last.rearTravel}`);
 * ```
 * @public
 */
export function solveBikeLinkage(
  points: readonly LinkagePoint[],
  bodies: readonly RigidBody[],
  options: SolverOptions = {}
): SolverResult {
  const linkage = compileLinkage(points, bodies);
  return aggregateSteps(linkage, relaxLinkage(linkage, options));
}
