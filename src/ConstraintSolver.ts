import { SolverOptionsError } from './errors';
import type { CompiledLinkage } from './LinkageBuilder';

/**
 * Configuration options for the linkage sweep.
 * @public
 */
export interface SolverOptions {
  /** Number of stroke increments; the sweep records steps + 1 poses (default: 80) */
  steps?: number;
  /** Relaxation passes over all edges per step (default: 100) */
  iterations?: number;
  /** Print progress information (default: false) */
  verbose?: boolean;
}

export const DEFAULT_STEPS = 80;
export const DEFAULT_ITERATIONS = 100;

/** Shortest length the shock is ever asked to reach. */
export const MIN_SHOCK_LENGTH = 1e-6;
/** Stand-in for a zero edge length when dividing. */
export const MIN_EDGE_DISTANCE = 1e-9;

/**
 * Solved positions at one stroke value.
 * `positions` is laid out as [x0, y0, x1, y1, ...] by point index.
 * @public
 */
export interface LinkagePose {
  stepIndex: number;
  stroke: number;
  driverTarget: number;
  positions: Float64Array;
}

export function resolveSolverOptions(options: SolverOptions = {}): Required<SolverOptions> {
  const { steps = DEFAULT_STEPS, iterations = DEFAULT_ITERATIONS, verbose = false } = options;
  if (!Number.isInteger(steps) || steps < 1) {
    throw new SolverOptionsError('steps', steps);
  }
  if (!Number.isInteger(iterations) || iterations < 1) {
    throw new SolverOptionsError('iterations', iterations);
  }
  return { steps, iterations, verbose };
}

/**
 * Sweeps the shock from zero to full stroke with position-based relaxation.
 *
 * Every edge is a distance constraint. Within one pass edges are projected
 * in declaration order and each projection sees the positions the previous
 * one wrote (Gauss-Seidel), so results depend on that order. Pinned
 * endpoints never move; a single free endpoint takes the whole correction
 * and two free endpoints split it.
 *
 * The solver never checks for convergence: after `iterations` passes the
 * current pose is recorded as is.
 *
 * @example
 * ```ts
 * const linkage = compileLinkage(points, bodies);
 * const poses = relaxLinkage(linkage, { steps: 40, iterations: 200 });
 * ```
 * @public
 */
export function relaxLinkage(linkage: CompiledLinkage, options: SolverOptions = {}): LinkagePose[] {
  const { steps, iterations, verbose } = resolveSolverOptions(options);
  const { edges, pinned, driverEdgeIndex, driverRestLength, driverStroke } = linkage;

  const pos = new Float64Array(linkage.pointIds.length * 2);
  linkage.initialX.forEach((x, i) => {
    pos[2 * i] = x;
    pos[2 * i + 1] = linkage.initialY[i];
  });

  if (verbose) {
    console.log(`Linkage sweep`);
    console.log(
      `  ${linkage.pointIds.length} points, ${edges.length} edges, ` +
        `shock ${driverRestLength.toFixed(3)} → stroke ${driverStroke.toFixed(3)}`
    );
  }

  const poses: LinkagePose[] = [];

  for (let step = 0; step <= steps; step++) {
    const stroke = driverStroke * (step / steps);
    const driverTarget = Math.max(MIN_SHOCK_LENGTH, driverRestLength - stroke);

    for (let iter = 0; iter < iterations; iter++) {
      for (let e = 0; e < edges.length; e++) {
        const edge = edges[e];
        const pinnedA = pinned[edge.a];
        const pinnedB = pinned[edge.b];
        if (pinnedA && pinnedB) {
          continue;
        }

        const target = e === driverEdgeIndex ? driverTarget : edge.restLength;
        const ax = 2 * edge.a;
        const bx = 2 * edge.b;
        const dx = pos[bx] - pos[ax];
        const dy = pos[bx + 1] - pos[ax + 1];
        const dist = Math.hypot(dx, dy) || MIN_EDGE_DISTANCE;
        const diff = (dist - target) / dist;

        if (pinnedA) {
          pos[bx] -= dx * diff;
          pos[bx + 1] -= dy * diff;
        } else if (pinnedB) {
          pos[ax] += dx * diff;
          pos[ax + 1] += dy * diff;
        } else {
          pos[ax] += dx * diff * 0.5;
          pos[ax + 1] += dy * diff * 0.5;
          pos[bx] -= dx * diff * 0.5;
          pos[bx + 1] -= dy * diff * 0.5;
        }
      }
    }

    poses.push({ stepIndex: step, stroke, driverTarget, positions: pos.slice() });

    if (verbose) {
      console.log(`Step ${step}/${steps}: stroke=${stroke.toFixed(4)}, shock target=${driverTarget.toFixed(4)}`);
    }
  }

  return poses;
}
