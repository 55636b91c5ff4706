import { z } from "zod";
import { DEFAULT_ITERATIONS, DEFAULT_STEPS } from "../../ConstraintSolver";
import { solveBikeLinkage } from "../../solveBikeLinkage";
import type { SolverResult } from "../../types";
import { bodiesToPixels, resolveScale, resultToMillimeters } from "../../Units";
import { assert } from "../cli-error";
import { loadLinkageDocument } from "../load-document";

export const solveSchema = z.object({
  file: z.string().min(1, "--file is required"),
  steps: z.coerce.number().int().min(1, "--steps must be an integer >= 1").default(DEFAULT_STEPS),
  iterations: z.coerce.number().int().min(1, "--iterations must be an integer >= 1").default(DEFAULT_ITERATIONS),
  mm: z.boolean().optional(),
  scale: z.coerce.number().positive("--scale must be positive").optional(),
  json: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

export type SolveArgs = z.infer<typeof solveSchema>;

export type LengthUnit = "px" | "mm";

export interface SolveOutcome {
  readonly result: SolverResult;
  readonly unit: LengthUnit;
  readonly scaleMmPerPx: number | null;
}

/**
 * Loads a linkage document and sweeps it. With `--mm` the document's shock
 * stroke is read as millimeters and results are reported in millimeters.
 */
export function runSolve(args: SolveArgs): SolveOutcome {
  const doc = loadLinkageDocument(args.file);
  const options = { steps: args.steps, iterations: args.iterations, verbose: args.verbose ?? false };

  if (!args.mm) {
    return { result: solveBikeLinkage(doc.points, doc.bodies, options), unit: "px", scaleMmPerPx: null };
  }

  const scaleMmPerPx = args.scale ?? resolveScale(doc.geometry, doc.points);
  assert(scaleMmPerPx !== null, "--mm needs --scale or a document geometry with scale_mm_per_px or rear_center_mm.");

  const result = solveBikeLinkage(doc.points, bodiesToPixels(doc.bodies, scaleMmPerPx), options);
  return { result: resultToMillimeters(result, scaleMmPerPx), unit: "mm", scaleMmPerPx };
}

const COLUMN_WIDTH = 10;
const COLUMNS = ["step", "stroke", "shock", "travel", "leverage", "residual"];

function fixed(value: number | null, digits: number): string {
  return value === null ? "-" : value.toFixed(digits);
}

export function formatStepTable(outcome: SolveOutcome): string[] {
  const { result, unit } = outcome;
  const row = (cells: string[]) => cells.map(cell => cell.padStart(COLUMN_WIDTH)).join("");

  const lines = [`rear axle: ${result.rearAxlePointId ?? "(none)"} | units: ${unit}`, row(COLUMNS)];
  for (const step of result.steps) {
    lines.push(
      row([
        String(step.stepIndex),
        fixed(step.shockStroke, 2),
        fixed(step.shockLength, 2),
        fixed(step.rearTravel, 2),
        fixed(step.leverageRatio, 3),
        step.residual.toExponential(1),
      ])
    );
  }
  return lines;
}
