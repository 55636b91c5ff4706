import { z } from "zod";
import { compileLinkage } from "../../LinkageBuilder";
import { loadLinkageDocument } from "../load-document";

export const validateSchema = z.object({
  file: z.string().min(1, "--file is required"),
});

export type ValidateArgs = z.infer<typeof validateSchema>;

export function validateLinkage(args: ValidateArgs): string[] {
  const doc = loadLinkageDocument(args.file);
  const linkage = compileLinkage(doc.points, doc.bodies);
  const pinnedCount = linkage.pinned.filter(Boolean).length;
  const rearAxle = linkage.rearAxleIndex === null ? "(none)" : linkage.pointIds[linkage.rearAxleIndex];

  return [
    `points: ${linkage.pointIds.length} (${pinnedCount} pinned)`,
    `edges: ${linkage.edges.length}`,
    `shock: ${linkage.driverBodyId} (rest ${linkage.driverRestLength.toFixed(2)}, stroke ${linkage.driverStroke.toFixed(2)})`,
    `rear axle: ${rearAxle}`,
  ];
}
