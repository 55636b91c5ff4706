import { z } from 'zod';
import { BODY_TYPES, POINT_TYPES } from './types';
import type { BikeGeometry, LinkagePoint, RigidBody } from './types';

const finite = z.number().finite();

export const pointSchema = z.object({
  id: z.string().min(1, 'point id must not be empty'),
  type: z.enum(POINT_TYPES),
  x: finite,
  y: finite,
  name: z.string().nullish(),
});

export const bodySchema = z.object({
  id: z.string().min(1, 'body id must not be empty'),
  name: z.string().nullish(),
  point_ids: z.array(z.string()).default([]),
  type: z.enum(BODY_TYPES).nullish(),
  closed: z.boolean().default(false),
  length0: finite.positive().nullish(),
  stroke: finite.nonnegative().nullish(),
});

export const geometrySchema = z.object({
  rear_center_mm: finite.positive().nullish(),
  scale_mm_per_px: finite.positive().nullish(),
});

export const linkageDocumentSchema = z.object({
  points: z.array(pointSchema).default([]),
  bodies: z.array(bodySchema).default([]),
  geometry: geometrySchema.nullish(),
});

export type LinkageDocumentInput = z.input<typeof linkageDocumentSchema>;

/**
 * A bike's stored linkage, mapped onto solver types.
 * @public
 */
export interface LinkageDocument {
  points: LinkagePoint[];
  bodies: RigidBody[];
  geometry: BikeGeometry;
}

/** @public */
export class LinkageDocumentError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid linkage document:\n${issues.map(issue => `  - ${issue}`).join('\n')}`);
    this.name = 'LinkageDocumentError';
    this.issues = issues;
  }
}

function formatIssue(issue: z.ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${where}: ${issue.message}`;
}

// Stored documents use null for "not set"; solver types use absent fields.
function defined<T>(value: T | null | undefined): T | undefined {
  return value ?? undefined;
}

/**
 * Validates a stored linkage document (snake_case, as the bike records keep
 * it) and maps it onto {@link LinkagePoint} and {@link RigidBody}.
 * A body without a type is treated as a plain bar.
 *
 * Only the shape is checked here; structural rules (unique ids, a single
 * shock, resolvable references) are enforced by `compileLinkage`.
 * @public
 */
export function parseLinkageDocument(input: unknown): LinkageDocument {
  const parsed = linkageDocumentSchema.safeParse(input);
  if (!parsed.success) {
    throw new LinkageDocumentError(parsed.error.issues.map(formatIssue));
  }
  const { points, bodies, geometry } = parsed.data;

  return {
    points: points.map(p => ({ id: p.id, type: p.type, x: p.x, y: p.y, name: defined(p.name) })),
    bodies: bodies.map(b => ({
      id: b.id,
      type: b.type ?? 'bar',
      pointIds: b.point_ids,
      closed: b.closed,
      length0: defined(b.length0),
      stroke: defined(b.stroke),
      name: defined(b.name),
    })),
    geometry: {
      rearCenterMm: defined(geometry?.rear_center_mm),
      scaleMmPerPx: defined(geometry?.scale_mm_per_px),
    },
  };
}
