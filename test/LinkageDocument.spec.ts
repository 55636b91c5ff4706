import { describe, it, expect } from 'vitest';
import { LinkageDocumentError, parseLinkageDocument } from '../src/LinkageDocument';

function rejectionIssues(input: unknown): readonly string[] {
  try {
    parseLinkageDocument(input);
  } catch (err) {
    if (err instanceof LinkageDocumentError) {
      return err.issues;
    }
    throw err;
  }
  throw new Error('document should be rejected');
}

const stored = {
  points: [
    { id: 'bb', type: 'bb', x: 0, y: 0, name: 'Bottom bracket' },
    { id: 'axle', type: 'rear_axle', x: 10, y: 0, name: null },
    { id: 'mount', type: 'fixed', x: 0, y: -10 },
  ],
  bodies: [
    { id: 'swingarm', point_ids: ['bb', 'axle'] },
    { id: 'shock', name: 'Rear shock', point_ids: ['mount', 'axle'], type: 'shock', stroke: 4, length0: null },
  ],
  geometry: { rear_center_mm: 435, scale_mm_per_px: null },
};

describe('parseLinkageDocument', () => {
  it('maps a stored document onto solver types', () => {
    const doc = parseLinkageDocument(stored);

    expect(doc.points).toEqual([
      { id: 'bb', type: 'bb', x: 0, y: 0, name: 'Bottom bracket' },
      { id: 'axle', type: 'rear_axle', x: 10, y: 0 },
      { id: 'mount', type: 'fixed', x: 0, y: -10 },
    ]);
    expect(doc.bodies).toEqual([
      { id: 'swingarm', type: 'bar', pointIds: ['bb', 'axle'], closed: false },
      { id: 'shock', type: 'shock', pointIds: ['mount', 'axle'], closed: false, stroke: 4, name: 'Rear shock' },
    ]);
    expect(doc.geometry).toEqual({ rearCenterMm: 435 });
  });

  it('defaults missing collections to empty lists', () => {
    const doc = parseLinkageDocument({});
    expect(doc.points).toEqual([]);
    expect(doc.bodies).toEqual([]);
    expect(doc.geometry).toEqual({});
  });

  it('rejects an unknown point type with its path', () => {
    const input = { ...stored, points: [{ id: 'hub', type: 'hub', x: 0, y: 0 }] };

    const issues = rejectionIssues(input);
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('points.0.type: ')).toBe(true);
  });

  it('rejects an unknown body type', () => {
    const input = { ...stored, bodies: [{ id: 'spring', type: 'coil', point_ids: ['bb', 'axle'] }] };
    expect(() => parseLinkageDocument(input)).toThrow(LinkageDocumentError);
  });

  it('rejects non-finite coordinates and negative strokes', () => {
    const input = {
      points: [{ id: 'bb', type: 'bb', x: Number.NaN, y: 0 }],
      bodies: [{ id: 'shock', type: 'shock', point_ids: ['bb', 'bb'], stroke: -1 }],
    };

    const issues = rejectionIssues(input);
    expect(issues.map(issue => issue.split(':')[0])).toEqual(['points.0.x', 'bodies.0.stroke']);
  });

  it('rejects input that is not an object', () => {
    expect(() => parseLinkageDocument('points')).toThrow(/\(root\)/);
  });
});
