import type { BimElement, ElementGeometry, SystemType } from '@gcpanel/types';

import {
  boundingBox,
  boxesOverlap,
  displayName,
  findClashes,
  locationDescription,
  pairKey,
} from './clash-detection';

const options = { hardTolerance: 0, softTolerance: 25, includeSameSystem: false };

function element(id: string, systemType: SystemType, geometry: ElementGeometry): BimElement {
  return {
    id,
    tenantId: 't1',
    projectId: 'p1',
    modelId: 'm1',
    name: id,
    systemType,
    elementType: 'Element',
    status: 'not_started',
    level: 'Level 1',
    geometry,
    properties: {},
    createdAt: '2025-03-10T09:00:00.000Z',
    updatedAt: '2025-03-10T09:00:00.000Z',
  };
}

const box = (x: number, y: number, z: number, size: number): ElementGeometry => ({
  kind: 'box',
  min: { x, y, z },
  max: { x: x + size, y: y + size, z: z + size },
});

describe('clash detection', () => {
  it('widens linear runs by half their section', () => {
    expect(
      boundingBox({
        kind: 'linear',
        start: { x: 100, y: 0, z: 50 },
        end: { x: 0, y: 400, z: 50 },
        width: 20,
        height: 10,
      }),
    ).toEqual({ min: { x: -10, y: -5, z: 45 }, max: { x: 110, y: 405, z: 55 } });
  });

  it('counts touching faces as overlap', () => {
    const a = { min: { x: 0, y: 0, z: 0 }, max: { x: 10, y: 10, z: 10 } };
    expect(boxesOverlap(a, { min: { x: 10, y: 0, z: 0 }, max: { x: 20, y: 10, z: 10 } })).toBe(true);
    expect(boxesOverlap(a, { min: { x: 10.5, y: 0, z: 0 }, max: { x: 20, y: 10, z: 10 } })).toBe(false);
  });

  it('classifies by centre distance', () => {
    const sweep = findClashes(
      [
        element('beam', 'structural', box(0, 0, 0, 100)),
        element('duct', 'mechanical', box(0, 0, 0, 100)),
        element('pipe', 'plumbing', box(20, 0, 0, 100)),
        element('cable', 'electrical', box(40, 0, 0, 100)),
      ],
      options,
    );

    expect(sweep.checkedPairs).toBe(6);
    expect(sweep.skippedPairs).toBe(0);
    expect(sweep.candidates.map((c) => [c.elementA.id, c.elementB.id, c.clashType, c.priority])).toEqual([
      ['beam', 'duct', 'hard_clash', 'critical'],
      ['beam', 'pipe', 'soft_clash', 'high'],
      ['duct', 'pipe', 'soft_clash', 'high'],
      ['pipe', 'cable', 'soft_clash', 'high'],
    ]);
    expect(sweep.candidates[1]).toMatchObject({ distance: 20, location: { x: 60, y: 50, z: 50 } });
  });

  it('skips same-system pairs and pairs that already have an open clash', () => {
    const elements = [
      element('a', 'structural', box(0, 0, 0, 10)),
      element('b', 'structural', box(0, 0, 0, 10)),
      element('c', 'mechanical', box(0, 0, 0, 10)),
    ];

    const sweep = findClashes(elements, options, new Set([pairKey('c', 'a')]));
    expect(sweep).toMatchObject({ checkedPairs: 1, skippedPairs: 2 });
    expect(sweep.candidates.map((c) => [c.elementA.id, c.elementB.id])).toEqual([['b', 'c']]);

    const all = findClashes(elements, { ...options, includeSameSystem: true });
    expect(all.candidates).toHaveLength(3);
  });

  it('describes elements for display', () => {
    const beam = { ...element('e1', 'structural', box(0, 0, 0, 1)), elementType: 'Beam', customId: 'B-12' };
    expect(displayName(beam)).toBe('Beam B-12');
    expect(locationDescription(beam)).toBe('Level 1');
    expect(locationDescription({ ...beam, zone: 'North', gridLocation: 'C-4' })).toBe(
      'Level 1 - Zone North - Grid C-4',
    );
  });
});
