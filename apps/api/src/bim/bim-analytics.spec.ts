import type { BimElement, Clash, SystemType, WorkInPlaceItem } from '@gcpanel/types';

import { applyProgress, clashStatistics, summarizeWorkInPlace, systemAnalytics, toClashView } from './bim-analytics';

function element(id: string, systemType: SystemType, status: BimElement['status'] = 'not_started'): BimElement {
  return {
    id,
    tenantId: 't1',
    projectId: 'p1',
    modelId: 'm1',
    name: id,
    systemType,
    elementType: 'Element',
    status,
    level: 'Level 1',
    geometry: { kind: 'box', min: { x: 0, y: 0, z: 0 }, max: { x: 1, y: 1, z: 1 } },
    properties: {},
    createdAt: '2025-03-01T00:00:00.000Z',
    updatedAt: '2025-03-01T00:00:00.000Z',
  };
}

function clash(overrides: Partial<Clash>): Clash {
  return {
    id: 'c1',
    tenantId: 't1',
    projectId: 'p1',
    clashNumber: 'CLASH-001',
    elementAId: 'beam',
    elementBId: 'duct',
    clashType: 'soft_clash',
    status: 'active',
    priority: 'high',
    distance: 12,
    location: { x: 0, y: 0, z: 0 },
    description: 'Beam vs duct',
    detectedBy: 'test',
    createdAt: '2025-03-01T09:00:00.000Z',
    ...overrides,
  };
}

function work(elementId: string, overrides: Partial<WorkInPlaceItem> = {}): WorkInPlaceItem {
  return {
    id: `w-${elementId}`,
    tenantId: 't1',
    projectId: 'p1',
    elementId,
    workType: 'install',
    description: 'Install',
    status: 'not_started',
    assignedTo: 'crew-1',
    progressPercentage: 0,
    notes: [],
    createdAt: '2025-03-01T00:00:00.000Z',
    updatedAt: '2025-03-01T00:00:00.000Z',
    ...overrides,
  };
}

const elements = [element('beam', 'structural', 'complete'), element('duct', 'mechanical'), element('pipe', 'plumbing')];

describe('bim analytics', () => {
  it('ages clashes until they are resolved', () => {
    const open = toClashView(clash({}), '2025-03-04T08:00:00.000Z');
    expect(open).toMatchObject({ daysOpen: 2, isCritical: false });

    const resolved = toClashView(
      clash({ clashType: 'hard_clash', status: 'resolved', resolvedAt: '2025-03-02T09:00:00.000Z' }),
      '2025-03-30T00:00:00.000Z',
    );
    expect(resolved).toMatchObject({ daysOpen: 1, isCritical: true });
  });

  it('tallies clashes by type and system pairing', () => {
    const stats = clashStatistics(
      [
        clash({}),
        clash({ id: 'c2', status: 'resolved', priority: 'critical', clashType: 'hard_clash' }),
        clash({ id: 'c3', elementAId: 'duct', elementBId: 'pipe', status: 'reviewing' }),
        clash({ id: 'c4', elementBId: 'removed-element', status: 'ignored' }),
      ],
      elements,
    );
    expect(stats).toEqual({
      total: 4,
      active: 1,
      resolved: 1,
      critical: 1,
      resolutionRate: 25,
      byType: { hard_clash: 1, soft_clash: 3, clearance_clash: 0, workflow_clash: 0 },
      systemInteractions: { 'structural-mechanical': 2, 'mechanical-plumbing': 1 },
    });
  });

  it('clamps progress and derives status from it', () => {
    const item = work('beam', { targetCompletion: '2025-03-20' });
    expect(applyProgress(item, 40, '2025-03-10')).toMatchObject({ progressPercentage: 40, status: 'in_progress' });

    const done = applyProgress(item, 130, '2025-03-12', 'Topped out');
    expect(done).toMatchObject({
      progressPercentage: 100,
      status: 'complete',
      actualCompletion: '2025-03-12',
      notes: ['2025-03-12: Topped out'],
    });
    expect(applyProgress(done, 100, '2025-03-14').actualCompletion).toBe('2025-03-12');

    const reset = applyProgress(done, -10, '2025-03-13');
    expect(reset).toMatchObject({ progressPercentage: 0, status: 'not_started' });
    expect(reset.actualCompletion).toBeUndefined();
  });

  it('counts reopened work as on schedule again', () => {
    const item = work('beam', { targetCompletion: '2025-03-01' });
    const finished = applyProgress(item, 100, '2025-03-10');
    const reopened = applyProgress(finished, 60, '2025-03-11');
    expect(reopened).toMatchObject({ status: 'in_progress', progressPercentage: 60 });
    expect(reopened.actualCompletion).toBeUndefined();

    expect(systemAnalytics(elements, [finished]).structural).toMatchObject({ onSchedule: 0, delayed: 1 });
    expect(systemAnalytics(elements, [reopened]).structural).toMatchObject({ onSchedule: 1, delayed: 0 });
  });

  it('summarizes work in place per system', () => {
    const items = [
      work('beam', { progressPercentage: 100, status: 'complete' }),
      work('duct', { progressPercentage: 35, status: 'in_progress' }),
      work('orphan', { progressPercentage: 20, status: 'in_progress' }),
    ];
    expect(summarizeWorkInPlace(items, elements)).toEqual({
      totalItems: 3,
      completed: 1,
      inProgress: 2,
      notStarted: 0,
      overallProgress: 51.7,
      systemProgress: { structural: 100, mechanical: 35 },
    });
  });

  it('reports schedule adherence for systems with elements', () => {
    const analytics = systemAnalytics(elements, [
      work('beam', {
        targetCompletion: '2025-03-10',
        actualCompletion: '2025-03-12',
        progressPercentage: 100,
        status: 'complete',
      }),
      work('duct', { targetCompletion: '2025-03-30', progressPercentage: 50 }),
      work('pipe'),
    ]);

    expect(Object.keys(analytics)).toEqual(['structural', 'mechanical', 'plumbing']);
    expect(analytics.structural).toEqual({
      totalElements: 1,
      statusDistribution: { not_started: 0, in_progress: 0, complete: 1, issue: 0, on_hold: 0 },
      averageProgress: 100,
      workItems: 1,
      onSchedule: 0,
      delayed: 1,
    });
    expect(analytics.mechanical).toMatchObject({ onSchedule: 1, delayed: 0, averageProgress: 50 });
    expect(analytics.plumbing).toMatchObject({ onSchedule: 0, delayed: 1 });
  });
});
