import { INestApplication } from '@nestjs/common';
import request from 'supertest';

import { bearer, createTestApp, FixedClock } from './utils';

describe('Dashboard E2E', () => {
  let app: INestApplication;
  const clock = new FixedClock();
  const auth = bearer('tenant-dash');
  let projectId: string;

  beforeAll(async () => {
    app = await createTestApp(clock);
    const server = app.getHttpServer();

    const project = await request(server)
      .post('/projects')
      .set('Authorization', auth)
      .send({ name: 'Riverside Clinic', projectNumber: 'RC-01', status: 'active' })
      .expect(201);
    projectId = project.body.id;

    await request(server)
      .post(`/projects/${projectId}/rfis`)
      .set('Authorization', auth)
      .send({
        title: 'Footing depth at grid C4',
        description: 'Soil report conflicts with S-201',
        question: 'Confirm bearing elevation',
        category: 'design_clarification',
        priority: 'high',
        submittedBy: 'super@example.test',
        assignedTo: 'engineer@example.test',
        dueDate: '2025-03-12',
      })
      .expect(201);
    await request(server)
      .post(`/projects/${projectId}/cost/line-items`)
      .set('Authorization', auth)
      .send({
        costCode: '31-2300',
        csiDivision: '31',
        description: 'Excavation',
        category: 'subcontractor',
        budgetedAmount: 40000,
        actualAmount: 10000,
        createdBy: 'estimator@example.test',
      })
      .expect(201);
    await request(server)
      .post(`/projects/${projectId}/bim/elements`)
      .set('Authorization', auth)
      .send({
        modelId: 'rc-structural',
        name: 'Footing C4',
        elementType: 'Footing',
        systemType: 'structural',
        level: 'Foundation',
        geometry: { kind: 'box', min: { x: 0, y: 0, z: -1200 }, max: { x: 1500, y: 1500, z: -600 } },
      })
      .expect(201);
    await request(server)
      .post(`/projects/${projectId}/documents`)
      .set('Authorization', auth)
      .send({
        title: 'S-201 Foundation Plan',
        documentType: 'drawing',
        status: 'issued_for_review',
        fileName: 'S-201.pdf',
        mimeType: 'application/pdf',
        sizeBytes: 1024,
        uploadedBy: 'engineer@example.test',
      })
      .expect(201);
  });

  afterAll(async () => {
    await app.close();
  });

  it('summarizes every area of a project', async () => {
    clock.set('2025-03-15T12:00:00.000Z');
    const res = await request(app.getHttpServer())
      .get(`/projects/${projectId}/dashboard`)
      .set('Authorization', auth)
      .expect(200);

    expect(res.body.project).toMatchObject({ id: projectId, name: 'Riverside Clinic', status: 'active' });
    expect(res.body.rfis).toEqual({
      total: 1,
      statusBreakdown: { draft: 1, submitted: 0, under_review: 0, answered: 0, closed: 0 },
      priorityBreakdown: { low: 0, medium: 0, high: 1, critical: 0 },
      averageResponseDays: 0,
      overdueCount: 1,
      responseRate: 0,
    });
    expect(res.body.cost).toMatchObject({
      totalBudget: 40000,
      totalActual: 10000,
      revisedBudget: 40000,
      budgetVariance: -30000,
      variancePercentage: -75,
    });
    expect(res.body.bim).toEqual({
      elements: 1,
      clashes: {
        total: 0,
        active: 0,
        resolved: 0,
        critical: 0,
        resolutionRate: 0,
        byType: { hard_clash: 0, soft_clash: 0, clearance_clash: 0, workflow_clash: 0 },
        systemInteractions: {},
      },
      workInPlace: {
        totalItems: 0,
        completed: 0,
        inProgress: 0,
        notStarted: 0,
        overallProgress: 0,
        systemProgress: {},
      },
    });
    expect(res.body.documents).toEqual({
      total: 1,
      byStatus: { draft: 0, issued_for_review: 1, approved: 0, superseded: 0 },
    });
    expect(res.body.generatedAt).toBe('2025-03-15T12:00:00.000Z');
  });

  it('is scoped to the tenant', async () => {
    await request(app.getHttpServer())
      .get(`/projects/${projectId}/dashboard`)
      .set('Authorization', bearer('tenant-other'))
      .expect(404);
  });
});
