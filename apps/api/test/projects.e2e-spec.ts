import { INestApplication } from '@nestjs/common';
import request from 'supertest';

import { bearer, createTestApp } from './utils';

describe('Projects E2E', () => {
  let app: INestApplication;
  const auth = bearer('tenant-a');

  beforeAll(async () => {
    app = await createTestApp();
  });

  afterAll(async () => {
    await app.close();
  });

  it('creates a project with defaults', async () => {
    const res = await request(app.getHttpServer())
      .post('/projects')
      .set('Authorization', auth)
      .send({
        name: 'Highland Tower',
        projectNumber: 'HT-2025',
        startDate: '2025-01-06',
        plannedCompletionDate: '2026-06-30',
      })
      .expect(201);

    expect(res.body).toMatchObject({
      tenantId: 'tenant-a',
      name: 'Highland Tower',
      projectNumber: 'HT-2025',
      status: 'planning',
      contractValue: 0,
      createdAt: '2025-03-10T09:00:00.000Z',
    });
    expect(typeof res.body.id).toBe('string');
  });

  it('rejects a duplicate project number with 409', async () => {
    await request(app.getHttpServer())
      .post('/projects')
      .set('Authorization', auth)
      .send({ name: 'Highland Tower Annex', projectNumber: 'HT-2025' })
      .expect(409);
  });

  it('rejects invalid input with 422 and the failing paths', async () => {
    const res = await request(app.getHttpServer())
      .post('/projects')
      .set('Authorization', auth)
      .send({ projectNumber: 'X-1', contractValue: -5 })
      .expect(422);
    expect(res.body.error).toBe('ValidationError');
    const paths = res.body.issues.map((i: { path: string[] }) => i.path.join('.'));
    expect(paths).toEqual(expect.arrayContaining(['name', 'contractValue']));
  });

  it('rejects a completion date before the start date', async () => {
    const res = await request(app.getHttpServer())
      .post('/projects')
      .set('Authorization', auth)
      .send({
        name: 'Backwards',
        projectNumber: 'BW-1',
        startDate: '2025-06-01',
        plannedCompletionDate: '2025-05-01',
      })
      .expect(422);
    expect(res.body.issues[0].path).toEqual(['plannedCompletionDate']);
  });

  it('lists projects by name and supports update and delete', async () => {
    const created = await request(app.getHttpServer())
      .post('/projects')
      .set('Authorization', auth)
      .send({ name: 'Alder Street Lofts', projectNumber: 'AS-7', contractValue: 12500000 })
      .expect(201);

    const list = await request(app.getHttpServer()).get('/projects').set('Authorization', auth).expect(200);
    expect(list.body.map((p: { name: string }) => p.name)).toEqual(['Alder Street Lofts', 'Highland Tower']);

    const updated = await request(app.getHttpServer())
      .patch(`/projects/${created.body.id}`)
      .set('Authorization', auth)
      .send({ status: 'active', projectManager: 'J. Ortiz' })
      .expect(200);
    expect(updated.body).toMatchObject({ status: 'active', projectManager: 'J. Ortiz', projectNumber: 'AS-7' });

    await request(app.getHttpServer())
      .patch(`/projects/${created.body.id}`)
      .set('Authorization', auth)
      .send({ startDate: '2025-09-01', plannedCompletionDate: '2025-08-01' })
      .expect(422);

    await request(app.getHttpServer())
      .delete(`/projects/${created.body.id}`)
      .set('Authorization', auth)
      .expect(204);
    await request(app.getHttpServer())
      .get(`/projects/${created.body.id}`)
      .set('Authorization', auth)
      .expect(404);
    await request(app.getHttpServer())
      .delete(`/projects/${created.body.id}`)
      .set('Authorization', auth)
      .expect(404);
  });
});
