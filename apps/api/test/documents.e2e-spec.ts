import { INestApplication } from '@nestjs/common';
import request from 'supertest';

import { RATE_LIMITS } from '../src/common/rate-limit.service';
import { bearer, createTestApp, FixedClock } from './utils';

describe('Documents E2E', () => {
  let app: INestApplication;
  const clock = new FixedClock();
  const auth = bearer('tenant-d');
  let base: string;

  const drawing = {
    title: 'A-101 Ground Floor Plan',
    documentType: 'drawing',
    discipline: 'architectural',
    fileName: 'A-101.pdf',
    mimeType: 'application/pdf',
    sizeBytes: 2048,
    uploadedBy: 'architect@example.test',
  };

  async function createProject(authorization: string, projectNumber: string): Promise<string> {
    const res = await request(app.getHttpServer())
      .post('/projects')
      .set('Authorization', authorization)
      .send({ name: `Project ${projectNumber}`, projectNumber })
      .expect(201);
    return res.body.id;
  }

  beforeAll(async () => {
    app = await createTestApp(clock);
    base = `/projects/${await createProject(auth, 'DOC-1')}/documents`;
  });

  afterAll(async () => {
    await app.close();
  });

  it('registers documents with defaults', async () => {
    const res = await request(app.getHttpServer()).post(base).set('Authorization', auth).send(drawing).expect(201);
    expect(res.body).toMatchObject({
      title: 'A-101 Ground Floor Plan',
      revision: '0',
      status: 'draft',
      createdAt: '2025-03-10T09:00:00.000Z',
    });

    await request(app.getHttpServer())
      .post(base)
      .set('Authorization', auth)
      .send({ ...drawing, sizeBytes: -1 })
      .expect(422);
    await request(app.getHttpServer())
      .post('/projects/missing/documents')
      .set('Authorization', auth)
      .send(drawing)
      .expect(404);
  });

  it('revises a document and supersedes the previous revision', async () => {
    const spec = await request(app.getHttpServer())
      .post(base)
      .set('Authorization', auth)
      .send({
        ...drawing,
        title: '03 30 00 Cast-in-Place Concrete',
        documentType: 'specification',
        csiSection: '03 30 00',
        fileName: '033000.pdf',
        status: 'issued_for_review',
      })
      .expect(201);

    clock.set('2025-03-11T09:00:00.000Z');
    const revised = await request(app.getHttpServer())
      .post(`${base}/${spec.body.id}/revisions`)
      .set('Authorization', auth)
      .send({
        revision: '1',
        fileName: '033000-r1.pdf',
        mimeType: 'application/pdf',
        sizeBytes: 4096,
        uploadedBy: 'engineer@example.test',
      })
      .expect(201);
    expect(revised.body).toMatchObject({
      title: '03 30 00 Cast-in-Place Concrete',
      documentType: 'specification',
      csiSection: '03 30 00',
      revision: '1',
      status: 'draft',
      supersedesId: spec.body.id,
    });

    const previous = await request(app.getHttpServer())
      .get(`${base}/${spec.body.id}`)
      .set('Authorization', auth)
      .expect(200);
    expect(previous.body.status).toBe('superseded');

    await request(app.getHttpServer())
      .patch(`${base}/${spec.body.id}/status`)
      .set('Authorization', auth)
      .send({ status: 'approved' })
      .expect(409);
    await request(app.getHttpServer())
      .post(`${base}/${spec.body.id}/revisions`)
      .set('Authorization', auth)
      .send({ revision: '2', fileName: 'x.pdf', mimeType: 'application/pdf', sizeBytes: 1, uploadedBy: 'x' })
      .expect(409);
  });

  it('hides superseded revisions unless asked', async () => {
    const current = await request(app.getHttpServer()).get(base).set('Authorization', auth).expect(200);
    expect(current.body.map((d: { title: string; revision: string }) => `${d.title} r${d.revision}`)).toEqual([
      '03 30 00 Cast-in-Place Concrete r1',
      'A-101 Ground Floor Plan r0',
    ]);

    const all = await request(app.getHttpServer())
      .get(`${base}?includeSuperseded=true`)
      .set('Authorization', auth)
      .expect(200);
    expect(all.body.map((d: { revision: string }) => d.revision)).toEqual(['0', '1', '0']);

    const superseded = await request(app.getHttpServer())
      .get(`${base}?status=superseded`)
      .set('Authorization', auth)
      .expect(200);
    expect(superseded.body).toHaveLength(1);

    const drawings = await request(app.getHttpServer())
      .get(`${base}?documentType=drawing`)
      .set('Authorization', auth)
      .expect(200);
    expect(drawings.body.map((d: { fileName: string }) => d.fileName)).toEqual(['A-101.pdf']);
  });

  it('moves a current document through review', async () => {
    const [doc] = (await request(app.getHttpServer()).get(`${base}?documentType=drawing`).set('Authorization', auth))
      .body;
    const res = await request(app.getHttpServer())
      .patch(`${base}/${doc.id}/status`)
      .set('Authorization', auth)
      .send({ status: 'approved' })
      .expect(200);
    expect(res.body).toMatchObject({ status: 'approved', updatedAt: '2025-03-11T09:00:00.000Z' });

    await request(app.getHttpServer())
      .patch(`${base}/${doc.id}/status`)
      .set('Authorization', auth)
      .send({ status: 'superseded' })
      .expect(422);
  });

  it('deletes documents', async () => {
    const created = await request(app.getHttpServer())
      .post(base)
      .set('Authorization', auth)
      .send({ ...drawing, title: 'Site photo', documentType: 'photo', fileName: 'site.jpg', mimeType: 'image/jpeg' })
      .expect(201);
    await request(app.getHttpServer()).delete(`${base}/${created.body.id}`).set('Authorization', auth).expect(204);
    await request(app.getHttpServer()).delete(`${base}/${created.body.id}`).set('Authorization', auth).expect(404);
  });

  describe('quotas', () => {
    const defaults = { ...RATE_LIMITS };

    afterEach(() => {
      Object.assign(RATE_LIMITS, defaults);
    });

    it('rejects files over the size limit', async () => {
      RATE_LIMITS.DOC_MAX_SIZE_MB = 1;
      const res = await request(app.getHttpServer())
        .post(base)
        .set('Authorization', auth)
        .send({ ...drawing, sizeBytes: 2 * 1024 * 1024 })
        .expect(429);
      expect(res.body).toEqual({
        error: 'upload_limit_reached',
        message: 'File too large (2.0MB). Maximum is 1MB.',
        limits: { maxDocuments: 500, maxFileSizeMB: 1, maxStorageMB: 2048 },
      });
    });

    it('counts every document the tenant has registered', async () => {
      const quotaAuth = bearer('tenant-quota');
      const first = `/projects/${await createProject(quotaAuth, 'Q-1')}/documents`;
      const second = `/projects/${await createProject(quotaAuth, 'Q-2')}/documents`;
      RATE_LIMITS.DOCS_PER_TENANT_MAX = 1;

      await request(app.getHttpServer()).post(first).set('Authorization', quotaAuth).send(drawing).expect(201);
      const res = await request(app.getHttpServer())
        .post(second)
        .set('Authorization', quotaAuth)
        .send(drawing)
        .expect(429);
      expect(res.body.message).toBe(
        'Maximum documents reached (1). Delete some documents to register more.',
      );
    });

    it('rejects registrations past the storage quota', async () => {
      const storageAuth = bearer('tenant-storage');
      const path = `/projects/${await createProject(storageAuth, 'S-1')}/documents`;
      RATE_LIMITS.STORAGE_PER_TENANT_MB = 1;

      await request(app.getHttpServer())
        .post(path)
        .set('Authorization', storageAuth)
        .send({ ...drawing, sizeBytes: 768 * 1024 })
        .expect(201);
      const res = await request(app.getHttpServer())
        .post(path)
        .set('Authorization', storageAuth)
        .send({ ...drawing, sizeBytes: 512 * 1024 })
        .expect(429);
      expect(res.body.message).toBe('Storage limit reached (1MB). Delete some documents to free space.');
    });
  });
});
