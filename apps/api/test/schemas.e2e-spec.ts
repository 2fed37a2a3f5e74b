import { INestApplication } from '@nestjs/common';
import request from 'supertest';

import { bearer, createTestApp } from './utils';

describe('Schemas E2E', () => {
  let app: INestApplication;

  beforeAll(async () => {
    app = await createTestApp();
  });

  afterAll(async () => {
    await app.close();
  });

  it('GET /schemas/rfi returns the RFI schema', async () => {
    const res = await request(app.getHttpServer()).get('/schemas/rfi').expect(200);
    expect(res.body.title).toBe('RequestForInformation');
    expect(res.body.properties.priority.default).toBe('medium');
  });

  it('serves the BIM element and cost item schemas', async () => {
    const bim = await request(app.getHttpServer()).get('/schemas/bim-element').expect(200);
    expect(bim.body.title).toBe('BimElement');

    const cost = await request(app.getHttpServer()).get('/schemas/cost-item').expect(200);
    expect(cost.body.title).toBe('BudgetLineItem');
  });

  it('answers 404 for an unknown docType', async () => {
    await request(app.getHttpServer()).get('/schemas/submittal').expect(404);
  });

  it('lists the CSI divisions for authenticated clients', async () => {
    await request(app.getHttpServer()).get('/csi-divisions').expect(401);

    const res = await request(app.getHttpServer())
      .get('/csi-divisions')
      .set('Authorization', bearer('tenant-a'))
      .expect(200);
    expect(res.body).toContainEqual({ code: '23', name: 'Heating, Ventilating, and Air Conditioning (HVAC)' });
  });
});
