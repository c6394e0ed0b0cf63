import request from 'supertest';
import { createApp } from '../../src/app';

describe('Error envelope + correlationId', () => {
  test('adds x-correlation-id to responses (generated)', async () => {
    const app = createApp();
    const res = await request(app).get('/health').expect(200);

    expect(res.headers['x-correlation-id']).toBeTruthy();
  });

  test('echoes x-correlation-id when provided', async () => {
    const app = createApp();
    const res = await request(app).get('/health').set('x-correlation-id', 'corr-xyz').expect(200);

    expect(res.headers['x-correlation-id']).toBe('corr-xyz');
  });

  test('falls back to correlation_id from the body', async () => {
    const app = createApp();
    const res = await request(app)
      .post('/nope')
      .send({ correlation_id: 'corr-body' })
      .expect(404);

    expect(res.headers['x-correlation-id']).toBe('corr-body');
    expect(res.body.error.correlationId).toBe('corr-body');
  });

  test('404 uses standard error envelope', async () => {
    const app = createApp();
    const res = await request(app).get('/nope').expect(404);

    expect(res.body.error.code).toBe('NOT_FOUND');
    expect(res.body.error.correlationId).toBeTruthy();
  });

  test('malformed JSON is answered with 400 INVALID_JSON', async () => {
    const app = createApp();
    const res = await request(app)
      .post('/nope')
      .set('content-type', 'application/json')
      .send('{"robot":')
      .expect(400);

    expect(res.body.error).toEqual({
      code: 'INVALID_JSON',
      message: 'Request body must be valid JSON.',
    });
  });
});
