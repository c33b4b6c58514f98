import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { createApp } from '../app.js';
import { createTestContext } from '../../../__tests__/helpers.js';

describe('API docs', () => {
  const limits = { windowMs: 60_000, max: 1000, loginMax: 1000 };

  it('should serve the OpenAPI document built from the route annotations', async () => {
    const app = createApp(createTestContext().services, { rateLimit: limits, healthTimeoutMs: 50 });

    const response = await request(app).get('/docs.json');

    expect(response.status).toBe(200);
    expect(response.body.openapi).toBe('3.0.0');
    expect(response.body.info.title).toBe('Insight Auth API');
    expect(Object.keys(response.body.paths)).toEqual(
      expect.arrayContaining(['/api/auth/login', '/api/admin/usage-stats'])
    );
  });

  it('should be absent when disabled', async () => {
    const app = createApp(createTestContext().services, {
      rateLimit: limits,
      healthTimeoutMs: 50,
      docs: false,
    });

    const response = await request(app).get('/docs.json');

    expect(response.status).toBe(404);
  });
});
