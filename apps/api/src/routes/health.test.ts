import { describe, it, expect, beforeEach } from 'vitest';
import { Hono } from 'hono';
import { createCatalog } from '@marketdesk/catalog';
import type { HealthStatus } from '@marketdesk/types';
import { createHealthRouter } from './health';

describe('Health Routes', () => {
  let app: Hono;

  beforeEach(() => {
    const catalog = createCatalog({
      asOf: '2026-10-16',
      currency: 'INR',
      indices: [],
      stocks: [],
      startups: [],
    });
    app = new Hono();
    app.route('/health', createHealthRouter(catalog));
  });

  describe('GET /health', () => {
    it('should report ok with the catalog size', async () => {
      const res = await app.request('/health');

      expect(res.status).toBe(200);
      const body = (await res.json()) as HealthStatus;
      expect(body).toMatchObject({
        status: 'ok',
        catalog: { asOf: '2026-10-16', stocks: 0, startups: 0 },
      });
      expect(typeof body.uptime).toBe('number');
    });
  });
});
