import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { buildTestApp } from '../helpers/build-test-app';

const HealthResponseSchema = z.object({
  ok: z.boolean(),
  env: z.string(),
  service: z.string(),
  requestId: z.string(),
});

type HealthResponse = z.infer<typeof HealthResponseSchema>;

describe('GET /health', () => {
  it('returns ok payload with a requestId', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(200);

      const parsed: HealthResponse = HealthResponseSchema.parse(res.json());

      expect(parsed.ok).toBe(true);
      expect(parsed.env).toBe('test');
      expect(parsed.service).toBe('squadlink-backend');
      expect(parsed.requestId).toMatch(/^[0-9a-f-]{36}$/);
    } finally {
      await close();
    }
  });
});
