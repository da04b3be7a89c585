import request from 'supertest';
import { describe, expect, it, vi } from 'vitest';
import { restaurarEntorno } from './utils/entorno';

describe('rate limit', () => {
  it('responde 429 al exceder el limite', async () => {
    const anterior = {
      RATE_LIMIT_LIMIT: process.env.RATE_LIMIT_LIMIT,
      RATE_LIMIT_WINDOW_MS: process.env.RATE_LIMIT_WINDOW_MS
    };

    process.env.RATE_LIMIT_LIMIT = '2';
    process.env.RATE_LIMIT_WINDOW_MS = '60000';

    vi.resetModules();
    const { crearApp } = await import('../src/app');
    const { crearNucleoPrueba } = await import('./utils/nucleoPrueba');
    const app = crearApp(crearNucleoPrueba().nucleo);

    try {
      await request(app).get('/api/salud').expect(200);
      await request(app).get('/api/salud').expect(200);
      const respuesta = await request(app).get('/api/salud').expect(429);

      expect(respuesta.headers['retry-after']).toBeTruthy();
    } finally {
      restaurarEntorno(anterior);
      vi.resetModules();
    }
  });
});
