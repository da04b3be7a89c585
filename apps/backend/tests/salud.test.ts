import request from 'supertest';
import { describe, expect, it } from 'vitest';
import { crearApp } from '../src/app';
import { crearNucleoPrueba } from './utils/nucleoPrueba';

describe('salud', () => {
  it('responde con estado ok y metadata de DB sin requerir token', async () => {
    const app = crearApp(crearNucleoPrueba().nucleo);
    const respuesta = await request(app).get('/api/salud').expect(200);

    expect(respuesta.body.estado).toBe('ok');
    expect(respuesta.body.db).toEqual({ estado: 0, descripcion: 'desconectado' });
  });
});
