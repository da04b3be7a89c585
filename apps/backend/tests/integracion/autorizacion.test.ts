import request from 'supertest';
import { describe, expect, it } from 'vitest';
import { crearApp } from '../../src/app';
import { crearNucleoPrueba, IDS } from '../utils/nucleoPrueba';
import { tokenDocentePrueba, tokenPrueba } from '../utils/token';

describe('autorizacion', () => {
  const app = crearApp(crearNucleoPrueba().nucleo);

  it('rechaza rutas protegidas sin token', async () => {
    const respuesta = await request(app).get('/api/alertas').expect(401);
    expect(respuesta.body.error.codigo).toBe('NO_AUTORIZADO');
  });

  it('rechaza token invalido', async () => {
    const respuesta = await request(app)
      .get('/api/alertas')
      .set({ Authorization: 'Bearer token-invalido' })
      .expect(401);
    expect(respuesta.body.error.codigo).toBe('TOKEN_INVALIDO');
  });

  it('un alumno no puede registrar asistencia ni ejecutar pasadas', async () => {
    const token = tokenPrueba('alumno', IDS.ana);

    const registro = await request(app)
      .post('/api/asistencias')
      .set({ Authorization: `Bearer ${token}` })
      .send({ alumnoId: IDS.ana, cursoId: IDS.curso, fecha: '2024-03-18', estado: 'presente' })
      .expect(403);
    expect(registro.body.error.codigo).toBe('SIN_PERMISO');

    await request(app)
      .post('/api/alertas/ejecutar')
      .set({ Authorization: `Bearer ${token}` })
      .send({ cursoId: IDS.curso })
      .expect(403);
  });

  it('un alumno solo consulta su propia asistencia', async () => {
    const token = tokenPrueba('alumno', IDS.ana);

    await request(app)
      .get('/api/asistencias')
      .query({ alumnoId: IDS.ana, cursoId: IDS.curso })
      .set({ Authorization: `Bearer ${token}` })
      .expect(200);

    const ajena = await request(app)
      .get(`/api/cursos/${IDS.curso}/alumnos/${IDS.beto}/cumplimiento`)
      .set({ Authorization: `Bearer ${token}` })
      .expect(403);
    expect(ajena.body.error.codigo).toBe('SIN_PERMISO');
  });

  it('el resumen de curso es solo para personal', async () => {
    await request(app)
      .get(`/api/cursos/${IDS.curso}/resumen`)
      .set({ Authorization: `Bearer ${tokenPrueba('alumno', IDS.ana)}` })
      .expect(403);
  });

  it('un docente no lee el resumen ni las alertas de un curso ajeno', async () => {
    const ajeno = { Authorization: `Bearer ${tokenDocentePrueba(IDS.otroDocente)}` };

    const resumen = await request(app).get(`/api/cursos/${IDS.curso}/resumen`).set(ajeno).expect(403);
    expect(resumen.body.error.codigo).toBe('SIN_PERMISO');

    const alertas = await request(app).get('/api/alertas').query({ cursoId: IDS.curso }).set(ajeno).expect(403);
    expect(alertas.body.error.codigo).toBe('SIN_PERMISO');

    await request(app)
      .get('/api/alertas')
      .query({ cursoId: IDS.curso })
      .set({ Authorization: `Bearer ${tokenDocentePrueba()}` })
      .expect(200);
  });

  it('el resumen de un curso inexistente responde 404', async () => {
    const respuesta = await request(app)
      .get('/api/cursos/64c0000000000000000000ff/resumen')
      .set({ Authorization: `Bearer ${tokenDocentePrueba()}` })
      .expect(404);
    expect(respuesta.body.error.codigo).toBe('CURSO_NO_ENCONTRADO');
  });
});
