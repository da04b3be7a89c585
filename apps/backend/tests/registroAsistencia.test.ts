// Pruebas del registro de asistencia con reevaluacion de alertas.
import { describe, expect, it } from 'vitest';
import { crearNucleoPrueba, IDS } from './utils/nucleoPrueba';

const DOCENTE = { usuarioId: IDS.docente, rol: 'docente' } as const;

describe('registro de asistencia', () => {
  it('cada escritura dispara una pasada del curso', async () => {
    const { nucleo, notificador } = crearNucleoPrueba();

    const { alertas } = await nucleo.registro.registrar(
      { alumnoId: IDS.beto, cursoId: IDS.curso, fecha: '2024-03-18', estado: 'ausente' },
      DOCENTE
    );

    expect(alertas).toMatchObject({ evaluados: 3, incumplimientos: 1, alertados: 1, sinDatos: 2 });
    expect(notificador.avisos).toEqual([
      { correo: 'beto.ruiz@escuela.test', nombreAlumno: 'Beto Ruiz', nombreCurso: 'Algebra', porcentaje: 0, umbral: 75 }
    ]);
  });

  it('el lote devuelve presentes, ausentes y el resumen de alertas', async () => {
    const { nucleo } = crearNucleoPrueba();

    const resultado = await nucleo.registro.registrarLote(
      { cursoId: IDS.curso, fecha: '2024-03-18', asistencias: { [IDS.ana]: true, [IDS.beto]: false } },
      DOCENTE
    );

    expect(resultado.presentes).toEqual([IDS.ana]);
    expect(resultado.ausentes).toEqual([IDS.beto]);
    expect(resultado.alertas).toMatchObject({ alertados: 1, sinDatos: 1 });
  });

  it('un docente no puede escribir en un curso ajeno', async () => {
    const { nucleo, almacenAsistencia } = crearNucleoPrueba();

    await expect(
      nucleo.registro.registrar(
        { alumnoId: IDS.ana, cursoId: IDS.curso, fecha: '2024-03-18', estado: 'presente' },
        { usuarioId: IDS.otroDocente, rol: 'docente' }
      )
    ).rejects.toMatchObject({ codigo: 'SIN_PERMISO', estadoHttp: 403 });
    expect(almacenAsistencia.registros.size).toBe(0);
  });

  it('un admin puede escribir en cualquier curso activo', async () => {
    const { nucleo, almacenAsistencia } = crearNucleoPrueba();

    await nucleo.registro.registrar(
      { alumnoId: IDS.ana, cursoId: IDS.curso, fecha: '2024-03-18', estado: 'presente' },
      { usuarioId: IDS.admin, rol: 'admin' }
    );
    expect(almacenAsistencia.registros.size).toBe(1);
  });

  it('no escribe en cursos inactivos', async () => {
    const { nucleo, almacenAsistencia } = crearNucleoPrueba();

    await expect(
      nucleo.registro.registrarLote({ cursoId: IDS.cursoInactivo, fecha: '2024-03-18', asistencias: { [IDS.ana]: true } })
    ).rejects.toMatchObject({ codigo: 'CURSO_NO_ENCONTRADO' });
    expect(almacenAsistencia.registros.size).toBe(0);
  });

  it('rechaza alumnos que no estan en el directorio', async () => {
    const { nucleo } = crearNucleoPrueba();

    await expect(
      nucleo.registro.registrar({ alumnoId: 'desconocido', cursoId: IDS.curso, fecha: '2024-03-18', estado: 'presente' })
    ).rejects.toMatchObject({ codigo: 'ALUMNO_NO_ENCONTRADO', estadoHttp: 404 });
  });
});
