// Pruebas de la pasada de alertas por curso.
import { describe, expect, it } from 'vitest';
import type { LibroAsistencia } from '../src/modulos/modulo_asistencia/servicioLibroAsistencia';
import { crearNotificadorFalso, crearNucleoPrueba, cursoPrueba, IDS } from './utils/nucleoPrueba';

const VENTANA = { inicio: '2024-03-05', fin: '2024-03-20' };

// Ana 3/4 (75%), Beto 1/4 (25%), Carla sin registros. El 2024-03-01 queda fuera de la ventana.
async function sembrar(libro: LibroAsistencia) {
  await libro.registrarAsistenciaLote(IDS.curso, '2024-03-01', { [IDS.ana]: false });
  await libro.registrarAsistenciaLote(IDS.curso, '2024-03-11', { [IDS.ana]: true, [IDS.beto]: true });
  await libro.registrarAsistenciaLote(IDS.curso, '2024-03-12', { [IDS.ana]: true, [IDS.beto]: false });
  await libro.registrarAsistenciaLote(IDS.curso, '2024-03-13', { [IDS.ana]: false, [IDS.beto]: false });
  await libro.registrarAsistenciaLote(IDS.curso, '2024-03-14', { [IDS.ana]: true, [IDS.beto]: false });
}

describe('orquestacion de alertas', () => {
  it('evalua a los alumnos activos y alerta solo a quien incumple', async () => {
    const { nucleo, notificador, almacenAlertas } = crearNucleoPrueba();
    await sembrar(nucleo.libro);

    const resumen = await nucleo.orquestador.ejecutarPasada({ cursoId: IDS.curso });

    expect(resumen).toEqual({
      cursoId: IDS.curso,
      ventana: VENTANA,
      claveVentana: '2024-03-05..2024-03-20',
      evaluados: 3,
      incumplimientos: 1,
      alertados: 1,
      duplicadosOmitidos: 0,
      fallidos: 0,
      sinDatos: 1,
      cancelado: false
    });
    expect(notificador.avisos.map((a) => a.nombreAlumno)).toEqual(['Beto Ruiz']);
    expect([...almacenAlertas.alertas.values()].map((a) => [a.alumnoId, a.estado])).toEqual([[IDS.beto, 'enviada']]);
  });

  it('una segunda pasada en la misma ventana no vuelve a notificar', async () => {
    const { nucleo, notificador } = crearNucleoPrueba();
    await sembrar(nucleo.libro);

    await nucleo.orquestador.ejecutarPasada({ cursoId: IDS.curso });
    const segunda = await nucleo.orquestador.ejecutarPasada({ cursoId: IDS.curso });

    expect(segunda).toMatchObject({ incumplimientos: 1, alertados: 0, duplicadosOmitidos: 1 });
    expect(notificador.enviar).toHaveBeenCalledTimes(1);
  });

  it('pasadas concurrentes sobre el mismo incumplimiento notifican una sola vez', async () => {
    const { nucleo, notificador } = crearNucleoPrueba({ latenciaAlertasMs: 5 });
    await sembrar(nucleo.libro);

    const [a, b] = await Promise.all([
      nucleo.orquestador.ejecutarPasada({ cursoId: IDS.curso }),
      nucleo.orquestador.ejecutarPasada({ cursoId: IDS.curso })
    ]);

    expect(notificador.enviar).toHaveBeenCalledTimes(1);
    expect(a.alertados + b.alertados).toBe(1);
    expect(a.duplicadosOmitidos + b.duplicadosOmitidos).toBe(1);
  });

  it('un fallo de envio no bloquea al resto ni envenena la deduplicacion', async () => {
    let carlaDisponible = false;
    const notificador = crearNotificadorFalso(async (aviso) => aviso.nombreAlumno !== 'Carla Diaz' || carlaDisponible);
    const { nucleo, almacenAlertas } = crearNucleoPrueba({ notificador });
    await sembrar(nucleo.libro);
    await nucleo.libro.registrarAsistenciaLote(IDS.curso, '2024-03-11', { [IDS.carla]: false });

    const primera = await nucleo.orquestador.ejecutarPasada({ cursoId: IDS.curso });
    expect(primera).toMatchObject({ incumplimientos: 2, alertados: 1, fallidos: 1, sinDatos: 0 });
    expect([...almacenAlertas.alertas.values()].map((a) => a.alumnoId)).toEqual([IDS.beto]);

    carlaDisponible = true;
    const segunda = await nucleo.orquestador.ejecutarPasada({ cursoId: IDS.curso });
    expect(segunda).toMatchObject({ alertados: 1, duplicadosOmitidos: 1, fallidos: 0 });
  });

  it('una ventana explicita es una llave distinta', async () => {
    const { nucleo, notificador } = crearNucleoPrueba();
    await sembrar(nucleo.libro);

    await nucleo.orquestador.ejecutarPasada({ cursoId: IDS.curso });
    const mensual = await nucleo.orquestador.ejecutarPasada({
      cursoId: IDS.curso,
      ventana: { inicio: '2024-03-01', fin: '2024-03-31' }
    });

    // En marzo completo Ana queda en 3/5 (60%).
    expect(mensual).toMatchObject({ claveVentana: '2024-03-01..2024-03-31', alertados: 2, duplicadosOmitidos: 0 });
    expect(notificador.enviar).toHaveBeenCalledTimes(3);
  });

  it('usa el umbral propio del curso', async () => {
    const { nucleo, notificador } = crearNucleoPrueba({ cursos: [cursoPrueba({ umbralAsistencia: 20 })] });
    await sembrar(nucleo.libro);

    const resumen = await nucleo.orquestador.ejecutarPasada({ cursoId: IDS.curso });

    expect(resumen).toMatchObject({ incumplimientos: 0, alertados: 0 });
    expect(notificador.enviar).not.toHaveBeenCalled();
  });

  it('rechaza cursos inexistentes o inactivos', async () => {
    const { nucleo } = crearNucleoPrueba();

    await expect(nucleo.orquestador.ejecutarPasada({ cursoId: IDS.cursoInactivo })).rejects.toMatchObject({
      codigo: 'CURSO_NO_ENCONTRADO',
      estadoHttp: 404
    });
    await expect(nucleo.orquestador.ejecutarPasada({ cursoId: 'no-existe' })).rejects.toMatchObject({
      codigo: 'CURSO_NO_ENCONTRADO'
    });
  });

  it('al cancelar conserva lo despachado y reporta la pasada como cancelada', async () => {
    const controlador = new AbortController();
    const notificador = crearNotificadorFalso(async () => {
      controlador.abort();
      return true;
    });
    const { nucleo } = crearNucleoPrueba({ notificador, opciones: { concurrencia: 1 } });
    await sembrar(nucleo.libro);

    const resumen = await nucleo.orquestador.ejecutarPasada({ cursoId: IDS.curso, senal: controlador.signal });

    expect(resumen).toMatchObject({ evaluados: 2, alertados: 1, cancelado: true });
  });
});
