// Pruebas del notificador via relay HTTP.
import { describe, expect, it, vi } from 'vitest';
import { ErrorEnvio } from '../src/compartido/errores/errorAplicacion';
import { crearNotificadorWebhook, redactarAviso } from '../src/infraestructura/notificaciones/notificadorWebhook';

const AVISO = {
  correo: 'ana.lopez@escuela.test',
  nombreAlumno: 'Ana Lopez',
  nombreCurso: 'Algebra',
  porcentaje: 200 / 3,
  umbral: 75
};

function crearFetchFalso(status: number) {
  return vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => new Response(null, { status }));
}

describe('notificador webhook', () => {
  it('redacta asunto y mensaje con el porcentaje a dos decimales', () => {
    expect(redactarAviso(AVISO)).toEqual({
      asunto: 'Alerta de asistencia baja: Algebra',
      mensaje:
        'Hola Ana Lopez, tu asistencia en Algebra es de 66.67%, por debajo del 75% requerido. ' +
        'Comunicate con tu docente o tutor.'
    });
  });

  it('publica el aviso al relay con la api key', async () => {
    const fetchImpl = crearFetchFalso(202);
    const notificador = crearNotificadorWebhook({ url: 'http://relay.test/enviar', apiKey: 'test-secret', fetchImpl });

    await expect(notificador.enviar(AVISO)).resolves.toBe(true);

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe('http://relay.test/enviar');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', 'x-api-key': 'test-secret' });
    expect(JSON.parse(String(init?.body))).toEqual({
      destinatario: 'ana.lopez@escuela.test',
      asunto: 'Alerta de asistencia baja: Algebra',
      mensaje:
        'Hola Ana Lopez, tu asistencia en Algebra es de 66.67%, por debajo del 75% requerido. ' +
        'Comunicate con tu docente o tutor.',
      datos: { curso: 'Algebra', porcentaje: 66.67, umbral: 75 }
    });
  });

  it('sin url configurada reporta fallo sin llamar a la red', async () => {
    const fetchImpl = crearFetchFalso(200);
    const notificador = crearNotificadorWebhook({ url: '', apiKey: '', fetchImpl });

    await expect(notificador.enviar(AVISO)).resolves.toBe(false);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('una respuesta no exitosa lanza ErrorEnvio con el status', async () => {
    const notificador = crearNotificadorWebhook({
      url: 'http://relay.test/enviar',
      apiKey: 'test-secret',
      fetchImpl: crearFetchFalso(503)
    });

    const error = await notificador.enviar(AVISO).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ErrorEnvio);
    expect(error).toMatchObject({ codigo: 'ENVIO_FALLIDO', detalles: { status: 503 } });
  });

  it('descarta el cuerpo de una respuesta de error antes de lanzar', async () => {
    const respuesta = new Response('relay saturado', { status: 503 });
    const cuerpo = respuesta.body;
    if (!cuerpo) throw new Error('La respuesta de prueba debe traer cuerpo');
    const cancelar = vi.spyOn(cuerpo, 'cancel');
    const notificador = crearNotificadorWebhook({
      url: 'http://relay.test/enviar',
      apiKey: 'test-secret',
      fetchImpl: vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => respuesta)
    });

    await expect(notificador.enviar(AVISO)).rejects.toBeInstanceOf(ErrorEnvio);
    expect(cancelar).toHaveBeenCalledTimes(1);
  });

  it('usa el plazo configurado para abortar la peticion', async () => {
    const timeout = vi.spyOn(AbortSignal, 'timeout');
    const notificador = crearNotificadorWebhook({
      url: 'http://relay.test/enviar',
      apiKey: 'test-secret',
      fetchImpl: crearFetchFalso(202),
      timeoutMs: 2_500
    });

    await notificador.enviar(AVISO);
    expect(timeout).toHaveBeenCalledWith(2_500);
    timeout.mockRestore();
  });
});
