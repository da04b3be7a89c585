/**
 * Notificador de alertas de asistencia via relay HTTP de correo.
 *
 * El transporte (SMTP, plantillas, reintentos de red) vive del otro lado del relay;
 * aqui solo se decide el contenido y se reporta exito/fallo.
 */
import { ErrorEnvio } from '../../compartido/errores/errorAplicacion';
import { log } from '../logging/logger';

export type AvisoAsistencia = {
  correo: string;
  nombreAlumno: string;
  nombreCurso: string;
  porcentaje: number;
  umbral: number;
};

export interface Notificador {
  /**
   * `true` si el aviso fue aceptado. `false` o una excepcion cuentan como fallo.
   */
  enviar(aviso: AvisoAsistencia): Promise<boolean>;
}

type OpcionesNotificadorWebhook = {
  url: string;
  apiKey: string;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
};

export function redactarAviso(aviso: AvisoAsistencia) {
  const porcentaje = aviso.porcentaje.toFixed(2);
  return {
    asunto: `Alerta de asistencia baja: ${aviso.nombreCurso}`,
    mensaje:
      `Hola ${aviso.nombreAlumno}, tu asistencia en ${aviso.nombreCurso} es de ${porcentaje}%, ` +
      `por debajo del ${aviso.umbral}% requerido. Comunicate con tu docente o tutor.`
  };
}

export function crearNotificadorWebhook({
  url,
  apiKey,
  fetchImpl = fetch,
  timeoutMs = 10_000
}: OpcionesNotificadorWebhook): Notificador {
  return {
    async enviar(aviso) {
      if (!url) {
        log('warn', 'Notificador no configurado; se omite el envio', { correo: aviso.correo });
        return false;
      }

      const { asunto, mensaje } = redactarAviso(aviso);
      const respuesta = await fetchImpl(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-api-key': apiKey
        },
        body: JSON.stringify({
          destinatario: aviso.correo,
          asunto,
          mensaje,
          datos: {
            curso: aviso.nombreCurso,
            porcentaje: Number(aviso.porcentaje.toFixed(2)),
            umbral: aviso.umbral
          }
        }),
        signal: AbortSignal.timeout(timeoutMs)
      });

      if (!respuesta.ok) {
        // Se descarta el cuerpo para liberar la conexion.
        await respuesta.body?.cancel();
        throw new ErrorEnvio('El relay de correo rechazo el aviso', { status: respuesta.status });
      }
      return true;
    }
  };
}
