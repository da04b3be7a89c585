/**
 * Despacho de alertas: decide y entrega a lo mas una alerta por
 * (alumno, curso, ventana).
 *
 * Contrato:
 * - Si ya existe la alerta (o otra pasada la tiene reservada) -> `duplicado_omitido`, sin llamar al notificador.
 * - Si el notificador falla -> `fallido` y NO queda registro, para que una pasada posterior reintente.
 * - Si el notificador responde bien -> se confirma el registro, se deja la notificacion en la
 *   bandeja del alumno y `enviado`.
 *
 * Mientras el envio esta en curso la reserva se renueva cada tercio de `reservaExpiraMs`,
 * asi que otra pasada solo puede reclamarla si esta pasada dejo de existir.
 */
import { ErrorEnvio } from '../../compartido/errores/errorAplicacion';
import type { ResultadoDespacho, VentanaAsistencia } from '../../compartido/tipos/dominio';
import { claveVentana } from '../../compartido/utilidades/ventanas';
import { log, logError } from '../../infraestructura/logging/logger';
import type { Notificador } from '../../infraestructura/notificaciones/notificadorWebhook';
import type { InstantaneaCumplimiento } from '../modulo_cumplimiento/servicioAgregacion';
import type { AlumnoDirectorio, CursoDirectorio } from '../modulo_directorio/directorioAcademico';
import type { AlmacenNotificaciones } from '../modulo_notificaciones/almacenNotificaciones';
import type { AlmacenAlertas, ClaveAlerta, TokenReserva } from './almacenAlertas';

export type SolicitudDespacho = {
  alumno: AlumnoDirectorio;
  curso: CursoDirectorio;
  ventana: VentanaAsistencia;
  instantanea: InstantaneaCumplimiento & { porcentaje: number };
  umbral: number;
};

export type Despachador = {
  despachar(solicitud: SolicitudDespacho): Promise<ResultadoDespacho>;
};

export type DependenciasDespachador = {
  almacen: AlmacenAlertas;
  notificador: Notificador;
  notificaciones: AlmacenNotificaciones;
  reservaExpiraMs: number;
  reloj?: () => Date;
};

type Renovacion = {
  /** Detiene la renovacion y devuelve el token vigente, o `null` si se perdio la reserva. */
  detener(): Promise<TokenReserva | null>;
};

export function crearDespachador({
  almacen,
  notificador,
  notificaciones,
  reservaExpiraMs,
  reloj = () => new Date()
}: DependenciasDespachador): Despachador {
  const intervaloRenovacionMs = Math.max(1, Math.floor(reservaExpiraMs / 3));

  function mantenerReserva(clave: ClaveAlerta, reserva: TokenReserva): Renovacion {
    let token: TokenReserva | null = reserva;
    let enCurso: Promise<void> = Promise.resolve();

    const temporizador = setInterval(() => {
      enCurso = enCurso
        .then(async () => {
          if (!token) return;
          token = await almacen.renovar(clave, token, reloj());
          if (!token) log('warn', 'Se perdio la reserva de alerta durante el envio', { ...clave });
        })
        .catch((error: unknown) => {
          logError('No se pudo renovar la reserva de alerta', error, clave);
        });
    }, intervaloRenovacionMs);

    return {
      async detener() {
        clearInterval(temporizador);
        await enCurso;
        return token;
      }
    };
  }

  async function notificar(solicitud: SolicitudDespacho, clave: ClaveAlerta): Promise<boolean> {
    const { alumno, curso, instantanea, umbral } = solicitud;
    try {
      const aceptado = await notificador.enviar({
        correo: alumno.correo,
        nombreAlumno: alumno.nombreCompleto,
        nombreCurso: curso.nombre,
        porcentaje: instantanea.porcentaje,
        umbral
      });
      if (!aceptado) {
        logError('No se pudo enviar la alerta de asistencia', new ErrorEnvio('El notificador no acepto el aviso'), clave);
      }
      return aceptado;
    } catch (error) {
      logError('No se pudo enviar la alerta de asistencia', error, clave);
      return false;
    }
  }

  async function dejarEnBandeja(solicitud: SolicitudDespacho, clave: ClaveAlerta) {
    const { alumno, curso, instantanea, umbral } = solicitud;
    try {
      await notificaciones.crear({
        usuarioId: alumno.id,
        titulo: 'Alerta de asistencia baja',
        mensaje: `Tu asistencia en ${curso.nombre} es de ${instantanea.porcentaje.toFixed(2)}% (por debajo del ${umbral}%)`,
        tipo: 'alerta_asistencia'
      });
    } catch (error) {
      // El correo ya salio y la alerta quedo confirmada; la bandeja no revierte eso.
      logError('No se pudo guardar la notificacion de la alerta', error, clave);
    }
  }

  return {
    async despachar(solicitud) {
      const { alumno, curso, ventana, instantanea, umbral } = solicitud;
      const clave: ClaveAlerta = { alumnoId: alumno.id, cursoId: curso.id, claveVentana: claveVentana(ventana) };

      const ahora = reloj();
      const reserva = await almacen.reservar(clave, ventana, ahora, new Date(ahora.getTime() - reservaExpiraMs));
      if (!reserva) {
        log('info', 'Alerta ya registrada para la ventana; se omite', { ...clave });
        return 'duplicado_omitido';
      }

      const renovacion = mantenerReserva(clave, reserva);
      const enviado = await notificar(solicitud, clave);
      const token = await renovacion.detener();

      if (!enviado) {
        if (token) await almacen.liberar(clave, token);
        return 'fallido';
      }

      const confirmada =
        token !== null &&
        (await almacen.confirmar(clave, token, { porcentaje: instantanea.porcentaje, umbral, enviadoEn: reloj() }));
      if (!confirmada) {
        log('warn', 'Alerta enviada sin reserva vigente; no se confirma el registro', { ...clave });
      }

      await dejarEnBandeja(solicitud, clave);
      log('ok', 'Alerta de asistencia enviada', { ...clave, porcentaje: instantanea.porcentaje, umbral });
      return 'enviado';
    }
  };
}
