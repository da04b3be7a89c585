/**
 * Controlador de notificaciones: bandeja propia del usuario autenticado.
 */
import type { Response } from 'express';
import { ErrorNoEncontrado } from '../../compartido/errores/errorAplicacion';
import { parsearConsulta } from '../../compartido/validaciones/validar';
import type { NucleoAsistencia } from '../../nucleo';
import { obtenerContexto, type SolicitudAutenticada } from '../modulo_autenticacion/middlewareAutenticacion';
import { esquemaConsultaNotificaciones, esquemaParamsNotificacion } from './validacionesNotificaciones';

export function crearControladorNotificaciones(nucleo: NucleoAsistencia) {
  async function listarNotificaciones(req: SolicitudAutenticada, res: Response) {
    const { usuarioId } = obtenerContexto(req);
    const consulta = parsearConsulta(esquemaConsultaNotificaciones, req.query);
    const notificaciones = await nucleo.almacenNotificaciones.listarPorUsuario(usuarioId, consulta);
    res.json({ notificaciones });
  }

  async function marcarLeida(req: SolicitudAutenticada, res: Response) {
    const { usuarioId } = obtenerContexto(req);
    const { notificacionId } = parsearConsulta(esquemaParamsNotificacion, req.params);
    const marcada = await nucleo.almacenNotificaciones.marcarLeida(notificacionId, usuarioId, nucleo.opciones.reloj());
    if (!marcada) {
      throw new ErrorNoEncontrado('NOTIFICACION_NO_ENCONTRADA', 'Notificacion no encontrada', { notificacionId });
    }
    res.json({ ok: true });
  }

  async function marcarTodasLeidas(req: SolicitudAutenticada, res: Response) {
    const { usuarioId } = obtenerContexto(req);
    const marcadas = await nucleo.almacenNotificaciones.marcarTodasLeidas(usuarioId, nucleo.opciones.reloj());
    res.json({ ok: true, marcadas });
  }

  return { listarNotificaciones, marcarLeida, marcarTodasLeidas };
}
