/**
 * Controlador de asistencia.
 */
import type { Response } from 'express';
import { parsearConsulta } from '../../compartido/validaciones/validar';
import type { NucleoAsistencia } from '../../nucleo';
import {
  exigirAccesoAlumno,
  obtenerContexto,
  type SolicitudAutenticada
} from '../modulo_autenticacion/middlewareAutenticacion';
import { esquemaConsultaAsistencias, esquemaRegistrarAsistencia, esquemaRegistrarLote } from './validacionesAsistencia';

export function crearControladorAsistencia(nucleo: NucleoAsistencia) {
  async function registrarAsistencia(req: SolicitudAutenticada, res: Response) {
    const contexto = obtenerContexto(req);
    const entrada = esquemaRegistrarAsistencia.parse(req.body);
    const { alertas } = await nucleo.registro.registrar(entrada, contexto);
    res.status(201).json({ ok: true, alertas });
  }

  async function registrarLote(req: SolicitudAutenticada, res: Response) {
    const contexto = obtenerContexto(req);
    const entrada = esquemaRegistrarLote.parse(req.body);
    const resultado = await nucleo.registro.registrarLote(entrada, contexto);
    res.status(201).json({ ok: true, ...resultado });
  }

  async function listarAsistencias(req: SolicitudAutenticada, res: Response) {
    const contexto = obtenerContexto(req);
    const consulta = parsearConsulta(esquemaConsultaAsistencias, req.query);
    exigirAccesoAlumno(contexto, consulta.alumnoId);

    const ventana = consulta.desde && consulta.hasta ? { inicio: consulta.desde, fin: consulta.hasta } : null;
    const registros = await nucleo.libro.obtenerRegistrosVentana(consulta.alumnoId, consulta.cursoId, ventana);
    res.json({ registros });
  }

  return { registrarAsistencia, registrarLote, listarAsistencias };
}
