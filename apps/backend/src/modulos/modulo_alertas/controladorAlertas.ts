/**
 * Controlador de alertas: pasada manual y bitacora de envios por curso.
 */
import type { Response } from 'express';
import { ErrorNoEncontrado } from '../../compartido/errores/errorAplicacion';
import type { ContextoSolicitante } from '../../compartido/tipos/dominio';
import { parsearConsulta } from '../../compartido/validaciones/validar';
import type { NucleoAsistencia } from '../../nucleo';
import {
  exigirCursoDelDocente,
  obtenerContexto,
  type SolicitudAutenticada
} from '../modulo_autenticacion/middlewareAutenticacion';
import { esquemaConsultaAlertas, esquemaEjecutarPasada } from './validacionesAlertas';

export function crearControladorAlertas(nucleo: NucleoAsistencia) {
  async function cursoAccesible(cursoId: string, contexto: ContextoSolicitante) {
    const curso = await nucleo.directorio.obtenerCurso(cursoId);
    if (!curso) throw new ErrorNoEncontrado('CURSO_NO_ENCONTRADO', 'Curso no encontrado', { cursoId });
    exigirCursoDelDocente(curso, contexto);
    return curso;
  }

  async function ejecutarPasada(req: SolicitudAutenticada, res: Response) {
    const contexto = obtenerContexto(req);
    const { cursoId, desde, hasta } = esquemaEjecutarPasada.parse(req.body);

    await cursoAccesible(cursoId, contexto);

    const ventana = desde && hasta ? { inicio: desde, fin: hasta } : undefined;
    const resumen = await nucleo.orquestador.ejecutarPasada({ cursoId, ventana });
    res.json({ resumen });
  }

  async function listarAlertas(req: SolicitudAutenticada, res: Response) {
    const { cursoId } = parsearConsulta(esquemaConsultaAlertas, req.query);
    await cursoAccesible(cursoId, obtenerContexto(req));
    const alertas = await nucleo.almacenAlertas.listarPorCurso(cursoId);
    res.json({ alertas });
  }

  return { ejecutarPasada, listarAlertas };
}
