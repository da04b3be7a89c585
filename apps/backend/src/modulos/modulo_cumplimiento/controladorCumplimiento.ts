/**
 * Controlador de cumplimiento: resumen por curso e instantanea por alumno.
 */
import type { Response } from 'express';
import { ErrorNoEncontrado } from '../../compartido/errores/errorAplicacion';
import type { VentanaAsistencia } from '../../compartido/tipos/dominio';
import { parsearConsulta } from '../../compartido/validaciones/validar';
import type { NucleoAsistencia } from '../../nucleo';
import {
  exigirAccesoAlumno,
  exigirCursoDelDocente,
  obtenerContexto,
  type SolicitudAutenticada
} from '../modulo_autenticacion/middlewareAutenticacion';
import { evaluarCumplimiento, umbralEfectivo } from './evaluadorUmbral';
import { esquemaConsultaRango, esquemaParamsCumplimiento, esquemaParamsCurso } from './validacionesCumplimiento';

function ventanaDeConsulta(query: unknown): VentanaAsistencia | null {
  const { desde, hasta } = parsearConsulta(esquemaConsultaRango, query);
  return desde && hasta ? { inicio: desde, fin: hasta } : null;
}

export function crearControladorCumplimiento(nucleo: NucleoAsistencia) {
  async function resumenCurso(req: SolicitudAutenticada, res: Response) {
    const contexto = obtenerContexto(req);
    const { cursoId } = parsearConsulta(esquemaParamsCurso, req.params);
    const ventana = ventanaDeConsulta(req.query);

    const curso = await nucleo.directorio.obtenerCurso(cursoId);
    if (!curso) throw new ErrorNoEncontrado('CURSO_NO_ENCONTRADO', 'Curso no encontrado', { cursoId });
    exigirCursoDelDocente(curso, contexto);

    const resumen = await nucleo.agregador.calcularResumenCurso(cursoId, ventana);
    res.json({ resumen });
  }

  async function cumplimientoAlumno(req: SolicitudAutenticada, res: Response) {
    const contexto = obtenerContexto(req);
    const { cursoId, alumnoId } = parsearConsulta(esquemaParamsCumplimiento, req.params);
    exigirAccesoAlumno(contexto, alumnoId);
    const ventana = ventanaDeConsulta(req.query);

    const curso = await nucleo.directorio.obtenerCurso(cursoId);
    if (!curso) throw new ErrorNoEncontrado('CURSO_NO_ENCONTRADO', 'Curso no encontrado', { cursoId });

    const umbral = umbralEfectivo(curso, nucleo.opciones.umbralGlobal);
    const instantanea = await nucleo.agregador.calcularInstantanea(alumnoId, cursoId, ventana);
    res.json({ instantanea, veredicto: evaluarCumplimiento(instantanea, umbral), umbral });
  }

  return { resumenCurso, cumplimientoAlumno };
}
