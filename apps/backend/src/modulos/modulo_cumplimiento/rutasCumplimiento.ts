/**
 * Rutas de cumplimiento (montadas en /cursos).
 */
import { Router } from 'express';
import type { NucleoAsistencia } from '../../nucleo';
import { requerirRol } from '../modulo_autenticacion/middlewareAutenticacion';
import { crearControladorCumplimiento } from './controladorCumplimiento';

export function crearRutasCumplimiento(nucleo: NucleoAsistencia) {
  const router = Router();
  const controlador = crearControladorCumplimiento(nucleo);

  router.get('/:cursoId/resumen', requerirRol('admin', 'docente'), controlador.resumenCurso);
  router.get('/:cursoId/alumnos/:alumnoId/cumplimiento', controlador.cumplimientoAlumno);

  return router;
}
