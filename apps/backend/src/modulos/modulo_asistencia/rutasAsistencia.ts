/**
 * Rutas de asistencia.
 */
import { Router } from 'express';
import { validarCuerpo } from '../../compartido/validaciones/validar';
import type { NucleoAsistencia } from '../../nucleo';
import { requerirRol } from '../modulo_autenticacion/middlewareAutenticacion';
import { crearControladorAsistencia } from './controladorAsistencia';
import { esquemaRegistrarAsistencia, esquemaRegistrarLote } from './validacionesAsistencia';

export function crearRutasAsistencia(nucleo: NucleoAsistencia) {
  const router = Router();
  const controlador = crearControladorAsistencia(nucleo);

  router.get('/', controlador.listarAsistencias);
  router.post(
    '/',
    requerirRol('admin', 'docente'),
    validarCuerpo(esquemaRegistrarAsistencia),
    controlador.registrarAsistencia
  );
  router.post('/lote', requerirRol('admin', 'docente'), validarCuerpo(esquemaRegistrarLote), controlador.registrarLote);

  return router;
}
