/**
 * Rutas de alertas.
 */
import { Router } from 'express';
import { validarCuerpo } from '../../compartido/validaciones/validar';
import type { NucleoAsistencia } from '../../nucleo';
import { requerirRol } from '../modulo_autenticacion/middlewareAutenticacion';
import { crearControladorAlertas } from './controladorAlertas';
import { esquemaEjecutarPasada } from './validacionesAlertas';

export function crearRutasAlertas(nucleo: NucleoAsistencia) {
  const router = Router();
  const controlador = crearControladorAlertas(nucleo);

  router.use(requerirRol('admin', 'docente'));
  router.get('/', controlador.listarAlertas);
  router.post('/ejecutar', validarCuerpo(esquemaEjecutarPasada), controlador.ejecutarPasada);

  return router;
}
