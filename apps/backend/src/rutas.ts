/**
 * Router raiz del API. Todo salvo /salud requiere usuario autenticado.
 */
import { Router } from 'express';
import rutasSalud from './compartido/salud/rutasSalud';
import type { NucleoAsistencia } from './nucleo';
import { crearRutasAlertas } from './modulos/modulo_alertas/rutasAlertas';
import { crearRutasAsistencia } from './modulos/modulo_asistencia/rutasAsistencia';
import { requerirUsuario } from './modulos/modulo_autenticacion/middlewareAutenticacion';
import { crearRutasCumplimiento } from './modulos/modulo_cumplimiento/rutasCumplimiento';
import { crearRutasNotificaciones } from './modulos/modulo_notificaciones/rutasNotificaciones';

export function crearRouterApi(nucleo: NucleoAsistencia) {
  const router = Router();

  router.use('/salud', rutasSalud);

  router.use(requerirUsuario);
  router.use('/asistencias', crearRutasAsistencia(nucleo));
  router.use('/cursos', crearRutasCumplimiento(nucleo));
  router.use('/alertas', crearRutasAlertas(nucleo));
  router.use('/notificaciones', crearRutasNotificaciones(nucleo));

  return router;
}
