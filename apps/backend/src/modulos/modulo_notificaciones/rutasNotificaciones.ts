/**
 * Rutas de notificaciones. Cualquier rol autenticado, siempre sobre su propia bandeja.
 */
import { Router } from 'express';
import type { NucleoAsistencia } from '../../nucleo';
import { crearControladorNotificaciones } from './controladorNotificaciones';

export function crearRutasNotificaciones(nucleo: NucleoAsistencia) {
  const router = Router();
  const controlador = crearControladorNotificaciones(nucleo);

  router.get('/', controlador.listarNotificaciones);
  router.post('/leidas', controlador.marcarTodasLeidas);
  router.post('/:notificacionId/leida', controlador.marcarLeida);

  return router;
}
