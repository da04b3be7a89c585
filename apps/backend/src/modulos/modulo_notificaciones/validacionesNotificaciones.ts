/**
 * Validaciones de notificaciones.
 */
import { z } from 'zod';
import { esquemaObjectId } from '../../compartido/validaciones/esquemas';

export const esquemaConsultaNotificaciones = z.object({
  limite: z.coerce.number().int().min(1).max(100).default(10),
  soloNoLeidas: z
    .enum(['true', 'false'])
    .optional()
    .transform((valor) => valor === 'true')
});

export const esquemaParamsNotificacion = z.object({ notificacionId: esquemaObjectId });
