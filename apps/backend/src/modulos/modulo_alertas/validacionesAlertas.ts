/**
 * Validaciones de alertas.
 */
import { z } from 'zod';
import { esquemaFechaCalendario, esquemaObjectId } from '../../compartido/validaciones/esquemas';

export const esquemaEjecutarPasada = z
  .object({
    cursoId: esquemaObjectId,
    desde: esquemaFechaCalendario.optional(),
    hasta: esquemaFechaCalendario.optional()
  })
  .strict()
  .superRefine((data, ctx) => {
    if (Boolean(data.desde) !== Boolean(data.hasta)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [data.desde ? 'hasta' : 'desde'],
        message: 'Se requieren desde y hasta juntos'
      });
    } else if (data.desde && data.hasta && data.desde > data.hasta) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['hasta'], message: 'hasta no puede ser anterior a desde' });
    }
  });

export const esquemaConsultaAlertas = z.object({ cursoId: esquemaObjectId });
