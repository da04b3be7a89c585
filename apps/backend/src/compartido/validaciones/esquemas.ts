/**
 * Esquemas Zod reutilizables.
 */
import { z } from 'zod';
import { esFechaCalendarioValida } from '../utilidades/fechas';

export const esquemaObjectId = z.string().regex(/^[a-f\d]{24}$/i, 'Id invalido');

export const esquemaFechaCalendario = z
  .string()
  .trim()
  .refine((valor) => esFechaCalendarioValida(valor), 'Fecha invalida (YYYY-MM-DD)');

/**
 * `desde`/`hasta` opcionales; si llega uno debe llegar el otro.
 */
export const esquemaRangoFechas = z
  .object({
    desde: esquemaFechaCalendario.optional(),
    hasta: esquemaFechaCalendario.optional()
  })
  .superRefine((data, ctx) => {
    if (Boolean(data.desde) !== Boolean(data.hasta)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [data.desde ? 'hasta' : 'desde'],
        message: 'Se requieren desde y hasta juntos'
      });
      return;
    }
    if (data.desde && data.hasta && data.desde > data.hasta) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['hasta'],
        message: 'hasta no puede ser anterior a desde'
      });
    }
  });
