/**
 * Validaciones de consultas de cumplimiento.
 */
import { z } from 'zod';
import { esquemaObjectId, esquemaRangoFechas } from '../../compartido/validaciones/esquemas';

export const esquemaParamsCurso = z.object({ cursoId: esquemaObjectId });

export const esquemaParamsCumplimiento = z.object({
  cursoId: esquemaObjectId,
  alumnoId: esquemaObjectId
});

export const esquemaConsultaRango = esquemaRangoFechas;
