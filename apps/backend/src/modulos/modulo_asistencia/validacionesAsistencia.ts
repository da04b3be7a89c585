/**
 * Validaciones de asistencia.
 */
import { z } from 'zod';
import { ESTADOS_ASISTENCIA } from '../../compartido/tipos/dominio';
import { esquemaFechaCalendario, esquemaObjectId, esquemaRangoFechas } from '../../compartido/validaciones/esquemas';
import { reconciliarListas } from './servicioLibroAsistencia';

export const esquemaRegistrarAsistencia = z
  .object({
    alumnoId: esquemaObjectId,
    cursoId: esquemaObjectId,
    fecha: esquemaFechaCalendario,
    estado: z.enum(ESTADOS_ASISTENCIA),
    observaciones: z.string().trim().max(500).optional(),
    motivo: z.string().trim().max(500).optional()
  })
  .strict();

const esquemaLoteMapa = z
  .object({
    cursoId: esquemaObjectId,
    fecha: esquemaFechaCalendario,
    asistencias: z.record(esquemaObjectId, z.boolean())
  })
  .strict();

// Forma de dos listas: roster completo + presentes.
const esquemaLoteListas = z
  .object({
    cursoId: esquemaObjectId,
    fecha: esquemaFechaCalendario,
    alumnos: z.array(esquemaObjectId),
    presentes: z.array(esquemaObjectId)
  })
  .strict()
  .transform(({ cursoId, fecha, alumnos, presentes }) => ({
    cursoId,
    fecha,
    asistencias: reconciliarListas(alumnos, presentes)
  }));

export const esquemaRegistrarLote = z.union([esquemaLoteMapa, esquemaLoteListas]);

export const esquemaConsultaAsistencias = z
  .object({
    alumnoId: esquemaObjectId,
    cursoId: esquemaObjectId
  })
  .and(esquemaRangoFechas);
