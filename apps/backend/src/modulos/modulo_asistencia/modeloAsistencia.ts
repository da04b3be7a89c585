/**
 * Modelo Asistencia: un registro por (alumno, curso, fecha).
 */
import { Schema } from 'mongoose';
import { obtenerModelo } from '../../infraestructura/baseDatos/mongoose';
import { ESTADOS_ASISTENCIA } from '../../compartido/tipos/dominio';

const AsistenciaSchema = new Schema(
  {
    alumnoId: { type: Schema.Types.ObjectId, ref: 'Usuario', required: true },
    cursoId: { type: Schema.Types.ObjectId, ref: 'Curso', required: true },
    // Fecha de calendario YYYY-MM-DD.
    fecha: { type: String, required: true },
    estado: { type: String, enum: [...ESTADOS_ASISTENCIA], required: true },
    observaciones: { type: String }
  },
  { timestamps: true, collection: 'asistencias' }
);

AsistenciaSchema.index({ alumnoId: 1, cursoId: 1, fecha: 1 }, { unique: true });
AsistenciaSchema.index({ cursoId: 1, fecha: 1 });

export const Asistencia = obtenerModelo('Asistencia', AsistenciaSchema);
