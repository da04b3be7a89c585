/**
 * Bitacora de cambios de asistencia (auditoria).
 */
import { Schema } from 'mongoose';
import { obtenerModelo } from '../../infraestructura/baseDatos/mongoose';
import { ESTADOS_ASISTENCIA } from '../../compartido/tipos/dominio';

const BitacoraAsistenciaSchema = new Schema(
  {
    alumnoId: { type: Schema.Types.ObjectId, ref: 'Usuario', required: true },
    cursoId: { type: Schema.Types.ObjectId, ref: 'Curso', required: true },
    fecha: { type: String, required: true },
    estadoAnterior: { type: String, enum: [...ESTADOS_ASISTENCIA, null], default: null },
    estadoNuevo: { type: String, enum: [...ESTADOS_ASISTENCIA], required: true },
    cambiadoPor: { type: Schema.Types.ObjectId, ref: 'Usuario', default: null },
    motivo: { type: String }
  },
  { timestamps: true, collection: 'bitacoraAsistencias' }
);

BitacoraAsistenciaSchema.index({ cursoId: 1, fecha: 1, createdAt: -1 });

export const BitacoraAsistencia = obtenerModelo('BitacoraAsistencia', BitacoraAsistenciaSchema);
