/**
 * Modelo AlertaAsistencia: idempotencia y auditoria de alertas por ventana.
 *
 * El indice unico (alumnoId, cursoId, claveVentana) es lo que garantiza a lo mas
 * una alerta por incumplimiento aun con pasadas concurrentes.
 */
import { Schema } from 'mongoose';
import { obtenerModelo } from '../../infraestructura/baseDatos/mongoose';

const AlertaAsistenciaSchema = new Schema(
  {
    alumnoId: { type: Schema.Types.ObjectId, ref: 'Usuario', required: true },
    cursoId: { type: Schema.Types.ObjectId, ref: 'Curso', required: true },
    claveVentana: { type: String, required: true },
    inicio: { type: String, required: true },
    fin: { type: String, required: true },
    estado: { type: String, enum: ['pendiente', 'enviada'], default: 'pendiente' },
    porcentaje: { type: Number },
    umbral: { type: Number },
    reservadoEn: { type: Date, required: true },
    enviadoEn: { type: Date }
  },
  { timestamps: true, collection: 'alertasAsistencia' }
);

AlertaAsistenciaSchema.index({ alumnoId: 1, cursoId: 1, claveVentana: 1 }, { unique: true });
AlertaAsistenciaSchema.index({ cursoId: 1, createdAt: -1 });

export const AlertaAsistencia = obtenerModelo('AlertaAsistencia', AlertaAsistenciaSchema);
