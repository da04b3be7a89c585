/**
 * Notificaciones dentro de la aplicacion (bandeja por usuario).
 */
import { Schema } from 'mongoose';
import { obtenerModelo } from '../../infraestructura/baseDatos/mongoose';

export const TIPOS_NOTIFICACION = ['alerta_asistencia', 'sistema', 'info'] as const;

const NotificacionSchema = new Schema(
  {
    usuarioId: { type: Schema.Types.ObjectId, ref: 'Usuario', required: true },
    titulo: { type: String, required: true, maxlength: 200 },
    mensaje: { type: String, required: true },
    tipo: { type: String, enum: [...TIPOS_NOTIFICACION], default: 'info' },
    leida: { type: Boolean, default: false },
    leidaEn: { type: Date }
  },
  { timestamps: true, collection: 'notificaciones' }
);

NotificacionSchema.index({ usuarioId: 1, createdAt: -1 });
NotificacionSchema.index({ usuarioId: 1, leida: 1 });

export const Notificacion = obtenerModelo('Notificacion', NotificacionSchema);
