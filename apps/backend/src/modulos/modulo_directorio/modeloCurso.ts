/**
 * Modelo Curso.
 */
import { Schema } from 'mongoose';
import { obtenerModelo } from '../../infraestructura/baseDatos/mongoose';

const CursoSchema = new Schema(
  {
    nombre: { type: String, required: true, unique: true, trim: true },
    codigo: { type: String },
    docenteId: { type: Schema.Types.ObjectId, ref: 'Usuario', default: null },
    // Si no se define, aplica el umbral global.
    umbralAsistencia: { type: Number, min: 0, max: 100 },
    activo: { type: Boolean, default: true }
  },
  { timestamps: true, collection: 'cursos' }
);

export const Curso = obtenerModelo('Curso', CursoSchema);
