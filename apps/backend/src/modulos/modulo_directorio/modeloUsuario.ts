/**
 * Modelo Usuario (admin, docente o alumno).
 *
 * La identidad la administra otro sistema; este backend solo la lee.
 */
import { Schema } from 'mongoose';
import { obtenerModelo } from '../../infraestructura/baseDatos/mongoose';
import { ROLES } from '../../compartido/tipos/dominio';

const UsuarioSchema = new Schema(
  {
    nombreCompleto: { type: String, required: true },
    correo: { type: String, required: true, unique: true, lowercase: true },
    rol: { type: String, enum: [...ROLES], required: true },
    activo: { type: Boolean, default: true }
  },
  { timestamps: true, collection: 'usuarios' }
);

UsuarioSchema.index({ rol: 1, activo: 1 });

export const Usuario = obtenerModelo('Usuario', UsuarioSchema);
