/**
 * Conexion a MongoDB con Mongoose.
 */
import mongoose, { model, models, type Schema } from 'mongoose';
import { configuracion } from '../../configuracion';
import { log, logError } from '../logging/logger';

export async function conectarBaseDatos() {
  if (!configuracion.mongoUri) {
    log('warn', 'MONGODB_URI no esta definido; se omite la conexion a MongoDB');
    return;
  }

  mongoose.set('strictQuery', true);

  try {
    await mongoose.connect(configuracion.mongoUri);
    log('ok', 'Conexion a MongoDB exitosa');
  } catch (error) {
    logError('Fallo la conexion a MongoDB', error);
    throw error;
  }
}

export async function desconectarBaseDatos() {
  await mongoose.disconnect();
}

/**
 * Compila el modelo, reemplazando uno previo con el mismo nombre (re-imports en pruebas o hot reload).
 */
export function obtenerModelo<TSchema extends Schema>(nombre: string, schema: TSchema) {
  if (models[nombre]) mongoose.deleteModel(nombre);
  return model(nombre, schema);
}

/**
 * Violacion de indice unico (E11000).
 */
export function esErrorDuplicado(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 11000;
}
