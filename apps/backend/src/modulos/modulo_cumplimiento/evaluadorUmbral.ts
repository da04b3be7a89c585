import type { Veredicto } from '../../compartido/tipos/dominio';
import type { CursoDirectorio } from '../modulo_directorio/directorioAcademico';
import type { InstantaneaCumplimiento } from './servicioAgregacion';

/**
 * Un alumno sin clases registradas no "reprueba": queda sin medir.
 * Por debajo del umbral (estricto) incumple, incluso con 0 asistencias.
 */
export function evaluarCumplimiento(
  instantanea: Pick<InstantaneaCumplimiento, 'totalClases' | 'porcentaje'>,
  umbral: number
): Veredicto {
  if (instantanea.totalClases === 0 || instantanea.porcentaje === null) return 'sin_datos';
  return instantanea.porcentaje < umbral ? 'incumple' : 'cumple';
}

export function umbralEfectivo(curso: Pick<CursoDirectorio, 'umbralAsistencia'>, umbralGlobal: number): number {
  const propio = curso.umbralAsistencia;
  if (typeof propio === 'number' && Number.isFinite(propio) && propio >= 0 && propio <= 100) return propio;
  return umbralGlobal;
}
