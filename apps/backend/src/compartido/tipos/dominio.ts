/**
 * Tipos compartidos del dominio.
 */
export const ROLES = ['admin', 'docente', 'alumno'] as const;
export const ESTADOS_ASISTENCIA = ['presente', 'ausente'] as const;

export type Rol = (typeof ROLES)[number];
export type EstadoAsistencia = (typeof ESTADOS_ASISTENCIA)[number];
export type Veredicto = 'cumple' | 'incumple' | 'sin_datos';
export type ResultadoDespacho = 'enviado' | 'duplicado_omitido' | 'fallido';
export type EstadoAlerta = 'pendiente' | 'enviada';

/**
 * Rango de fechas de calendario `YYYY-MM-DD`, inclusivo en ambos extremos.
 */
export type VentanaAsistencia = {
  inicio: string;
  fin: string;
};

export type PoliticaVentana = { modo: 'fija'; inicio: string; fin: string } | { modo: 'movil'; dias: number };

/**
 * Quien ejecuta la operacion. Lo construye la capa externa (rutas, tareas programadas).
 */
export type ContextoSolicitante = {
  usuarioId: string;
  rol: Rol;
};

export function esEstadoAsistencia(valor: unknown): valor is EstadoAsistencia {
  return ESTADOS_ASISTENCIA.some((estado) => estado === valor);
}
