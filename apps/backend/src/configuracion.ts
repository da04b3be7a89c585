/**
 * Configuracion centralizada del backend de asistencia.
 */
import dotenv from 'dotenv';
import { esFechaCalendarioValida } from './compartido/utilidades/fechas';
import type { PoliticaVentana } from './compartido/tipos/dominio';

// Dotenv v17 puede emitir logs informativos; se silencian para mantener
// pruebas y consola limpias.
dotenv.config({ quiet: true });

const puerto = Number(process.env.PUERTO_API ?? process.env.PORT ?? 4000);
const mongoUri = process.env.MONGODB_URI ?? process.env.MONGO_URI ?? '';
const entorno = process.env.NODE_ENV ?? 'development';
const limiteJson = process.env.LIMITE_JSON ?? '1mb';
const corsOrigenes = (process.env.CORS_ORIGENES ?? 'http://localhost:5173')
  .split(',')
  .map((origen) => origen.trim())
  .filter(Boolean);

export function parsearNumeroSeguro(
  valor: unknown,
  porDefecto: number,
  { min, max }: { min?: number; max?: number } = {}
) {
  if (valor === undefined || valor === null || valor === '') return porDefecto;
  const n = typeof valor === 'number' ? valor : Number(valor);
  if (!Number.isFinite(n)) return porDefecto;
  const clampedMax = typeof max === 'number' ? Math.min(max, n) : n;
  const clamped = typeof min === 'number' ? Math.max(min, clampedMax) : clampedMax;
  return clamped;
}

/**
 * Ventana de alertas: fija si se definen ambos literales, movil (ultimos N dias) en otro caso.
 */
export function parsearPoliticaVentana(entorno: NodeJS.ProcessEnv): PoliticaVentana {
  const inicio = String(entorno.ALERTAS_VENTANA_INICIO ?? '').trim();
  const fin = String(entorno.ALERTAS_VENTANA_FIN ?? '').trim();

  if (inicio || fin) {
    if (!esFechaCalendarioValida(inicio) || !esFechaCalendarioValida(fin)) {
      throw new Error('ALERTAS_VENTANA_INICIO y ALERTAS_VENTANA_FIN deben ser fechas YYYY-MM-DD');
    }
    if (inicio > fin) {
      throw new Error('ALERTAS_VENTANA_INICIO no puede ser posterior a ALERTAS_VENTANA_FIN');
    }
    return { modo: 'fija', inicio, fin };
  }

  const dias = Math.trunc(parsearNumeroSeguro(entorno.ALERTAS_VENTANA_DIAS, 15, { min: 1, max: 366 }));
  return { modo: 'movil', dias };
}

/**
 * Plazo del notificador y vencimiento de reservas de alerta. La reserva nunca
 * vence antes de `3 x` el plazo del notificador: un envio en curso no puede
 * quedar sin duenio mientras el relay aun puede aceptarlo.
 */
export function parsearPlazosAlertas(entorno: NodeJS.ProcessEnv) {
  const notificadorTimeoutMs = Math.trunc(
    parsearNumeroSeguro(entorno.NOTIFICADOR_TIMEOUT_MS, 10_000, { min: 1_000, max: 60_000 })
  );
  // Una reserva mas vieja que esto se considera de una pasada caida y puede reclamarse.
  const reservaAlertaExpiraMs = Math.trunc(
    parsearNumeroSeguro(entorno.ALERTAS_RESERVA_EXPIRA_MS, 10 * 60 * 1000, {
      min: notificadorTimeoutMs * 3,
      max: 24 * 60 * 60 * 1000
    })
  );
  return { notificadorTimeoutMs, reservaAlertaExpiraMs };
}

// En producción, el secreto JWT debe ser proporcionado por entorno.
// En desarrollo/test se permite un valor por defecto para facilitar el setup.
const jwtSecreto = process.env.JWT_SECRETO ?? '';
if (entorno === 'production' && !jwtSecreto) {
  throw new Error('JWT_SECRETO es requerido en producción');
}
const jwtSecretoEfectivo = jwtSecreto || 'cambia-este-secreto';
const jwtExpiraHoras = parsearNumeroSeguro(process.env.JWT_EXPIRA_HORAS, 8, { min: 1, max: 24 * 7 });

const rateLimitWindowMs = parsearNumeroSeguro(process.env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000, {
  min: 1_000,
  max: 24 * 60 * 60 * 1000
});
const rateLimitLimit = parsearNumeroSeguro(process.env.RATE_LIMIT_LIMIT, 300, { min: 1, max: 10_000 });

const umbralAsistencia = parsearNumeroSeguro(process.env.UMBRAL_ASISTENCIA, 75, { min: 0, max: 100 });
const politicaVentanaAlertas = parsearPoliticaVentana(process.env);
const concurrenciaAlertas = Math.trunc(parsearNumeroSeguro(process.env.ALERTAS_CONCURRENCIA, 4, { min: 1, max: 32 }));
const { notificadorTimeoutMs, reservaAlertaExpiraMs } = parsearPlazosAlertas(process.env);

const notificadorUrl = String(process.env.NOTIFICADOR_URL ?? '').trim().replace(/\/+$/, '');
const notificadorApiKey = process.env.NOTIFICADOR_API_KEY ?? '';

export const configuracion = {
  puerto,
  mongoUri,
  entorno,
  limiteJson,
  corsOrigenes,
  jwtSecreto: jwtSecretoEfectivo,
  jwtExpiraHoras,
  rateLimitWindowMs,
  rateLimitLimit,
  umbralAsistencia,
  politicaVentanaAlertas,
  concurrenciaAlertas,
  reservaAlertaExpiraMs,
  notificadorUrl,
  notificadorApiKey,
  notificadorTimeoutMs
};
