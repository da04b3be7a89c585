/**
 * Ventanas de reporte: rangos inclusivos de fechas de calendario.
 */
import { ErrorValidacion } from '../errores/errorAplicacion';
import type { PoliticaVentana, VentanaAsistencia } from '../tipos/dominio';
import { esFechaCalendarioValida, fechaCalendarioLocal, restarDias } from './fechas';

export function validarVentana(ventana: VentanaAsistencia): VentanaAsistencia {
  const { inicio, fin } = ventana;
  if (!esFechaCalendarioValida(inicio) || !esFechaCalendarioValida(fin)) {
    throw new ErrorValidacion('Ventana invalida: se esperan fechas YYYY-MM-DD', { inicio, fin });
  }
  if (inicio > fin) {
    throw new ErrorValidacion('Ventana invalida: inicio posterior a fin', { inicio, fin });
  }
  return { inicio, fin };
}

/**
 * Ventana vigente segun la politica. La movil termina "hoy" (fecha local del servidor)
 * y empieza `dias` antes; ambos extremos cuentan.
 */
export function resolverVentana(politica: PoliticaVentana, ahora: Date): VentanaAsistencia {
  if (politica.modo === 'fija') {
    return validarVentana({ inicio: politica.inicio, fin: politica.fin });
  }
  const fin = fechaCalendarioLocal(ahora);
  return { inicio: restarDias(fin, politica.dias), fin };
}

/**
 * Identificador deterministico de la ventana; forma parte de la llave de deduplicacion de alertas.
 */
export function claveVentana(ventana: VentanaAsistencia): string {
  return `${ventana.inicio}..${ventana.fin}`;
}

export function estaEnVentana(fecha: string, ventana?: VentanaAsistencia | null): boolean {
  if (!ventana) return true;
  return fecha >= ventana.inicio && fecha <= ventana.fin;
}
