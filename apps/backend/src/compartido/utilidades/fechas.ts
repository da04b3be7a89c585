/**
 * Fechas de calendario `YYYY-MM-DD`.
 *
 * Se manejan como texto (sin hora ni zona horaria): el orden lexicografico
 * coincide con el cronologico, asi que los rangos se comparan como strings.
 */
const PATRON_FECHA = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_POR_DIA = 24 * 60 * 60 * 1000;

function aFechaUtc(fecha: string): Date | null {
  const partes = PATRON_FECHA.exec(fecha);
  if (!partes) return null;
  const anio = Number(partes[1]);
  const mes = Number(partes[2]);
  const dia = Number(partes[3]);
  const resultado = new Date(Date.UTC(anio, mes - 1, dia));
  if (resultado.getUTCFullYear() !== anio || resultado.getUTCMonth() !== mes - 1 || resultado.getUTCDate() !== dia) {
    return null;
  }
  return resultado;
}

function dosDigitos(n: number) {
  return String(n).padStart(2, '0');
}

export function esFechaCalendarioValida(valor: unknown): valor is string {
  return typeof valor === 'string' && aFechaUtc(valor) !== null;
}

/**
 * Fecha de calendario local (la del servidor) para un instante.
 */
export function fechaCalendarioLocal(instante: Date): string {
  return `${instante.getFullYear()}-${dosDigitos(instante.getMonth() + 1)}-${dosDigitos(instante.getDate())}`;
}

export function restarDias(fecha: string, dias: number): string {
  const base = aFechaUtc(fecha);
  if (!base) {
    throw new Error(`Fecha de calendario invalida: ${fecha}`);
  }
  const resultado = new Date(base.getTime() - dias * MS_POR_DIA);
  return `${resultado.getUTCFullYear()}-${dosDigitos(resultado.getUTCMonth() + 1)}-${dosDigitos(resultado.getUTCDate())}`;
}
