/**
 * Libro de asistencia: unica via de escritura/lectura de hechos de asistencia.
 *
 * Contrato:
 * - Valida estado y fecha antes de escribir; una entrada invalida no deja escrituras parciales.
 * - Un registro por (alumno, curso, fecha): escribir de nuevo reemplaza el estado.
 * - No revisa permisos; eso corresponde a quien llama.
 */
import { ErrorValidacion } from '../../compartido/errores/errorAplicacion';
import {
  ESTADOS_ASISTENCIA,
  esEstadoAsistencia,
  type ContextoSolicitante,
  type EstadoAsistencia,
  type VentanaAsistencia
} from '../../compartido/tipos/dominio';
import { esFechaCalendarioValida } from '../../compartido/utilidades/fechas';
import { validarVentana } from '../../compartido/utilidades/ventanas';
import type { AlmacenAsistencia, CambioAsistencia, RegistroAsistencia } from './almacenAsistencia';

export type OpcionesRegistro = {
  contexto?: ContextoSolicitante;
  observaciones?: string;
  /** Razon de la correccion; queda en la bitacora si el estado cambia. */
  motivo?: string;
};

export type ResultadoLote = {
  presentes: string[];
  ausentes: string[];
};

export type LibroAsistencia = {
  registrarAsistencia(
    alumnoId: string,
    cursoId: string,
    fecha: string,
    estado: string,
    opciones?: OpcionesRegistro
  ): Promise<void>;
  registrarAsistenciaLote(
    cursoId: string,
    fecha: string,
    asistencias: Record<string, boolean>,
    opciones?: Pick<OpcionesRegistro, 'contexto'>
  ): Promise<ResultadoLote>;
  obtenerRegistrosVentana(alumnoId: string, cursoId: string, ventana?: VentanaAsistencia | null): Promise<RegistroAsistencia[]>;
};

/**
 * Convierte la forma de dos listas (roster + presentes) en un mapa alumno -> presente.
 * Los presentes que no estan en el roster se ignoran.
 */
export function reconciliarListas(roster: readonly string[], presentes: readonly string[]): Record<string, boolean> {
  const marcados = new Set(presentes);
  const mapa: Record<string, boolean> = {};
  for (const alumnoId of roster) {
    mapa[alumnoId] = marcados.has(alumnoId);
  }
  return mapa;
}

function exigirId(valor: string, campo: string) {
  if (typeof valor !== 'string' || !valor.trim()) {
    throw new ErrorValidacion(`${campo} es requerido`, { campo });
  }
}

function exigirFecha(fecha: string) {
  if (!esFechaCalendarioValida(fecha)) {
    throw new ErrorValidacion('Fecha invalida (YYYY-MM-DD)', { fecha });
  }
}

export function crearLibroAsistencia(almacen: AlmacenAsistencia): LibroAsistencia {
  async function registrarCambiosReales(
    cursoId: string,
    fecha: string,
    nuevos: Array<{ alumnoId: string; estado: EstadoAsistencia }>,
    previos: Map<string, EstadoAsistencia | null>,
    { contexto, motivo }: Pick<OpcionesRegistro, 'contexto' | 'motivo'>
  ) {
    const cambios: CambioAsistencia[] = [];
    for (const { alumnoId, estado } of nuevos) {
      const anterior = previos.get(alumnoId) ?? null;
      // Solo se audita la modificacion de un registro existente.
      if (anterior === null || anterior === estado) continue;
      const cambio: CambioAsistencia = {
        alumnoId,
        cursoId,
        fecha,
        estadoAnterior: anterior,
        estadoNuevo: estado,
        cambiadoPor: contexto?.usuarioId ?? null
      };
      if (motivo) cambio.motivo = motivo;
      cambios.push(cambio);
    }
    await almacen.registrarCambios(cambios);
  }

  return {
    async registrarAsistencia(alumnoId, cursoId, fecha, estado, opciones = {}) {
      exigirId(alumnoId, 'alumnoId');
      exigirId(cursoId, 'cursoId');
      exigirFecha(fecha);
      if (!esEstadoAsistencia(estado)) {
        throw new ErrorValidacion('Estado de asistencia invalido', { estado, permitidos: ESTADOS_ASISTENCIA });
      }

      const registro: RegistroAsistencia = { alumnoId, cursoId, fecha, estado };
      if (opciones.observaciones !== undefined) registro.observaciones = opciones.observaciones;

      const anterior = await almacen.guardar(registro);
      await registrarCambiosReales(cursoId, fecha, [{ alumnoId, estado }], new Map([[alumnoId, anterior]]), opciones);
    },

    async registrarAsistenciaLote(cursoId, fecha, asistencias, opciones = {}) {
      exigirId(cursoId, 'cursoId');
      exigirFecha(fecha);

      const entradas = Object.entries(asistencias).map(([alumnoId, presente]) => {
        exigirId(alumnoId, 'alumnoId');
        if (typeof presente !== 'boolean') {
          throw new ErrorValidacion('Cada alumno requiere un valor booleano de asistencia', { alumnoId });
        }
        const estado: EstadoAsistencia = presente ? 'presente' : 'ausente';
        return { alumnoId, estado };
      });

      const resultado: ResultadoLote = {
        presentes: entradas.filter((e) => e.estado === 'presente').map((e) => e.alumnoId),
        ausentes: entradas.filter((e) => e.estado === 'ausente').map((e) => e.alumnoId)
      };
      if (entradas.length === 0) return resultado;

      const previos = await almacen.guardarLote(cursoId, fecha, entradas);
      await registrarCambiosReales(cursoId, fecha, entradas, previos, { contexto: opciones.contexto });
      return resultado;
    },

    async obtenerRegistrosVentana(alumnoId, cursoId, ventana) {
      exigirId(alumnoId, 'alumnoId');
      exigirId(cursoId, 'cursoId');
      const rango = ventana ? validarVentana(ventana) : null;
      const registros = await almacen.listarPorAlumno(alumnoId, cursoId, rango);
      return [...registros].sort((a, b) => a.fecha.localeCompare(b.fecha));
    }
  };
}
