/**
 * Almacen del libro de asistencia.
 *
 * Contrato:
 * - Upsert por llave compuesta (alumnoId, cursoId, fecha); el ultimo en escribir gana.
 * - El lote hace el mismo upsert por alumno y reporta el estado previo de cada uno.
 * - Consulta por alumno/curso/ventana, ordenada por fecha ascendente.
 */
import type { EstadoAsistencia, VentanaAsistencia } from '../../compartido/tipos/dominio';
import { esEstadoAsistencia } from '../../compartido/tipos/dominio';
import { esErrorDuplicado } from '../../infraestructura/baseDatos/mongoose';
import { Asistencia } from './modeloAsistencia';
import { BitacoraAsistencia } from './modeloBitacoraAsistencia';

export type RegistroAsistencia = {
  alumnoId: string;
  cursoId: string;
  fecha: string;
  estado: EstadoAsistencia;
  observaciones?: string;
};

export type EntradaLote = {
  alumnoId: string;
  estado: EstadoAsistencia;
};

export type CambioAsistencia = {
  alumnoId: string;
  cursoId: string;
  fecha: string;
  estadoAnterior: EstadoAsistencia | null;
  estadoNuevo: EstadoAsistencia;
  cambiadoPor: string | null;
  motivo?: string;
};

export type ConteoAsistencia = {
  total: number;
  presentes: number;
};

export interface AlmacenAsistencia {
  /**
   * Devuelve el estado previo, o null si la llave no existia.
   */
  guardar(registro: RegistroAsistencia): Promise<EstadoAsistencia | null>;
  /**
   * Misma fecha y curso para todos. Devuelve el estado previo por alumno.
   */
  guardarLote(cursoId: string, fecha: string, entradas: EntradaLote[]): Promise<Map<string, EstadoAsistencia | null>>;
  listarPorAlumno(alumnoId: string, cursoId: string, ventana?: VentanaAsistencia | null): Promise<RegistroAsistencia[]>;
  contarPorCurso(cursoId: string, ventana?: VentanaAsistencia | null): Promise<ConteoAsistencia>;
  registrarCambios(cambios: CambioAsistencia[]): Promise<void>;
}

function leerEstado(valor: unknown): EstadoAsistencia {
  if (!esEstadoAsistencia(valor)) {
    throw new Error(`Estado de asistencia desconocido en base de datos: ${String(valor)}`);
  }
  return valor;
}

function filtroFechas(ventana?: VentanaAsistencia | null) {
  return ventana ? { fecha: { $gte: ventana.inicio, $lte: ventana.fin } } : {};
}

/**
 * Upsert atomico que devuelve el estado anterior. Dos upserts simultaneos sobre la
 * misma llave chocan en el indice unico; el perdedor reintenta como actualizacion.
 */
async function escribirConPrevio(
  filtro: { alumnoId: string; cursoId: string; fecha: string },
  cambios: { estado: EstadoAsistencia; observaciones?: string }
): Promise<EstadoAsistencia | null> {
  const actualizar = (upsert: boolean) =>
    Asistencia.findOneAndUpdate(filtro, { $set: cambios }, { upsert, new: false }).lean();

  try {
    const anterior = await actualizar(true);
    return anterior ? leerEstado(anterior.estado) : null;
  } catch (error) {
    if (!esErrorDuplicado(error)) throw error;
    const anterior = await actualizar(false);
    return anterior ? leerEstado(anterior.estado) : null;
  }
}

export function crearAlmacenAsistenciaMongo(): AlmacenAsistencia {
  return {
    async guardar({ alumnoId, cursoId, fecha, estado, observaciones }) {
      const cambios = observaciones === undefined ? { estado } : { estado, observaciones };
      return escribirConPrevio({ alumnoId, cursoId, fecha }, cambios);
    },

    async guardarLote(cursoId, fecha, entradas) {
      // Cada previo se lee en la misma operacion que lo reemplaza.
      const previos = await Promise.all(
        entradas.map(
          async ({ alumnoId, estado }) =>
            [alumnoId, await escribirConPrevio({ alumnoId, cursoId, fecha }, { estado })] as const
        )
      );
      return new Map<string, EstadoAsistencia | null>(previos);
    },

    async listarPorAlumno(alumnoId, cursoId, ventana) {
      const docs = await Asistencia.find({ alumnoId, cursoId, ...filtroFechas(ventana) })
        .sort({ fecha: 1 })
        .lean();
      return docs.map((doc) => ({
        alumnoId: String(doc.alumnoId),
        cursoId: String(doc.cursoId),
        fecha: doc.fecha,
        estado: leerEstado(doc.estado),
        ...(doc.observaciones ? { observaciones: doc.observaciones } : {})
      }));
    },

    async contarPorCurso(cursoId, ventana) {
      const filtro = { cursoId, ...filtroFechas(ventana) };
      const [total, presentes] = await Promise.all([
        Asistencia.countDocuments(filtro),
        Asistencia.countDocuments({ ...filtro, estado: 'presente' })
      ]);
      return { total, presentes };
    },

    async registrarCambios(cambios) {
      if (cambios.length === 0) return;
      await BitacoraAsistencia.insertMany(cambios);
    }
  };
}
