/**
 * Agregacion de asistencia: instantanea por alumno y resumen por curso.
 *
 * Las dos rutas tratan distinto el caso sin registros:
 * - Instantanea por alumno: `porcentaje = null` (sin datos), nunca 0.
 * - Resumen de curso: `tasa = 0`.
 */
import type { VentanaAsistencia } from '../../compartido/tipos/dominio';
import { validarVentana } from '../../compartido/utilidades/ventanas';
import type { AlmacenAsistencia } from '../modulo_asistencia/almacenAsistencia';

export type InstantaneaCumplimiento = {
  alumnoId: string;
  cursoId: string;
  ventana: VentanaAsistencia | null;
  totalClases: number;
  clasesPresentes: number;
  porcentaje: number | null;
};

export type ResumenCurso = {
  cursoId: string;
  ventana: VentanaAsistencia | null;
  totalRegistros: number;
  registrosPresentes: number;
  registrosAusentes: number;
  tasa: number;
};

export type Agregador = {
  calcularInstantanea(alumnoId: string, cursoId: string, ventana?: VentanaAsistencia | null): Promise<InstantaneaCumplimiento>;
  calcularResumenCurso(cursoId: string, ventana?: VentanaAsistencia | null): Promise<ResumenCurso>;
};

export function crearAgregador(almacen: AlmacenAsistencia): Agregador {
  return {
    async calcularInstantanea(alumnoId, cursoId, ventana) {
      const rango = ventana ? validarVentana(ventana) : null;
      const registros = await almacen.listarPorAlumno(alumnoId, cursoId, rango);

      const fechas = new Set<string>();
      const fechasPresente = new Set<string>();
      for (const registro of registros) {
        fechas.add(registro.fecha);
        if (registro.estado === 'presente') fechasPresente.add(registro.fecha);
      }

      const totalClases = fechas.size;
      const clasesPresentes = fechasPresente.size;
      return {
        alumnoId,
        cursoId,
        ventana: rango,
        totalClases,
        clasesPresentes,
        porcentaje: totalClases > 0 ? (clasesPresentes / totalClases) * 100 : null
      };
    },

    async calcularResumenCurso(cursoId, ventana) {
      const rango = ventana ? validarVentana(ventana) : null;
      const { total, presentes } = await almacen.contarPorCurso(cursoId, rango);
      return {
        cursoId,
        ventana: rango,
        totalRegistros: total,
        registrosPresentes: presentes,
        registrosAusentes: total - presentes,
        tasa: total > 0 ? (presentes / total) * 100 : 0
      };
    }
  };
}
