/**
 * Orquestacion de alertas por curso y ventana de reporte.
 *
 * Una pasada, sin estado propio entre pasos: todo lo persistente vive en el
 * libro de asistencia y en el almacen de alertas.
 */
import { ErrorNoEncontrado } from '../../compartido/errores/errorAplicacion';
import type { PoliticaVentana, ResultadoDespacho, VentanaAsistencia } from '../../compartido/tipos/dominio';
import { ejecutarConLimite } from '../../compartido/utilidades/concurrencia';
import { claveVentana, resolverVentana, validarVentana } from '../../compartido/utilidades/ventanas';
import { log } from '../../infraestructura/logging/logger';
import { evaluarCumplimiento, umbralEfectivo } from '../modulo_cumplimiento/evaluadorUmbral';
import type { Agregador } from '../modulo_cumplimiento/servicioAgregacion';
import type { AlumnoDirectorio, DirectorioAcademico } from '../modulo_directorio/directorioAcademico';
import type { Despachador } from './servicioDespacho';

export type ResumenPasada = {
  cursoId: string;
  ventana: VentanaAsistencia;
  claveVentana: string;
  evaluados: number;
  incumplimientos: number;
  alertados: number;
  duplicadosOmitidos: number;
  fallidos: number;
  sinDatos: number;
  cancelado: boolean;
};

export type SolicitudPasada = {
  cursoId: string;
  // Si no se indica, aplica la politica global vigente.
  ventana?: VentanaAsistencia;
  senal?: AbortSignal;
};

export type Orquestador = {
  ejecutarPasada(solicitud: SolicitudPasada): Promise<ResumenPasada>;
};

export type DependenciasOrquestador = {
  directorio: DirectorioAcademico;
  agregador: Agregador;
  despachador: Despachador;
  politicaVentana: PoliticaVentana;
  umbralGlobal: number;
  concurrencia: number;
  reloj?: () => Date;
};

type ResultadoAlumno = 'cumple' | 'sin_datos' | ResultadoDespacho;

export function crearOrquestador({
  directorio,
  agregador,
  despachador,
  politicaVentana,
  umbralGlobal,
  concurrencia,
  reloj = () => new Date()
}: DependenciasOrquestador): Orquestador {
  return {
    async ejecutarPasada({ cursoId, ventana, senal }) {
      const curso = await directorio.obtenerCurso(cursoId);
      if (!curso || !curso.activo) {
        throw new ErrorNoEncontrado('CURSO_NO_ENCONTRADO', 'Curso no encontrado o inactivo', { cursoId });
      }

      const rango = ventana ? validarVentana(ventana) : resolverVentana(politicaVentana, reloj());
      const umbral = umbralEfectivo(curso, umbralGlobal);
      const alumnos = await directorio.listarAlumnosActivos(curso.id);

      const procesarAlumno = async (alumno: AlumnoDirectorio): Promise<ResultadoAlumno> => {
        const instantanea = await agregador.calcularInstantanea(alumno.id, curso.id, rango);
        const veredicto = evaluarCumplimiento(instantanea, umbral);
        if (veredicto !== 'incumple' || instantanea.porcentaje === null) {
          return veredicto === 'sin_datos' ? 'sin_datos' : 'cumple';
        }
        return despachador.despachar({
          alumno,
          curso,
          ventana: rango,
          instantanea: { ...instantanea, porcentaje: instantanea.porcentaje },
          umbral
        });
      };

      const { resultados, cancelado } = await ejecutarConLimite(alumnos, concurrencia, procesarAlumno, senal);

      const contar = (...buscados: ResultadoAlumno[]) => resultados.filter((r) => buscados.includes(r)).length;
      const resumen: ResumenPasada = {
        cursoId: curso.id,
        ventana: rango,
        claveVentana: claveVentana(rango),
        evaluados: resultados.length,
        incumplimientos: contar('enviado', 'duplicado_omitido', 'fallido'),
        alertados: contar('enviado'),
        duplicadosOmitidos: contar('duplicado_omitido'),
        fallidos: contar('fallido'),
        sinDatos: contar('sin_datos'),
        cancelado
      };

      log(resumen.fallidos > 0 ? 'warn' : 'info', 'Pasada de alertas de asistencia', { ...resumen });
      return resumen;
    }
  };
}
