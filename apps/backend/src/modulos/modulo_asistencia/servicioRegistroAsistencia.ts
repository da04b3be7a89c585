/**
 * Registro de asistencia con reevaluacion inmediata de alertas.
 *
 * Cada escritura (individual o por lote) dispara, de forma sincrona, una pasada
 * de alertas del curso afectado con la ventana global vigente.
 */
import { ErrorNoEncontrado } from '../../compartido/errores/errorAplicacion';
import type { ContextoSolicitante } from '../../compartido/tipos/dominio';
import type { Orquestador, ResumenPasada } from '../modulo_alertas/servicioOrquestacion';
import { exigirCursoDelDocente } from '../modulo_autenticacion/middlewareAutenticacion';
import type { CursoDirectorio, DirectorioAcademico } from '../modulo_directorio/directorioAcademico';
import type { LibroAsistencia, ResultadoLote } from './servicioLibroAsistencia';

export type EntradaRegistro = {
  alumnoId: string;
  cursoId: string;
  fecha: string;
  estado: string;
  observaciones?: string;
  motivo?: string;
};

export type EntradaRegistroLote = {
  cursoId: string;
  fecha: string;
  asistencias: Record<string, boolean>;
};

export type ServicioRegistro = {
  registrar(entrada: EntradaRegistro, contexto?: ContextoSolicitante): Promise<{ alertas: ResumenPasada }>;
  registrarLote(
    entrada: EntradaRegistroLote,
    contexto?: ContextoSolicitante
  ): Promise<ResultadoLote & { alertas: ResumenPasada }>;
};

export type DependenciasRegistro = {
  directorio: DirectorioAcademico;
  libro: LibroAsistencia;
  orquestador: Orquestador;
};

export function crearServicioRegistro({ directorio, libro, orquestador }: DependenciasRegistro): ServicioRegistro {
  async function resolverCursoEscribible(cursoId: string, contexto?: ContextoSolicitante): Promise<CursoDirectorio> {
    const curso = await directorio.obtenerCurso(cursoId);
    if (!curso || !curso.activo) {
      throw new ErrorNoEncontrado('CURSO_NO_ENCONTRADO', 'Curso no encontrado o inactivo', { cursoId });
    }
    exigirCursoDelDocente(curso, contexto);
    return curso;
  }

  return {
    async registrar(entrada, contexto) {
      const curso = await resolverCursoEscribible(entrada.cursoId, contexto);
      const alumno = await directorio.obtenerAlumno(entrada.alumnoId);
      if (!alumno) {
        throw new ErrorNoEncontrado('ALUMNO_NO_ENCONTRADO', 'Alumno no encontrado', { alumnoId: entrada.alumnoId });
      }

      await libro.registrarAsistencia(alumno.id, curso.id, entrada.fecha, entrada.estado, {
        contexto,
        observaciones: entrada.observaciones,
        motivo: entrada.motivo
      });
      const alertas = await orquestador.ejecutarPasada({ cursoId: curso.id });
      return { alertas };
    },

    async registrarLote(entrada, contexto) {
      const curso = await resolverCursoEscribible(entrada.cursoId, contexto);
      const resultado = await libro.registrarAsistenciaLote(curso.id, entrada.fecha, entrada.asistencias, { contexto });
      const alertas = await orquestador.ejecutarPasada({ cursoId: curso.id });
      return { ...resultado, alertas };
    }
  };
}
