/**
 * Directorio de usuarios y cursos (colaborador externo, solo lectura).
 */
import { Curso } from './modeloCurso';
import { Usuario } from './modeloUsuario';

export type CursoDirectorio = {
  id: string;
  nombre: string;
  docenteId: string | null;
  activo: boolean;
  umbralAsistencia?: number;
};

export type AlumnoDirectorio = {
  id: string;
  nombreCompleto: string;
  correo: string;
  activo: boolean;
};

export interface DirectorioAcademico {
  obtenerCurso(cursoId: string): Promise<CursoDirectorio | null>;
  obtenerAlumno(alumnoId: string): Promise<AlumnoDirectorio | null>;
  /**
   * Alumnos inscritos en el curso. Hoy la inscripcion es "todos los alumnos activos".
   */
  listarAlumnosActivos(cursoId: string): Promise<AlumnoDirectorio[]>;
}

type UsuarioPlano = { _id: unknown; nombreCompleto: string; correo: string; activo?: boolean | null };

function aAlumno(doc: UsuarioPlano): AlumnoDirectorio {
  return {
    id: String(doc._id),
    nombreCompleto: doc.nombreCompleto,
    correo: doc.correo,
    activo: doc.activo !== false
  };
}

export function crearDirectorioMongo(): DirectorioAcademico {
  return {
    async obtenerCurso(cursoId) {
      const curso = await Curso.findById(cursoId).lean();
      if (!curso) return null;
      return {
        id: String(curso._id),
        nombre: curso.nombre,
        docenteId: curso.docenteId ? String(curso.docenteId) : null,
        activo: curso.activo !== false,
        umbralAsistencia: typeof curso.umbralAsistencia === 'number' ? curso.umbralAsistencia : undefined
      };
    },

    async obtenerAlumno(alumnoId) {
      const usuario = await Usuario.findOne({ _id: alumnoId, rol: 'alumno' }).lean();
      return usuario ? aAlumno(usuario) : null;
    },

    async listarAlumnosActivos(_cursoId) {
      void _cursoId;
      const usuarios = await Usuario.find({ rol: 'alumno', activo: true }).sort({ nombreCompleto: 1 }).lean();
      return usuarios.map(aAlumno);
    }
  };
}
