/**
 * Middleware para requerir un usuario identificado via JWT.
 */
import type { NextFunction, Request, Response } from 'express';
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import type { ContextoSolicitante, Rol } from '../../compartido/tipos/dominio';
import type { CursoDirectorio } from '../modulo_directorio/directorioAcademico';
import { verificarTokenUsuario } from './servicioTokens';

export type SolicitudAutenticada = Request & { contexto?: ContextoSolicitante };

export function requerirUsuario(req: SolicitudAutenticada, _res: Response, next: NextFunction) {
  const auth = req.headers.authorization ?? '';
  const [tipo, token] = auth.split(' ');

  if (tipo !== 'Bearer' || !token) {
    next(new ErrorAplicacion('NO_AUTORIZADO', 'Token requerido', 401));
    return;
  }

  try {
    req.contexto = verificarTokenUsuario(token);
    next();
  } catch {
    next(new ErrorAplicacion('TOKEN_INVALIDO', 'Token invalido o expirado', 401));
  }
}

export function requerirRol(...roles: Rol[]) {
  return (req: SolicitudAutenticada, _res: Response, next: NextFunction) => {
    const rol = req.contexto?.rol;
    if (!rol) {
      next(new ErrorAplicacion('NO_AUTORIZADO', 'Sesion requerida', 401));
      return;
    }
    if (!roles.includes(rol)) {
      next(new ErrorAplicacion('SIN_PERMISO', 'Sin permiso para esta operacion', 403));
      return;
    }
    next();
  };
}

export function obtenerContexto(req: SolicitudAutenticada): ContextoSolicitante {
  if (!req.contexto) {
    throw new ErrorAplicacion('NO_AUTORIZADO', 'Sesion requerida', 401);
  }
  return req.contexto;
}

/**
 * Un alumno solo puede consultar su propia asistencia.
 */
export function exigirAccesoAlumno(contexto: ContextoSolicitante, alumnoId: string) {
  if (contexto.rol === 'alumno' && contexto.usuarioId !== alumnoId) {
    throw new ErrorAplicacion('SIN_PERMISO', 'Solo puedes consultar tu propia asistencia', 403);
  }
}

/**
 * Un docente solo opera sobre los cursos que tiene asignados.
 */
export function exigirCursoDelDocente(curso: Pick<CursoDirectorio, 'docenteId'>, contexto?: ContextoSolicitante) {
  if (contexto?.rol === 'docente' && curso.docenteId !== contexto.usuarioId) {
    throw new ErrorAplicacion('SIN_PERMISO', 'El curso no esta asignado a este docente', 403);
  }
}
