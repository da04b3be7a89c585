// Tokens JWT para pruebas.
import type { Rol } from '../../src/compartido/tipos/dominio';
import { crearTokenUsuario } from '../../src/modulos/modulo_autenticacion/servicioTokens';
import { IDS } from './nucleoPrueba';

export function tokenPrueba(rol: Rol, usuarioId: string) {
  return crearTokenUsuario({ usuarioId, rol });
}

export function tokenDocentePrueba(usuarioId: string = IDS.docente) {
  return tokenPrueba('docente', usuarioId);
}

export function tokenAdminPrueba() {
  return tokenPrueba('admin', IDS.admin);
}
