/**
 * Tokens JWT que identifican a quien llama al API.
 *
 * El inicio de sesion vive en otro sistema; aqui solo se firma/verifica el
 * contexto `{ usuarioId, rol }` que se pasa explicitamente al nucleo.
 */
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { configuracion } from '../../configuracion';
import { ROLES, type ContextoSolicitante } from '../../compartido/tipos/dominio';

const esquemaPayloadToken = z.object({
  usuarioId: z.string().min(1),
  rol: z.enum(ROLES)
});

export function crearTokenUsuario(payload: ContextoSolicitante) {
  return jwt.sign(payload, configuracion.jwtSecreto, {
    expiresIn: `${configuracion.jwtExpiraHoras}h`
  });
}

export function verificarTokenUsuario(token: string): ContextoSolicitante {
  const { usuarioId, rol } = esquemaPayloadToken.parse(jwt.verify(token, configuracion.jwtSecreto));
  return { usuarioId, rol };
}
