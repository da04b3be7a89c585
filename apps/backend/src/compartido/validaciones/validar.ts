/**
 * Helpers de validacion con Zod para requests.
 */
import type { NextFunction, Request, Response } from 'express';
import type { z, ZodSchema, ZodTypeAny } from 'zod';
import { ErrorValidacion } from '../errores/errorAplicacion';

export function validarCuerpo(schema: ZodSchema) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const resultado = schema.safeParse(req.body);
    if (!resultado.success) {
      next(new ErrorValidacion('Payload invalido', resultado.error.flatten()));
      return;
    }
    req.body = resultado.data;
    next();
  };
}

/**
 * Parsea query/params. En Express 5 `req.query` es de solo lectura, asi que
 * el resultado se devuelve en vez de reasignarse.
 */
export function parsearConsulta<S extends ZodTypeAny>(schema: S, valor: unknown): z.infer<S> {
  const resultado = schema.safeParse(valor);
  if (!resultado.success) {
    throw new ErrorValidacion('Consulta invalida', resultado.error.flatten());
  }
  return resultado.data;
}
