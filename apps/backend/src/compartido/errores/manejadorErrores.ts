/**
 * Middleware de manejo de errores para el API.
 *
 * Contrato:
 * - `ErrorAplicacion` (y sus subclases) se serializa tal cual (codigo/estado/detalles).
 * - Para errores no esperados (p. ej. la base de datos no responde) se registra
 *   (excepto en tests) y se devuelve 500.
 *
 * Nota: el formato del envelope de error es parte del contrato publico del API.
 */
import type { NextFunction, Request, Response } from 'express';
import { ErrorAplicacion } from './errorAplicacion';
import { logError } from '../../infraestructura/logging/logger';

function leerPropiedad(error: unknown, clave: 'name' | 'status' | 'statusCode' | 'type'): unknown {
  if (typeof error !== 'object' || error === null) return undefined;
  return Reflect.get(error, clave);
}

export function manejadorErrores(error: unknown, _req: Request, res: Response, _next: NextFunction) {
  void _next;

  // IDs malformados que llegan hasta Mongoose (CastError/BSONError).
  const nombreError = leerPropiedad(error, 'name');
  if (nombreError === 'CastError' || nombreError === 'BSONError' || nombreError === 'BSONTypeError') {
    res.status(400).json({
      error: {
        codigo: 'DATOS_INVALIDOS',
        mensaje: 'Id invalido'
      }
    });
    return;
  }

  // body-parser: JSON malformado o payload demasiado grande.
  const status = leerPropiedad(error, 'status') ?? leerPropiedad(error, 'statusCode');
  const type = leerPropiedad(error, 'type');
  if (status === 413 || type === 'entity.too.large') {
    res.status(413).json({
      error: {
        codigo: 'PAYLOAD_DEMASIADO_GRANDE',
        mensaje: 'Payload demasiado grande'
      }
    });
    return;
  }
  if (type === 'entity.parse.failed') {
    res.status(400).json({
      error: {
        codigo: 'JSON_INVALIDO',
        mensaje: 'JSON invalido'
      }
    });
    return;
  }

  if (error instanceof ErrorAplicacion) {
    res.status(error.estadoHttp).json({
      error: {
        codigo: error.codigo,
        mensaje: error.message,
        detalles: error.detalles
      }
    });
    return;
  }

  const entorno = process.env.NODE_ENV;
  if (entorno !== 'test') {
    logError('Error no controlado en request', error);
  }

  const exponerMensaje = entorno !== 'production';
  const mensaje = exponerMensaje && error instanceof Error ? error.message : 'Error interno';
  res.status(500).json({
    error: {
      codigo: 'ERROR_INTERNO',
      mensaje
    }
  });
}
