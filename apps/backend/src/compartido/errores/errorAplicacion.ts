/**
 * Error estandar para respuestas controladas del API.
 */
export class ErrorAplicacion extends Error {
  codigo: string;
  estadoHttp: number;
  detalles?: unknown;

  constructor(codigo: string, mensaje: string, estadoHttp = 400, detalles?: unknown) {
    super(mensaje);
    this.name = new.target.name;
    this.codigo = codigo;
    this.estadoHttp = estadoHttp;
    this.detalles = detalles;
  }
}

/**
 * Entrada invalida (estado o fecha). Se rechaza antes de escribir nada.
 */
export class ErrorValidacion extends ErrorAplicacion {
  constructor(mensaje: string, detalles?: unknown) {
    super('VALIDACION', mensaje, 400, detalles);
  }
}

export class ErrorNoEncontrado extends ErrorAplicacion {
  constructor(codigo: string, mensaje: string, detalles?: unknown) {
    super(codigo, mensaje, 404, detalles);
  }
}

/**
 * Falla del notificador externo. Queda aislada por alumno dentro de una pasada de alertas.
 */
export class ErrorEnvio extends ErrorAplicacion {
  constructor(mensaje: string, detalles?: unknown) {
    super('ENVIO_FALLIDO', mensaje, 502, detalles);
  }
}
