import { afterAll, afterEach, beforeAll, vi } from 'vitest';

type OpcionesEndurecimiento = {
  /**
   * Permite console.warn/error sin fallar la prueba (tambien con `PERMITIR_CONSOLA_PRUEBAS=1`).
   */
  permitirConsola?: boolean;
  /**
   * Mensajes de consola tolerados (texto contenido o regex).
   */
  patronesConsolaPermitidos?: Array<string | RegExp>;
  /**
   * Permite `process.warning` (tambien con `PERMITIR_AVISOS_NODE=1`).
   */
  permitirAvisosNode?: boolean;
  patronesAvisosPermitidos?: Array<string | RegExp>;
};

function coincide(texto: string, patrones: Array<string | RegExp>): boolean {
  return patrones.some((patron) => (typeof patron === 'string' ? texto.includes(patron) : patron.test(texto)));
}

function describir(valor: unknown): string {
  if (valor instanceof Error) return `${valor.name}: ${valor.message}`;
  if (typeof valor === 'string') return valor;
  try {
    return JSON.stringify(valor);
  } catch {
    return String(valor);
  }
}

/**
 * Endurece la suite: una prueba falla si deja salida en console.warn/error,
 * promesas rechazadas sin manejar, excepciones no capturadas o avisos de Node.
 */
export function instalarTestHardening(opciones: OpcionesEndurecimiento = {}) {
  const permitirConsola = Boolean(opciones.permitirConsola) || process.env.PERMITIR_CONSOLA_PRUEBAS === '1';
  const permitirAvisos = Boolean(opciones.permitirAvisosNode) || process.env.PERMITIR_AVISOS_NODE === '1';
  const patronesConsola = opciones.patronesConsolaPermitidos ?? [];
  const patronesAvisos = opciones.patronesAvisosPermitidos ?? [];

  const salidaConsola: string[] = [];
  const noManejados: string[] = [];
  const avisosNode: string[] = [];

  const alRechazo = (motivo: unknown) => noManejados.push(`unhandledRejection: ${describir(motivo)}`);
  const alExcepcion = (error: unknown) => noManejados.push(`uncaughtException: ${describir(error)}`);
  const alAviso = (aviso: Error) => {
    const texto = describir(aviso);
    if (!coincide(texto, patronesAvisos)) avisosNode.push(texto);
  };

  const restauradores: Array<() => void> = [];

  beforeAll(() => {
    if (!permitirConsola) {
      for (const metodo of ['warn', 'error'] as const) {
        const original = console[metodo].bind(console);
        const espia = vi.spyOn(console, metodo).mockImplementation((...args: unknown[]) => {
          const texto = args.map(describir).join(' ');
          if (!coincide(texto, patronesConsola)) salidaConsola.push(`console.${metodo}: ${texto}`);
          original(...args);
        });
        restauradores.push(() => espia.mockRestore());
      }
    }

    process.on('unhandledRejection', alRechazo);
    process.on('uncaughtException', alExcepcion);
    process.on('warning', alAviso);
  });

  afterEach(() => {
    const problemas = [
      ...salidaConsola.slice(0, 3),
      ...(permitirAvisos ? [] : avisosNode.slice(0, 3).map((aviso) => `process.warning: ${aviso}`)),
      ...noManejados.slice(0, 3)
    ];

    salidaConsola.length = 0;
    avisosNode.length = 0;
    noManejados.length = 0;

    if (problemas.length > 0) {
      throw new Error(`Fallo por warnings/errores en entorno de test: ${problemas.join(' ; ')}`);
    }
  });

  afterAll(() => {
    process.off('unhandledRejection', alRechazo);
    process.off('uncaughtException', alExcepcion);
    process.off('warning', alAviso);
    for (const restaurar of restauradores.splice(0)) restaurar();
  });
}
