export type NivelLog = 'info' | 'warn' | 'error' | 'ok' | 'system';

type Meta = Record<string, unknown>;

const servicio = 'api-asistencia';

function serializarError(error: unknown) {
  if (!error) return undefined;
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  }
  return { value: String(error) };
}

// En pruebas la salida se silencia salvo que se pida con LOG_EN_PRUEBAS=1.
function silenciado() {
  return process.env.NODE_ENV === 'test' && process.env.LOG_EN_PRUEBAS !== '1';
}

export function log(level: NivelLog, msg: string, meta: Meta = {}) {
  if (silenciado()) return;

  const entry = {
    ts: new Date().toISOString(),
    service: servicio,
    level,
    msg,
    ...meta
  };

  const line = JSON.stringify(entry);
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
}

export function logError(msg: string, error?: unknown, meta: Meta = {}) {
  log('error', msg, { ...meta, error: serializarError(error) });
}
