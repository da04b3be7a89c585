/**
 * Almacen de alertas enviadas (registro de idempotencia).
 *
 * Una fila `pendiente` es una reserva en vuelo: la pasada que la obtuvo es la
 * unica que puede llamar al notificador para esa llave. El `reservadoEn` que
 * escribio la pasada es su token: renovar, confirmar y liberar solo actuan si la
 * fila sigue pendiente con ese mismo token.
 */
import type { EstadoAlerta, VentanaAsistencia } from '../../compartido/tipos/dominio';
import { esErrorDuplicado } from '../../infraestructura/baseDatos/mongoose';
import { AlertaAsistencia } from './modeloAlertaAsistencia';

export type ClaveAlerta = {
  alumnoId: string;
  cursoId: string;
  claveVentana: string;
};

export type RegistroAlerta = ClaveAlerta & {
  inicio: string;
  fin: string;
  estado: EstadoAlerta;
  porcentaje: number | null;
  umbral: number | null;
  reservadoEn: Date;
  enviadoEn: Date | null;
  creadoEn: Date;
};

export type DatosConfirmacion = {
  porcentaje: number;
  umbral: number;
  enviadoEn: Date;
};

/** Token de propiedad de una reserva: el `reservadoEn` que escribio la pasada. */
export type TokenReserva = Date;

export interface AlmacenAlertas {
  /**
   * Inserta la reserva si la llave no existe (operacion atomica). Tambien reclama una
   * reserva `pendiente` anterior a `expiraAntesDe`. Devuelve el token si esta llamada
   * la obtuvo, o `null`.
   */
  reservar(
    clave: ClaveAlerta,
    ventana: VentanaAsistencia,
    ahora: Date,
    expiraAntesDe: Date
  ): Promise<TokenReserva | null>;
  /** Extiende una reserva propia. Devuelve el token nuevo o `null` si ya no es nuestra. */
  renovar(clave: ClaveAlerta, token: TokenReserva, ahora: Date): Promise<TokenReserva | null>;
  confirmar(clave: ClaveAlerta, token: TokenReserva, datos: DatosConfirmacion): Promise<boolean>;
  liberar(clave: ClaveAlerta, token: TokenReserva): Promise<void>;
  /** Mas recientes primero. */
  listarPorCurso(cursoId: string): Promise<RegistroAlerta[]>;
}

function filtroPropio(clave: ClaveAlerta, token: TokenReserva) {
  return { ...clave, estado: 'pendiente', reservadoEn: token };
}

export function crearAlmacenAlertasMongo(): AlmacenAlertas {
  return {
    async reservar(clave, ventana, ahora, expiraAntesDe) {
      try {
        await AlertaAsistencia.create({
          ...clave,
          inicio: ventana.inicio,
          fin: ventana.fin,
          estado: 'pendiente',
          reservadoEn: ahora
        });
        return ahora;
      } catch (error) {
        if (!esErrorDuplicado(error)) throw error;
      }

      const reclamo = await AlertaAsistencia.updateOne(
        { ...clave, estado: 'pendiente', reservadoEn: { $lt: expiraAntesDe } },
        { $set: { reservadoEn: ahora } }
      );
      return reclamo.modifiedCount === 1 ? ahora : null;
    },

    async renovar(clave, token, ahora) {
      const renovacion = await AlertaAsistencia.updateOne(filtroPropio(clave, token), { $set: { reservadoEn: ahora } });
      return renovacion.matchedCount === 1 ? ahora : null;
    },

    async confirmar(clave, token, { porcentaje, umbral, enviadoEn }) {
      const confirmacion = await AlertaAsistencia.updateOne(filtroPropio(clave, token), {
        $set: { estado: 'enviada', porcentaje, umbral, enviadoEn }
      });
      return confirmacion.matchedCount === 1;
    },

    async liberar(clave, token) {
      await AlertaAsistencia.deleteOne(filtroPropio(clave, token));
    },

    async listarPorCurso(cursoId) {
      const docs = await AlertaAsistencia.find({ cursoId }).sort({ createdAt: -1, _id: -1 }).lean();
      return docs.map((doc): RegistroAlerta => ({
        alumnoId: String(doc.alumnoId),
        cursoId: String(doc.cursoId),
        claveVentana: doc.claveVentana,
        inicio: doc.inicio,
        fin: doc.fin,
        estado: doc.estado === 'enviada' ? 'enviada' : 'pendiente',
        porcentaje: typeof doc.porcentaje === 'number' ? doc.porcentaje : null,
        umbral: typeof doc.umbral === 'number' ? doc.umbral : null,
        reservadoEn: doc.reservadoEn,
        enviadoEn: doc.enviadoEn ?? null,
        creadoEn: doc.createdAt
      }));
    }
  };
}
