/**
 * Almacen de notificaciones por usuario.
 *
 * Todas las consultas y marcas van acotadas por `usuarioId`: nadie lee ni marca
 * notificaciones ajenas.
 */
import { Notificacion, TIPOS_NOTIFICACION } from './modeloNotificacion';

export type TipoNotificacion = (typeof TIPOS_NOTIFICACION)[number];

export type NuevaNotificacion = {
  usuarioId: string;
  titulo: string;
  mensaje: string;
  tipo: TipoNotificacion;
};

export type RegistroNotificacion = NuevaNotificacion & {
  id: string;
  leida: boolean;
  creadoEn: Date;
};

export type ConsultaNotificaciones = {
  limite: number;
  soloNoLeidas?: boolean;
};

export interface AlmacenNotificaciones {
  crear(nueva: NuevaNotificacion): Promise<void>;
  /** Mas recientes primero. */
  listarPorUsuario(usuarioId: string, consulta: ConsultaNotificaciones): Promise<RegistroNotificacion[]>;
  /** `false` si no existe o pertenece a otro usuario. */
  marcarLeida(notificacionId: string, usuarioId: string, ahora: Date): Promise<boolean>;
  marcarTodasLeidas(usuarioId: string, ahora: Date): Promise<number>;
}

export function esTipoNotificacion(valor: unknown): valor is TipoNotificacion {
  return TIPOS_NOTIFICACION.some((tipo) => tipo === valor);
}

export function crearAlmacenNotificacionesMongo(): AlmacenNotificaciones {
  return {
    async crear(nueva) {
      await Notificacion.create(nueva);
    },

    async listarPorUsuario(usuarioId, { limite, soloNoLeidas = false }) {
      const filtro = soloNoLeidas ? { usuarioId, leida: false } : { usuarioId };
      const docs = await Notificacion.find(filtro).sort({ createdAt: -1, _id: -1 }).limit(limite).lean();
      return docs.map((doc): RegistroNotificacion => ({
        id: String(doc._id),
        usuarioId: String(doc.usuarioId),
        titulo: doc.titulo,
        mensaje: doc.mensaje,
        tipo: esTipoNotificacion(doc.tipo) ? doc.tipo : 'info',
        leida: Boolean(doc.leida),
        creadoEn: doc.createdAt
      }));
    },

    async marcarLeida(notificacionId, usuarioId, ahora) {
      const resultado = await Notificacion.updateOne(
        { _id: notificacionId, usuarioId },
        { $set: { leida: true, leidaEn: ahora } }
      );
      return resultado.matchedCount === 1;
    },

    async marcarTodasLeidas(usuarioId, ahora) {
      const resultado = await Notificacion.updateMany(
        { usuarioId, leida: false },
        { $set: { leida: true, leidaEn: ahora } }
      );
      return resultado.modifiedCount;
    }
  };
}
