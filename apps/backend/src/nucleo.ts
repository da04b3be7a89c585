/**
 * Composicion del nucleo de asistencia.
 *
 * Todo recibe sus dependencias de forma explicita (almacenes, directorio y
 * notificador); no hay handles globales. `crearNucleoMongo` arma la version de
 * produccion a partir de la configuracion.
 */
import { configuracion } from './configuracion';
import type { PoliticaVentana } from './compartido/tipos/dominio';
import { crearNotificadorWebhook, type Notificador } from './infraestructura/notificaciones/notificadorWebhook';
import { crearAlmacenAlertasMongo, type AlmacenAlertas } from './modulos/modulo_alertas/almacenAlertas';
import { crearDespachador, type Despachador } from './modulos/modulo_alertas/servicioDespacho';
import { crearOrquestador, type Orquestador } from './modulos/modulo_alertas/servicioOrquestacion';
import { crearAlmacenAsistenciaMongo, type AlmacenAsistencia } from './modulos/modulo_asistencia/almacenAsistencia';
import { crearLibroAsistencia, type LibroAsistencia } from './modulos/modulo_asistencia/servicioLibroAsistencia';
import { crearServicioRegistro, type ServicioRegistro } from './modulos/modulo_asistencia/servicioRegistroAsistencia';
import { crearAgregador, type Agregador } from './modulos/modulo_cumplimiento/servicioAgregacion';
import { crearDirectorioMongo, type DirectorioAcademico } from './modulos/modulo_directorio/directorioAcademico';
import {
  crearAlmacenNotificacionesMongo,
  type AlmacenNotificaciones
} from './modulos/modulo_notificaciones/almacenNotificaciones';

export type OpcionesNucleo = {
  umbralGlobal: number;
  politicaVentana: PoliticaVentana;
  concurrencia: number;
  reservaExpiraMs: number;
  reloj: () => Date;
};

export type DependenciasNucleo = {
  almacenAsistencia: AlmacenAsistencia;
  almacenAlertas: AlmacenAlertas;
  almacenNotificaciones: AlmacenNotificaciones;
  directorio: DirectorioAcademico;
  notificador: Notificador;
  opciones?: Partial<OpcionesNucleo>;
};

export type NucleoAsistencia = {
  opciones: OpcionesNucleo;
  directorio: DirectorioAcademico;
  almacenAlertas: AlmacenAlertas;
  almacenNotificaciones: AlmacenNotificaciones;
  libro: LibroAsistencia;
  agregador: Agregador;
  despachador: Despachador;
  orquestador: Orquestador;
  registro: ServicioRegistro;
};

export function crearNucleoAsistencia({
  almacenAsistencia,
  almacenAlertas,
  almacenNotificaciones,
  directorio,
  notificador,
  opciones = {}
}: DependenciasNucleo): NucleoAsistencia {
  const efectivas: OpcionesNucleo = {
    umbralGlobal: configuracion.umbralAsistencia,
    politicaVentana: configuracion.politicaVentanaAlertas,
    concurrencia: configuracion.concurrenciaAlertas,
    reservaExpiraMs: configuracion.reservaAlertaExpiraMs,
    reloj: () => new Date(),
    ...opciones
  };

  const libro = crearLibroAsistencia(almacenAsistencia);
  const agregador = crearAgregador(almacenAsistencia);
  const despachador = crearDespachador({
    almacen: almacenAlertas,
    notificador,
    notificaciones: almacenNotificaciones,
    reservaExpiraMs: efectivas.reservaExpiraMs,
    reloj: efectivas.reloj
  });
  const orquestador = crearOrquestador({
    directorio,
    agregador,
    despachador,
    politicaVentana: efectivas.politicaVentana,
    umbralGlobal: efectivas.umbralGlobal,
    concurrencia: efectivas.concurrencia,
    reloj: efectivas.reloj
  });
  const registro = crearServicioRegistro({ directorio, libro, orquestador });

  return {
    opciones: efectivas,
    directorio,
    almacenAlertas,
    almacenNotificaciones,
    libro,
    agregador,
    despachador,
    orquestador,
    registro
  };
}

export function crearNucleoMongo(): NucleoAsistencia {
  return crearNucleoAsistencia({
    almacenAsistencia: crearAlmacenAsistenciaMongo(),
    almacenAlertas: crearAlmacenAlertasMongo(),
    almacenNotificaciones: crearAlmacenNotificacionesMongo(),
    directorio: crearDirectorioMongo(),
    notificador: crearNotificadorWebhook({
      url: configuracion.notificadorUrl,
      apiKey: configuracion.notificadorApiKey,
      timeoutMs: configuracion.notificadorTimeoutMs
    })
  });
}
