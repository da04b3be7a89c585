// Nucleo armado sobre almacenes en memoria y un notificador falso.
import { vi } from 'vitest';
import type { AvisoAsistencia } from '../../src/infraestructura/notificaciones/notificadorWebhook';
import type { AlumnoDirectorio, CursoDirectorio } from '../../src/modulos/modulo_directorio/directorioAcademico';
import { crearNucleoAsistencia, type OpcionesNucleo } from '../../src/nucleo';
import {
  crearAlmacenAlertasMemoria,
  crearAlmacenAsistenciaMemoria,
  crearAlmacenNotificacionesMemoria,
  crearDirectorioMemoria
} from './almacenesMemoria';

export const IDS = {
  admin: '64b000000000000000000001',
  docente: '64b000000000000000000002',
  otroDocente: '64b000000000000000000003',
  curso: '64c000000000000000000001',
  cursoInactivo: '64c000000000000000000002',
  ana: '64a000000000000000000001',
  beto: '64a000000000000000000002',
  carla: '64a000000000000000000003'
} as const;

export function cursoPrueba(parcial: Partial<CursoDirectorio> = {}): CursoDirectorio {
  return { id: IDS.curso, nombre: 'Algebra', docenteId: IDS.docente, activo: true, ...parcial };
}

export function alumnoPrueba(id: string, nombreCompleto: string, activo = true): AlumnoDirectorio {
  return { id, nombreCompleto, correo: `${nombreCompleto.toLowerCase().replace(/\s+/g, '.')}@escuela.test`, activo };
}

export function alumnosPrueba(): AlumnoDirectorio[] {
  return [
    alumnoPrueba(IDS.ana, 'Ana Lopez'),
    alumnoPrueba(IDS.beto, 'Beto Ruiz'),
    alumnoPrueba(IDS.carla, 'Carla Diaz')
  ];
}

export function crearNotificadorFalso(respuesta: (aviso: AvisoAsistencia) => Promise<boolean> = async () => true) {
  const avisos: AvisoAsistencia[] = [];
  const enviar = vi.fn(async (aviso: AvisoAsistencia) => {
    avisos.push(aviso);
    return respuesta(aviso);
  });
  return { avisos, enviar };
}

// Reloj fijo: 2024-03-20 al mediodia local.
export const AHORA = new Date(2024, 2, 20, 12, 0, 0);

export function crearNucleoPrueba({
  cursos = [cursoPrueba(), cursoPrueba({ id: IDS.cursoInactivo, nombre: 'Historia', activo: false })],
  alumnos = alumnosPrueba(),
  notificador = crearNotificadorFalso(),
  latenciaAlertasMs = 0,
  opciones = {}
}: {
  cursos?: CursoDirectorio[];
  alumnos?: AlumnoDirectorio[];
  notificador?: ReturnType<typeof crearNotificadorFalso>;
  latenciaAlertasMs?: number;
  opciones?: Partial<OpcionesNucleo>;
} = {}) {
  const almacenAsistencia = crearAlmacenAsistenciaMemoria();
  const almacenAlertas = crearAlmacenAlertasMemoria({ latenciaMs: latenciaAlertasMs });
  const almacenNotificaciones = crearAlmacenNotificacionesMemoria({ reloj: () => AHORA });
  const directorio = crearDirectorioMemoria({ cursos, alumnos });

  const nucleo = crearNucleoAsistencia({
    almacenAsistencia,
    almacenAlertas,
    almacenNotificaciones,
    directorio,
    notificador,
    opciones: {
      umbralGlobal: 75,
      politicaVentana: { modo: 'movil', dias: 15 },
      concurrencia: 4,
      reservaExpiraMs: 60_000,
      reloj: () => AHORA,
      ...opciones
    }
  });

  return { nucleo, almacenAsistencia, almacenAlertas, almacenNotificaciones, directorio, notificador };
}
