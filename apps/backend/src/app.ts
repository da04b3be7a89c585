/**
 * Crea la app HTTP (Express) del backend.
 *
 * Principios:
 * - Seguridad por defecto (cabeceras, rate-limit)
 * - Validación en modulos (Zod) y error envelope consistente
 * - Sin side-effects al importar (fácil de testear): el nucleo se inyecta
 */
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { configuracion } from './configuracion';
import { crearRouterApi } from './rutas';
import { manejadorErrores } from './compartido/errores/manejadorErrores';
import { crearNucleoMongo, type NucleoAsistencia } from './nucleo';

export function crearApp(nucleo: NucleoAsistencia = crearNucleoMongo()) {
  const app = express();

  app.disable('x-powered-by');

  app.use(helmet());
  app.use(cors({ origin: configuracion.corsOrigenes, credentials: true }));
  app.use(express.json({ limit: configuracion.limiteJson }));
  app.use(
    rateLimit({
      windowMs: configuracion.rateLimitWindowMs,
      limit: configuracion.rateLimitLimit,
      standardHeaders: true,
      legacyHeaders: false
    })
  );

  app.use('/api', crearRouterApi(nucleo));

  app.use(manejadorErrores);

  return app;
}
