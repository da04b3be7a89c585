/**
 * Pool acotado de trabajadores.
 *
 * - A lo mas `limite` tareas en vuelo.
 * - Si `senal` se aborta, ningun trabajador toma un elemento nuevo; lo ya hecho se conserva.
 * - Si una tarea falla, los demas dejan de tomar elementos y la promesa se rechaza con ese error.
 */
export async function ejecutarConLimite<T, R>(
  elementos: readonly T[],
  limite: number,
  tarea: (elemento: T) => Promise<R>,
  senal?: AbortSignal
): Promise<{ resultados: R[]; cancelado: boolean }> {
  const resultados: R[] = [];
  let siguiente = 0;
  let detenido = false;

  async function trabajador() {
    while (!detenido && siguiente < elementos.length) {
      if (senal?.aborted) return;
      const elemento = elementos[siguiente];
      siguiente += 1;
      try {
        resultados.push(await tarea(elemento));
      } catch (error) {
        detenido = true;
        throw error;
      }
    }
  }

  const cantidad = Math.max(1, Math.min(Math.trunc(limite) || 1, elementos.length));
  await Promise.all(Array.from({ length: cantidad }, () => trabajador()));

  return { resultados, cancelado: Boolean(senal?.aborted) && resultados.length < elementos.length };
}
