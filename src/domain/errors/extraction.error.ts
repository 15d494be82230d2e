/**
 * Error que el ensamblador del reporte entrega al llamador.
 * Envuelve el error original del componente que falló (en `cause`).
 */
export class ExtractionError extends Error {
  constructor(
    readonly component: string,
    readonly sourceName: string,
    cause: Error,
  ) {
    super(`[${component}] ${cause.message}`, { cause });
    this.name = 'ExtractionError';
  }
}
