/**
 * Ni el texto del boletín ni el nombre del archivo permitieron
 * determinar el periodo de los datos. Es el único fallo fatal de la extracción.
 */
export class PeriodUndeterminedError extends Error {
  readonly component = 'PeriodResolver';

  constructor(readonly sourceName: string) {
    super(`No se pudo determinar el periodo de "${sourceName}" (ni texto ni nombre de archivo)`);
    this.name = 'PeriodUndeterminedError';
  }
}
