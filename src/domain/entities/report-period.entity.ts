/**
 * Periodo (año + mes) al que corresponden las cifras de un boletín.
 * No es la fecha de publicación: los boletines salen un mes después.
 */
export class ReportPeriod {
  readonly year: number;
  readonly month: number;

  constructor(year: number, month: number) {
    this.year = year;
    this.month = month;
    Object.freeze(this);
  }

  /** "2025-10" */
  get key(): string {
    return `${this.year}-${String(this.month).padStart(2, '0')}`;
  }

  /** Mes calendario anterior (enero retrocede a diciembre del año previo) */
  previous(): ReportPeriod {
    return this.month > 1
      ? new ReportPeriod(this.year, this.month - 1)
      : new ReportPeriod(this.year - 1, 12);
  }

  /** Mes en [1,12] y año ≥ 2000 */
  get isPlausible(): boolean {
    return this.month >= 1 && this.month <= 12 && this.year >= 2000;
  }
}
