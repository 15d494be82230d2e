import { BrandRow } from './brand-row.entity';
import { ReportPeriod } from './report-period.entity';

/**
 * Las tres métricas nacionales del boletín, siempre en este orden.
 */
export interface MetricTriple {
  readonly sales: number;
  readonly production: number;
  readonly exports: number;
}

export type PeriodSource = 'text' | 'filename';

export const ZERO_TRIPLE: MetricTriple = Object.freeze({
  sales: 0,
  production: 0,
  exports: 0,
});

/**
 * Reporte mensual extraído de un boletín RAIAVL.
 * Inmutable: se construye una sola vez y se congela completo
 * (tripletas, filas por marca y advertencias incluidas).
 */
export class MonthlyReport {
  /** Nombre del archivo de origen (ej: "raiavl_2025_11.pdf") */
  readonly sourceName: string;

  /** Periodo de los datos (no de publicación) */
  readonly period: ReportPeriod;

  /** "text" si salió de las menciones del boletín, "filename" si del nombre del archivo */
  readonly periodSource: PeriodSource;

  /** Totales nacionales del mes */
  readonly monthly: MetricTriple;

  /** Acumulado enero–mes del año actual */
  readonly yearToDate: MetricTriple;

  /** Variación anual (%) por métrica; 0 cuando el boletín no la menciona */
  readonly yearOverYearPct: MetricTriple;

  /** Filas por marca, en orden de primera aparición */
  readonly brandRows: readonly BrandRow[];

  /** Anotaciones para el llamador: bloques incompletos, periodo dudoso, etc. */
  readonly warnings: readonly string[];

  constructor(params: {
    sourceName: string;
    period: ReportPeriod;
    periodSource: PeriodSource;
    monthly: MetricTriple;
    yearToDate: MetricTriple;
    yearOverYearPct: MetricTriple;
    brandRows: BrandRow[];
    warnings: string[];
  }) {
    this.sourceName = params.sourceName;
    this.period = params.period;
    this.periodSource = params.periodSource;
    this.monthly = Object.freeze({ ...params.monthly });
    this.yearToDate = Object.freeze({ ...params.yearToDate });
    this.yearOverYearPct = Object.freeze({ ...params.yearOverYearPct });
    this.brandRows = Object.freeze([...params.brandRows]);
    this.warnings = Object.freeze([...params.warnings]);
    Object.freeze(this);
  }

  get periodKey(): string {
    return this.period.key;
  }

  /** Sin totales ni marcas: el boletín no trajo nada reconocible */
  get isEmpty(): boolean {
    return (
      this.monthly.sales === 0 &&
      this.monthly.production === 0 &&
      this.monthly.exports === 0 &&
      this.yearToDate.sales === 0 &&
      this.yearToDate.production === 0 &&
      this.yearToDate.exports === 0 &&
      this.brandRows.length === 0
    );
  }

  /** Resumen para logging */
  get summary(): string {
    const parts: string[] = [
      `period=${this.periodKey} (${this.periodSource})`,
      `sales=${this.monthly.sales}`,
      `production=${this.monthly.production}`,
      `exports=${this.monthly.exports}`,
    ];
    if (this.yearToDate.sales) parts.push(`ytdSales=${this.yearToDate.sales}`);
    if (this.brandRows.length) parts.push(`brands=${this.brandRows.length}`);
    if (this.warnings.length) parts.push(`warnings=${this.warnings.length}`);
    return `[${this.sourceName}] ${parts.join(', ')}`;
  }
}
