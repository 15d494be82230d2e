/**
 * Una fila de la tabla de ventas por marca.
 * Entidad de dominio, no depende de frameworks.
 */
export class BrandRow {
  /** Nombre de la marca tal como aparece en el vocabulario */
  readonly brand: string;

  /** Unidades del mismo mes, año anterior */
  readonly monthlyPrevious: number;

  /** Unidades del mes, año actual */
  readonly monthlyCurrent: number;

  readonly monthlyVariationPct: number;

  /** Acumulado enero–mes, año anterior */
  readonly ytdPrevious: number;

  /** Acumulado enero–mes, año actual */
  readonly ytdCurrent: number;

  readonly ytdVariationPct: number;

  constructor(params: {
    brand: string;
    monthlyPrevious?: number;
    monthlyCurrent?: number;
    monthlyVariationPct?: number;
    ytdPrevious?: number;
    ytdCurrent?: number;
    ytdVariationPct?: number;
  }) {
    this.brand = params.brand;
    this.monthlyPrevious = params.monthlyPrevious ?? 0;
    this.monthlyCurrent = params.monthlyCurrent ?? 0;
    this.monthlyVariationPct = params.monthlyVariationPct ?? 0;
    this.ytdPrevious = params.ytdPrevious ?? 0;
    this.ytdCurrent = params.ytdCurrent ?? 0;
    this.ytdVariationPct = params.ytdVariationPct ?? 0;
    Object.freeze(this);
  }
}
