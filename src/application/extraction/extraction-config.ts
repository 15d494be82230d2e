import defaultBrandVocabulary from '../../shared/data/brand-vocabulary.json';
import { SPANISH_MONTHS } from '../../shared/utils/spanish-months';

/** Palabra clave que ancla la variación anual de cada métrica */
export interface VariationKeywords {
  readonly sales: string;
  readonly production: string;
  readonly exports: string;
}

/**
 * Configuración de la extracción. La construye el llamador y se pasa explícita
 * a cada llamada: el núcleo no lee estado global.
 */
export interface ExtractionConfig {
  /** Marcas reconocidas; el orden define la prioridad cuando una es prefijo de otra */
  readonly brandVocabulary: readonly string[];

  /** Nombre de mes en minúsculas → 1..12 */
  readonly monthNames: Readonly<Record<string, number>>;

  readonly variationKeywords: VariationKeywords;

  /** Piso (exclusivo) para cifras de la tabla mensual */
  readonly monthlyMinMagnitude: number;

  /** Piso (exclusivo) para cifras de la tabla acumulada */
  readonly ytdMinMagnitude: number;

  /** Renglones leídos después de una etiqueta de tabla */
  readonly scanWindow: number;

  /** Renglones finales donde una etiqueta no cuenta */
  readonly trailingGuard: number;
}

export const DEFAULT_VARIATION_KEYWORDS: VariationKeywords = Object.freeze({
  sales: 'ventas',
  production: 'producción',
  exports: 'exportación',
});

/**
 * Arma una configuración completa a partir de valores parciales.
 * Los campos ausentes (o undefined) toman el valor por defecto.
 * El vocabulario se limpia: sin vacíos, sin duplicados, conservando el orden.
 */
export function buildExtractionConfig(overrides: Partial<ExtractionConfig> = {}): ExtractionConfig {
  const vocabulary = overrides.brandVocabulary ?? defaultBrandVocabulary;
  const brandVocabulary = [
    ...new Set(vocabulary.map((brand) => brand.trim()).filter((brand) => brand.length > 0)),
  ];

  return Object.freeze({
    brandVocabulary: Object.freeze(brandVocabulary),
    monthNames: Object.freeze({ ...(overrides.monthNames ?? SPANISH_MONTHS) }),
    variationKeywords: Object.freeze({
      ...(overrides.variationKeywords ?? DEFAULT_VARIATION_KEYWORDS),
    }),
    monthlyMinMagnitude: overrides.monthlyMinMagnitude ?? 1000,
    ytdMinMagnitude: overrides.ytdMinMagnitude ?? 10000,
    scanWindow: overrides.scanWindow ?? 15,
    trailingGuard: overrides.trailingGuard ?? 10,
  });
}
