import { MetricTriple } from '../../domain/entities/monthly-report.entity';
import { escapeRegExp } from '../../shared/utils/spanish-months';
import { VariationKeywords } from './extraction-config';

/**
 * Primer "<palabra clave> … <número con signo>%" de todo el texto.
 *
 * No se ancla a un párrafo: la variación suele venir en prosa libre,
 * cerca pero no pegada a la palabra clave, y puede cruzar saltos de línea.
 * "Las ventas internas … registraron una caída de -3.2 %" → -3.2
 * Sin coincidencia devuelve 0.
 */
export function extractVariation(text: string, keyword: string): number {
  const pattern = new RegExp(`${escapeRegExp(keyword)}[\\s\\S]*?([+-]?\\d+\\.?\\d*)\\s*%`, 'i');
  const match = text.match(pattern);
  if (!match) return 0;

  const value = parseFloat(match[1]);
  return Number.isNaN(value) ? 0 : value;
}

/** Variación anual de las tres métricas */
export function extractYearOverYear(text: string, keywords: VariationKeywords): MetricTriple {
  return {
    sales: extractVariation(text, keywords.sales),
    production: extractVariation(text, keywords.production),
    exports: extractVariation(text, keywords.exports),
  };
}
