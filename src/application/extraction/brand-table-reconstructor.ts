import { BrandRow } from '../../domain/entities/brand-row.entity';
import { extractSignedValues } from '../../shared/utils/numeric-tokens';

/** Mínimo de valores para aceptar una fila de marca */
export const MIN_BRAND_TOKENS = 4;

/**
 * Lee una fila "<marca> v1 v2 … v6".
 * Posiciones: [mes año anterior, mes año actual, var. %, acumulado anterior, acumulado actual, var. %].
 * Con 4 o 5 valores los campos faltantes quedan en 0. Con menos de 4 devuelve null.
 */
export function parseBrandLine(line: string, brand: string): BrandRow | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith(brand)) return null;

  const values = extractSignedValues(trimmed.slice(brand.length));
  if (values.length < MIN_BRAND_TOKENS) return null;

  const units = (index: number): number | undefined =>
    index < values.length ? Math.trunc(values[index]) : undefined;
  const pct = (index: number): number | undefined =>
    index < values.length ? values[index] : undefined;

  return new BrandRow({
    brand,
    monthlyPrevious: units(0),
    monthlyCurrent: units(1),
    monthlyVariationPct: pct(2),
    ytdPrevious: units(3),
    ytdCurrent: units(4),
    ytdVariationPct: pct(5),
  });
}

/**
 * Reconstruye la tabla por marca recorriendo todos los renglones.
 *
 * En cada renglón, la primera marca del vocabulario (en su orden) que es
 * prefijo del renglón se queda con él; así "Kia Motors" antes que "Kia"
 * resuelve la ambigüedad. Una marca que ya tiene fila ignora los renglones
 * siguientes (subtotales repetidos, notas al pie). Los renglones con pocos
 * valores se descartan sin error.
 */
export function reconstructBrandTable(
  lines: readonly string[],
  brandVocabulary: readonly string[],
): BrandRow[] {
  const rows: BrandRow[] = [];
  const seen = new Set<string>();

  for (const line of lines) {
    const trimmed = line.trim();
    const brand = brandVocabulary.find((candidate) => trimmed.startsWith(candidate));
    if (!brand || seen.has(brand)) continue;

    const row = parseBrandLine(trimmed, brand);
    if (row) {
      rows.push(row);
      seen.add(brand);
    }
  }

  return rows;
}
