/**
 * Meses en español → número de mes.
 * Las claves van en minúsculas; el nombre "de tabla" es la clave capitalizada.
 */
export const SPANISH_MONTHS: Readonly<Record<string, number>> = Object.freeze({
  enero: 1,
  febrero: 2,
  marzo: 3,
  abril: 4,
  mayo: 5,
  junio: 6,
  julio: 7,
  agosto: 8,
  septiembre: 9,
  octubre: 10,
  noviembre: 11,
  diciembre: 12,
});

/** Escapa un literal para usarlo dentro de un RegExp */
export function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Nombre del mes tal como aparece como etiqueta de fila en las tablas.
 * 10 → "Octubre". Si la tabla tiene sinónimos (setiembre/septiembre) gana el primero.
 * Devuelve null si el número no está en la tabla.
 */
export function monthDisplayName(
  month: number,
  monthNames: Readonly<Record<string, number>> = SPANISH_MONTHS,
): string | null {
  const entry = Object.entries(monthNames).find(([, n]) => n === month);
  if (!entry) return null;
  const [name] = entry;
  return name.charAt(0).toUpperCase() + name.slice(1);
}

/**
 * Regex global para menciones "<mes> [de] <año>".
 * Se aplica sobre texto en minúsculas: "10 de noviembre de 2025" → ("noviembre", "2025").
 * Los nombres largos van primero para que la alternancia no corte un sinónimo.
 */
export function buildMonthYearPattern(
  monthNames: Readonly<Record<string, number>> = SPANISH_MONTHS,
): RegExp {
  const alternatives = Object.keys(monthNames)
    .map((name) => name.toLowerCase())
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|');
  return new RegExp(`(${alternatives})\\s+(?:de\\s+)?(\\d{4})`, 'g');
}
