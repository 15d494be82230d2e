/**
 * Cifra de tabla: dígitos con espacios internos (separador de miles del boletín).
 * "98 765" → 98765. Necesita al menos dos dígitos, así que "5" nunca es cifra.
 */
const TABLE_NUMBER = /\d[\d\s]*\d/g;

/**
 * Valor con signo, entero o decimal. El espacio separa valores y la coma es separador de miles.
 * "1,350" → 1350, "-4.7" → -4.7
 */
const SIGNED_VALUE = /[+-]?\d[\d,]*(?:\.\d+)?/g;

/**
 * Extrae las cifras de un renglón de tabla, en orden.
 * "  98 765   104 321 " → [98765104321]  (los espacios internos se unen)
 * "Octubre 2025 p/" → [2025]
 */
export function extractTableNumbers(line: string): number[] {
  const matches = line.match(TABLE_NUMBER) ?? [];
  return matches.map((m) => parseInt(m.replace(/\s+/g, ''), 10));
}

/**
 * Extrae todos los valores con signo de un fragmento de texto.
 * Los que tienen punto decimal se leen como flotantes; el resto como enteros.
 */
export function extractSignedValues(text: string): number[] {
  const matches = text.match(SIGNED_VALUE) ?? [];
  return matches.map((m) => {
    const cleaned = m.replace(/,/g, '');
    return cleaned.includes('.') ? parseFloat(cleaned) : parseInt(cleaned, 10);
  });
}

/** Separa el documento en renglones (tolera finales CRLF) */
export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}
