import { registerAs } from '@nestjs/config';
import defaultBrandVocabulary from '../data/brand-vocabulary.json';

/** "Nissan, KIA ,,Toyota" → ["Nissan", "KIA", "Toyota"] */
function parseList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

export const bulletinConfig = registerAs('bulletin', () => ({
  /** Puerto del microservicio */
  port: parseInt(process.env.BULLETIN_PORT || '3458', 10),

  /** API key para el header x-api-key (vacía = se rechazan los endpoints protegidos) */
  apiKey: process.env.API_KEY || '',

  /** Límite del body JSON (MB); los PDFs llegan en base64 */
  maxPdfMb: parseInt(process.env.MAX_PDF_MB || '20', 10),

  /** Umbrales de magnitud para filtrar ruido (números de página, notas, fechas) */
  thresholds: {
    monthly: parseInt(process.env.MONTHLY_MIN_MAGNITUDE || '1000', 10),
    ytd: parseInt(process.env.YTD_MIN_MAGNITUDE || '10000', 10),
  },

  /** Renglones que se leen después de la etiqueta de una tabla */
  scanWindow: parseInt(process.env.SCAN_WINDOW || '15', 10),

  /** Renglones finales del documento donde se ignoran etiquetas (índice, pie) */
  trailingGuard: parseInt(process.env.TRAILING_GUARD || '10', 10),

  /** Vocabulario de marcas, en orden de prioridad */
  brandVocabulary: parseList(process.env.BULLETIN_BRANDS) ?? [...defaultBrandVocabulary],
}));

export type BulletinConfig = ReturnType<typeof bulletinConfig>;
