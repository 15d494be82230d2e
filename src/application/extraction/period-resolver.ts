import * as path from 'path';
import { PeriodSource } from '../../domain/entities/monthly-report.entity';
import { ReportPeriod } from '../../domain/entities/report-period.entity';
import { PeriodUndeterminedError } from '../../domain/errors/period-undetermined.error';
import { buildMonthYearPattern } from '../../shared/utils/spanish-months';

export interface MonthYearMention {
  monthName: string;
  month: number;
  year: number;
}

export interface PeriodResolution {
  period: ReportPeriod;
  /** De dónde salió el periodo: menciones en el texto o nombre del archivo */
  source: PeriodSource;
}

/**
 * Todas las menciones "<mes> [de] <año>" del texto, en orden y con duplicados.
 */
export function findMonthYearMentions(
  text: string,
  monthNames: Readonly<Record<string, number>>,
): MonthYearMention[] {
  const pattern = buildMonthYearPattern(monthNames);
  const mentions: MonthYearMention[] = [];

  for (const match of text.toLowerCase().matchAll(pattern)) {
    const monthName = match[1];
    mentions.push({
      monthName,
      month: monthNames[monthName] ?? 0,
      year: parseInt(match[2], 10),
    });
  }

  return mentions;
}

/**
 * Periodo de datos a partir del nombre del archivo.
 * "raiavl_2025_11.pdf" es el boletín publicado en noviembre → datos de octubre 2025.
 * "raiavl_2025_01" → diciembre 2024.
 */
export function periodFromFileName(sourceName: string): ReportPeriod | null {
  const stem = path.parse(path.basename(sourceName)).name;
  const match = stem.match(/(\d{4})_(\d{2})/);
  if (!match) return null;

  const publicationMonth = parseInt(match[2], 10);
  if (publicationMonth < 1 || publicationMonth > 12) return null;

  return new ReportPeriod(parseInt(match[1], 10), publicationMonth).previous();
}

/**
 * Determina el periodo (año, mes) de los datos del boletín.
 *
 * El boletín abre con la fecha de publicación ("a 10 de noviembre de 2025")
 * y luego menciona el mes de los datos ("cifras de octubre de 2025"),
 * así que con dos o más menciones gana la segunda. Con una sola, esa.
 * Sin menciones se usa el nombre del archivo.
 *
 * @throws PeriodUndeterminedError si no hay menciones ni patrón YYYY_MM en el nombre
 */
export function resolvePeriod(
  text: string,
  sourceName: string,
  monthNames: Readonly<Record<string, number>>,
): PeriodResolution {
  const mentions = findMonthYearMentions(text, monthNames);
  const chosen = mentions.length >= 2 ? mentions[1] : mentions[0];
  if (chosen) {
    return { period: new ReportPeriod(chosen.year, chosen.month), source: 'text' };
  }

  const fromFile = periodFromFileName(sourceName);
  if (fromFile) {
    return { period: fromFile, source: 'filename' };
  }

  throw new PeriodUndeterminedError(sourceName);
}
