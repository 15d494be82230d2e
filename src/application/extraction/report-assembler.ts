import { MonthlyReport, ZERO_TRIPLE } from '../../domain/entities/monthly-report.entity';
import { ExtractionError } from '../../domain/errors/extraction.error';
import { PeriodUndeterminedError } from '../../domain/errors/period-undetermined.error';
import { splitLines } from '../../shared/utils/numeric-tokens';
import { monthDisplayName } from '../../shared/utils/spanish-months';
import { reconstructBrandTable } from './brand-table-reconstructor';
import { ExtractionConfig } from './extraction-config';
import { NumericBlockScan, scanMonthlyBlock, scanYearToDateBlock } from './numeric-block-scanner';
import { PeriodResolution, resolvePeriod } from './period-resolver';
import { extractYearOverYear } from './variation-extractor';

/**
 * Extrae el reporte mensual completo de un boletín ya convertido a texto.
 *
 * Función pura: mismo texto + misma configuración ⇒ reportes iguales.
 * Sólo falla cuando no se puede determinar el periodo; todo lo demás degrada
 * a ceros / lista vacía y queda anotado en `warnings`.
 *
 * @param text Texto completo del boletín (páginas en orden, saltos de línea preservados)
 * @param sourceName Nombre del archivo original (fallback del periodo)
 * @throws ExtractionError envolviendo un PeriodUndeterminedError
 */
export function extractMonthlyReport(
  text: string,
  sourceName: string,
  config: ExtractionConfig,
): MonthlyReport {
  const resolution = resolvePeriodOrFail(text, sourceName, config);
  const { period } = resolution;
  const warnings: string[] = [];

  if (!period.isPlausible) {
    warnings.push(`Periodo fuera de rango: ${period.key} (mes 1-12, año ≥ 2000)`);
  }

  const lines = splitLines(text);
  const monthName = monthDisplayName(period.month, config.monthNames);

  let monthlyScan: NumericBlockScan | null = null;
  let ytdScan: NumericBlockScan | null = null;
  if (monthName) {
    monthlyScan = scanMonthlyBlock(lines, monthName, config);
    ytdScan = scanYearToDateBlock(lines, monthName, config);
    warnings.push(...monthlyScan.warnings, ...ytdScan.warnings);
  } else {
    warnings.push(`El mes ${period.month} no está en la tabla de meses; no se leyeron las tablas`);
  }

  return new MonthlyReport({
    sourceName,
    period,
    periodSource: resolution.source,
    monthly: monthlyScan?.triple ?? ZERO_TRIPLE,
    yearToDate: ytdScan?.triple ?? ZERO_TRIPLE,
    yearOverYearPct: extractYearOverYear(text, config.variationKeywords),
    brandRows: reconstructBrandTable(lines, config.brandVocabulary),
    warnings,
  });
}

function resolvePeriodOrFail(
  text: string,
  sourceName: string,
  config: ExtractionConfig,
): PeriodResolution {
  try {
    return resolvePeriod(text, sourceName, config.monthNames);
  } catch (err) {
    if (err instanceof PeriodUndeterminedError) {
      throw new ExtractionError(err.component, sourceName, err);
    }
    throw err;
  }
}
