import { MetricTriple, ZERO_TRIPLE } from '../../domain/entities/monthly-report.entity';
import { extractTableNumbers } from '../../shared/utils/numeric-tokens';
import { ExtractionConfig } from './extraction-config';

/**
 * Estados del escaneo de una tabla:
 *   seeking-label → collecting-tokens → done
 * Un bloque con menos de 6 cifras vuelve a seeking-label (puede haber otra
 * aparición de la etiqueta más abajo con la tabla completa).
 */
export type ScanState = 'seeking-label' | 'collecting-tokens' | 'done';

/** Cifras por fila: año anterior (ventas, producción, exportación) + año actual */
export const ROW_ARITY = 6;

/**
 * Reglas de una tabla concreta (mensual o acumulada).
 */
export interface NumericBlockRule {
  /** Nombre para las advertencias ("mensual", "acumulado") */
  name: string;

  /** Etiqueta buscada, sólo para mensajes */
  label: string;

  isLabel(line: string): boolean;

  /** Último renglón del bloque: sus cifras se leen y ahí se cierra */
  isTerminator(line: string): boolean;

  /** Sólo se aceptan cifras estrictamente mayores */
  minMagnitude: number;
}

export interface ScanWindow {
  /** Renglones leídos después de la etiqueta */
  window: number;

  /** Renglones finales donde la etiqueta se ignora */
  trailingGuard: number;
}

export interface NumericBlockScan {
  state: ScanState;
  triple: MetricTriple;

  /** Índice (0-based) del renglón de la etiqueta usada, o null */
  labelLine: number | null;

  /** Cifras del bloque aceptado (o del último bloque incompleto) */
  tokens: number[];

  warnings: string[];
}

/**
 * Escanea el documento buscando una tabla numérica sin delimitadores.
 *
 * Tras la etiqueta se leen hasta `window` renglones y se juntan las cifras que
 * superan `minMagnitude`; las menores (notas al pie, páginas) se descartan.
 * La primera fila completa manda: índices 3, 4 y 5 son ventas, producción y
 * exportación del año actual.
 */
export function scanNumericBlock(
  lines: readonly string[],
  rule: NumericBlockRule,
  options: ScanWindow,
): NumericBlockScan {
  const warnings: string[] = [];
  const labelLimit = lines.length - options.trailingGuard;

  let state: ScanState = 'seeking-label';
  let labelLine = -1;
  let tokens: number[] = [];
  let i = 0;

  // Cierra el bloque actual: completo → done; incompleto → advertencia y se
  // sigue buscando desde el renglón siguiente a la etiqueta
  const closeBlock = (): ScanState => {
    if (tokens.length >= ROW_ARITY) return 'done';
    warnings.push(
      `Tabla ${rule.name}: la etiqueta "${rule.label}" (renglón ${labelLine + 1}) ` +
        `tiene ${tokens.length} cifras, se esperaban ${ROW_ARITY}`,
    );
    i = labelLine + 1;
    return 'seeking-label';
  };

  while (state !== 'done') {
    if (i >= lines.length) {
      if (state !== 'collecting-tokens') break;
      state = closeBlock();
      continue;
    }

    if (state === 'seeking-label') {
      if (i < labelLimit && rule.isLabel(lines[i])) {
        labelLine = i;
        tokens = [];
        state = 'collecting-tokens';
      }
      i++;
      continue;
    }

    // collecting-tokens
    if (i > labelLine + options.window) {
      state = closeBlock();
      continue;
    }
    const line = lines[i];
    for (const value of extractTableNumbers(line)) {
      if (value > rule.minMagnitude) tokens.push(value);
    }
    i++;
    if (rule.isTerminator(line)) state = closeBlock();
  }

  if (state !== 'done') {
    if (labelLine < 0) {
      warnings.push(`Tabla ${rule.name}: no se encontró la etiqueta "${rule.label}"`);
    }
    return {
      state,
      triple: ZERO_TRIPLE,
      labelLine: labelLine < 0 ? null : labelLine,
      tokens,
      warnings,
    };
  }

  return {
    state,
    triple: { sales: tokens[3], production: tokens[4], exports: tokens[5] },
    labelLine,
    tokens,
    warnings,
  };
}

type BlockOptions = Pick<ExtractionConfig, 'scanWindow' | 'trailingGuard'>;

/**
 * Fila del mes: un renglón que dice exactamente el mes ("Octubre").
 * Termina donde empieza el bloque acumulado ("Enero-Octubre").
 */
export function scanMonthlyBlock(
  lines: readonly string[],
  monthName: string,
  config: BlockOptions & Pick<ExtractionConfig, 'monthlyMinMagnitude'>,
): NumericBlockScan {
  return scanNumericBlock(
    lines,
    {
      name: 'mensual',
      label: monthName,
      isLabel: (line) => line.trim() === monthName,
      isTerminator: (line) => line.includes('Enero-'),
      minMagnitude: config.monthlyMinMagnitude,
    },
    { window: config.scanWindow, trailingGuard: config.trailingGuard },
  );
}

/**
 * Fila acumulada: el primer renglón que contiene "enero-<mes>" (sin importar mayúsculas).
 * Termina en la nota al pie ("1/") o en la cita de la fuente ("Fuente").
 */
export function scanYearToDateBlock(
  lines: readonly string[],
  monthName: string,
  config: BlockOptions & Pick<ExtractionConfig, 'ytdMinMagnitude'>,
): NumericBlockScan {
  const label = `enero-${monthName.toLowerCase()}`;
  return scanNumericBlock(
    lines,
    {
      name: 'acumulado',
      label,
      isLabel: (line) => line.trim().toLowerCase().includes(label),
      isTerminator: (line) => line.includes('1/') || line.includes('Fuente'),
      minMagnitude: config.ytdMinMagnitude,
    },
    { window: config.scanWindow, trailingGuard: config.trailingGuard },
  );
}
