export { extractMonthlyReport } from './report-assembler';
export { buildExtractionConfig, DEFAULT_VARIATION_KEYWORDS } from './extraction-config';
export type { ExtractionConfig, VariationKeywords } from './extraction-config';
export { resolvePeriod, findMonthYearMentions, periodFromFileName } from './period-resolver';
export type { PeriodResolution, MonthYearMention } from './period-resolver';
export { scanNumericBlock, scanMonthlyBlock, scanYearToDateBlock, ROW_ARITY } from './numeric-block-scanner';
export type { NumericBlockRule, NumericBlockScan, ScanState, ScanWindow } from './numeric-block-scanner';
export { extractVariation, extractYearOverYear } from './variation-extractor';
export { reconstructBrandTable, parseBrandLine, MIN_BRAND_TOKENS } from './brand-table-reconstructor';
