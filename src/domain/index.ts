export { ReportPeriod } from './entities/report-period.entity';
export { BrandRow } from './entities/brand-row.entity';
export { MonthlyReport, ZERO_TRIPLE } from './entities/monthly-report.entity';
export type { MetricTriple, PeriodSource } from './entities/monthly-report.entity';
export { PeriodUndeterminedError } from './errors/period-undetermined.error';
export { ExtractionError } from './errors/extraction.error';
export { TextSourceError } from './errors/text-source.error';
export { BULLETIN_TEXT_SOURCE_PORT } from './ports/bulletin-text-source.port';
export type { BulletinTextSourcePort, BulletinDocument } from './ports/bulletin-text-source.port';
