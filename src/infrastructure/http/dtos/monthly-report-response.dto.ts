import { ApiProperty } from '@nestjs/swagger';

// ──────────────────────────────────────────────────────────
// Response DTOs: solo para documentar la forma del JSON
// ──────────────────────────────────────────────────────────

export class PeriodDto {
  @ApiProperty({ example: 2025 })
  year!: number;

  @ApiProperty({ example: 10 })
  month!: number;

  @ApiProperty({ example: '2025-10' })
  key!: string;

  @ApiProperty({ enum: ['text', 'filename'], example: 'text' })
  source!: 'text' | 'filename';
}

export class MetricTripleDto {
  @ApiProperty({ example: 128930 })
  sales!: number;

  @ApiProperty({ example: 352114 })
  production!: number;

  @ApiProperty({ example: 301567 })
  exports!: number;
}

export class BrandRowDto {
  @ApiProperty({ example: 'Nissan' })
  brand!: string;

  @ApiProperty({ example: 21034 })
  monthlyPrevious!: number;

  @ApiProperty({ example: 20112 })
  monthlyCurrent!: number;

  @ApiProperty({ example: -4.4 })
  monthlyVariationPct!: number;

  @ApiProperty({ example: 198765 })
  ytdPrevious!: number;

  @ApiProperty({ example: 187654 })
  ytdCurrent!: number;

  @ApiProperty({ example: -5.6 })
  ytdVariationPct!: number;
}

export class MonthlyReportResponseDto {
  @ApiProperty({ example: 'raiavl_2025_11.pdf' })
  sourceName!: string;

  @ApiProperty({ type: PeriodDto })
  period!: PeriodDto;

  @ApiProperty({ type: MetricTripleDto, description: 'Totales nacionales del mes' })
  monthly!: MetricTripleDto;

  @ApiProperty({ type: MetricTripleDto, description: 'Acumulado enero–mes' })
  yearToDate!: MetricTripleDto;

  @ApiProperty({
    type: MetricTripleDto,
    description: 'Variación anual (%) por métrica; 0 si el boletín no la menciona',
  })
  yearOverYearPct!: MetricTripleDto;

  @ApiProperty({ type: [BrandRowDto] })
  brandRows!: BrandRowDto[];

  @ApiProperty({ example: ['Tabla acumulado: no se encontró la etiqueta "enero-octubre"'] })
  warnings!: string[];

  @ApiProperty({ example: '2026-02-13T10:30:00.000Z' })
  extractedAt!: string;
}

export class HealthResponseDto {
  @ApiProperty({ example: 'ok' })
  status!: string;

  @ApiProperty({ example: 31 })
  brands!: number;

  @ApiProperty({ example: { monthly: 1000, ytd: 10000 } })
  thresholds!: { monthly: number; ytd: number };

  @ApiProperty({ example: 15 })
  scanWindow!: number;

  @ApiProperty({ example: 10 })
  trailingGuard!: number;

  @ApiProperty({ example: '2026-02-13T10:30:00.000Z' })
  timestamp!: string;
}
