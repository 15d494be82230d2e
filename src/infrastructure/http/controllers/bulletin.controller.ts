import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  UnprocessableEntityException,
  UsePipes,
  ValidationPipe,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiSecurity, ApiTags } from '@nestjs/swagger';
import { Public } from '../../auth/public.decorator';
import { BulletinExtractionService } from '../../../application/services/bulletin-extraction.service';
import { ExtractionError, MonthlyReport, TextSourceError } from '../../../domain';
import { ExtractPdfDto, ExtractTextDto } from '../dtos/extract-bulletin.dto';
import {
  HealthResponseDto,
  MonthlyReportResponseDto,
} from '../dtos/monthly-report-response.dto';

@ApiTags('Bulletins')
@ApiSecurity('x-api-key')
@Controller('bulletins')
@UsePipes(new ValidationPipe({ transform: true, whitelist: true }))
export class BulletinController {
  private readonly logger = new Logger(BulletinController.name);

  constructor(private readonly extraction: BulletinExtractionService) {}

  /**
   * POST /bulletins/extract
   * Extrae el reporte de un boletín que ya viene como texto.
   */
  @Post('extract')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Extraer reporte mensual desde texto',
    description:
      'Dado el texto plano del boletín RAIAVL, devuelve:\n' +
      '- periodo de los datos (no de publicación)\n' +
      '- ventas, producción y exportación del mes y acumuladas\n' +
      '- variación anual (%) de cada métrica\n' +
      '- tabla por marca\n\n' +
      'Las secciones que falten quedan en cero y se anotan en `warnings`.',
  })
  @ApiResponse({ status: 200, type: MonthlyReportResponseDto })
  @ApiResponse({ status: 422, description: 'No se pudo determinar el periodo' })
  extractText(@Body() dto: ExtractTextDto): MonthlyReportResponseDto {
    this.logger.log(`📝 Extract text: ${dto.sourceName} (${dto.text.length} chars)`);

    try {
      return this.mapReport(
        this.extraction.extractFromText(dto.text, dto.sourceName, dto.brandVocabulary),
      );
    } catch (err) {
      throw this.toHttpError(err);
    }
  }

  /**
   * POST /bulletins/extract-pdf
   * PDF en base64 → texto (pdf2json) → reporte.
   */
  @Post('extract-pdf')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Extraer reporte mensual desde el PDF del boletín',
    description:
      'Recibe el PDF en base64, lo convierte a texto renglón por renglón ' +
      'y aplica la misma extracción que `/bulletins/extract`.',
  })
  @ApiResponse({ status: 200, type: MonthlyReportResponseDto })
  @ApiResponse({ status: 400, description: 'El PDF no se pudo leer' })
  @ApiResponse({ status: 422, description: 'No se pudo determinar el periodo' })
  async extractPdf(@Body() dto: ExtractPdfDto): Promise<MonthlyReportResponseDto> {
    this.logger.log(`📄 Extract PDF: ${dto.fileName}`);

    try {
      const report = await this.extraction.extractFromDocument(
        { fileName: dto.fileName, data: Buffer.from(dto.contentBase64, 'base64') },
        dto.brandVocabulary,
      );
      return this.mapReport(report);
    } catch (err) {
      throw this.toHttpError(err);
    }
  }

  /**
   * GET /bulletins/health
   * Healthcheck público con la configuración vigente.
   */
  @Get('health')
  @Public()
  @ApiOperation({ summary: 'Health check + configuración de extracción' })
  @ApiResponse({ status: 200, type: HealthResponseDto })
  health(): HealthResponseDto {
    const settings = this.extraction.settings;
    return {
      status: 'ok',
      brands: settings.brandVocabulary.length,
      thresholds: { monthly: settings.monthlyMinMagnitude, ytd: settings.ytdMinMagnitude },
      scanWindow: settings.scanWindow,
      trailingGuard: settings.trailingGuard,
      timestamp: new Date().toISOString(),
    };
  }

  // ──────────────────────────────────────────────────────────

  private toHttpError(err: unknown): unknown {
    if (err instanceof ExtractionError) {
      return new UnprocessableEntityException({
        message: err.message,
        component: err.component,
        sourceName: err.sourceName,
      });
    }
    if (err instanceof TextSourceError) {
      return new BadRequestException({ message: err.message, fileName: err.fileName });
    }
    return err;
  }

  private mapReport(report: MonthlyReport): MonthlyReportResponseDto {
    return {
      sourceName: report.sourceName,
      period: {
        year: report.period.year,
        month: report.period.month,
        key: report.periodKey,
        source: report.periodSource,
      },
      monthly: { ...report.monthly },
      yearToDate: { ...report.yearToDate },
      yearOverYearPct: { ...report.yearOverYearPct },
      brandRows: report.brandRows.map((row) => ({
        brand: row.brand,
        monthlyPrevious: row.monthlyPrevious,
        monthlyCurrent: row.monthlyCurrent,
        monthlyVariationPct: row.monthlyVariationPct,
        ytdPrevious: row.ytdPrevious,
        ytdCurrent: row.ytdCurrent,
        ytdVariationPct: row.ytdVariationPct,
      })),
      warnings: [...report.warnings],
      extractedAt: new Date().toISOString(),
    };
  }
}
