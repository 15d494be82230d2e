import { Injectable, Inject, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  BulletinDocument,
  BulletinTextSourcePort,
  BULLETIN_TEXT_SOURCE_PORT,
  ExtractionError,
  MonthlyReport,
} from '../../domain';
import { buildExtractionConfig, ExtractionConfig, extractMonthlyReport } from '../extraction';

/**
 * Servicio que expone la extracción del boletín a la capa HTTP.
 *
 * Flujo:
 *   1. (opcional) PDF → texto, vía el adaptador de texto
 *   2. Texto → MonthlyReport, con la configuración armada desde `bulletin.*`
 *   3. Log del resumen y de cada advertencia
 *
 * La configuración se arma una vez al construir el servicio; un vocabulario
 * de marcas enviado en el request arma una configuración nueva sólo para esa llamada.
 */
@Injectable()
export class BulletinExtractionService {
  private readonly logger = new Logger(BulletinExtractionService.name);
  private readonly defaults: ExtractionConfig;

  constructor(
    private readonly config: ConfigService,
    @Inject(BULLETIN_TEXT_SOURCE_PORT)
    private readonly textSource: BulletinTextSourcePort,
  ) {
    this.defaults = buildExtractionConfig({
      brandVocabulary: this.config.get<string[]>('bulletin.brandVocabulary'),
      monthlyMinMagnitude: this.config.get<number>('bulletin.thresholds.monthly'),
      ytdMinMagnitude: this.config.get<number>('bulletin.thresholds.ytd'),
      scanWindow: this.config.get<number>('bulletin.scanWindow'),
      trailingGuard: this.config.get<number>('bulletin.trailingGuard'),
    });
  }

  /** Configuración vigente (para /health) */
  get settings(): ExtractionConfig {
    return this.defaults;
  }

  /**
   * Extrae el reporte de un boletín ya convertido a texto.
   * @throws ExtractionError si no se puede determinar el periodo
   */
  extractFromText(
    text: string,
    sourceName: string,
    brandVocabulary?: string[],
  ): MonthlyReport {
    const config = brandVocabulary?.length
      ? buildExtractionConfig({ ...this.defaults, brandVocabulary })
      : this.defaults;

    let report: MonthlyReport;
    try {
      report = extractMonthlyReport(text, sourceName, config);
    } catch (err) {
      if (err instanceof ExtractionError) {
        this.logger.error(`❌ ${sourceName}: ${err.message}`);
      }
      throw err;
    }

    this.logger.log(`📊 ${report.summary}`);
    for (const warning of report.warnings) {
      this.logger.warn(`⚠️  ${sourceName}: ${warning}`);
    }

    return report;
  }

  /**
   * Convierte el documento a texto con el adaptador y extrae el reporte.
   * @throws TextSourceError si el documento no se puede leer
   * @throws ExtractionError si no se puede determinar el periodo
   */
  async extractFromDocument(
    document: BulletinDocument,
    brandVocabulary?: string[],
  ): Promise<MonthlyReport> {
    this.logger.log(`📄 Leyendo ${document.fileName} (${document.data.length} bytes)`);
    const text = await this.textSource.readText(document);
    return this.extractFromText(text, document.fileName, brandVocabulary);
  }
}
