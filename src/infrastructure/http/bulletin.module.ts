import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { BulletinController } from './controllers/bulletin.controller';
import { BulletinExtractionService } from '../../application/services/bulletin-extraction.service';
import { PdfTextSourceAdapter } from '../adapters/pdf-text-source.adapter';
import { BULLETIN_TEXT_SOURCE_PORT } from '../../domain/ports/bulletin-text-source.port';

@Module({
  imports: [ConfigModule],
  controllers: [BulletinController],
  providers: [
    // Adaptador de texto (implementa BulletinTextSourcePort) con pdf2json, sin disco
    {
      provide: BULLETIN_TEXT_SOURCE_PORT,
      useClass: PdfTextSourceAdapter,
    },
    // Servicios de aplicación
    BulletinExtractionService,
  ],
  exports: [BulletinExtractionService],
})
export class BulletinModule {}
