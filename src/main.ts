import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestExpressApplication } from '@nestjs/platform-express';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: ['log', 'error', 'warn', 'debug'],
  });
  const config = app.get(ConfigService);

  // Los PDFs llegan en base64 dentro del JSON
  const maxPdfMb = config.get<number>('bulletin.maxPdfMb', 20);
  app.useBodyParser('json', { limit: `${maxPdfMb}mb` });

  // Validación global (class-validator)
  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
      forbidNonWhitelisted: true,
      transformOptions: { enableImplicitConversion: true },
    }),
  );

  app.enableCors({
    origin: '*',
    methods: 'GET,POST',
  });

  // Swagger
  const swagger = new DocumentBuilder()
    .setTitle('RAIAVL Bulletin Extractor')
    .setDescription(
      'Extrae del boletín mensual RAIAVL (vehículos ligeros) las cifras de ventas, ' +
      'producción y exportación del mes y acumuladas, su variación anual y la tabla por marca.\n\n' +
      '**Entradas:**\n' +
      '- `POST /bulletins/extract`: texto plano ya extraído\n' +
      '- `POST /bulletins/extract-pdf`: PDF en base64\n\n' +
      '**Autenticación:** header `x-api-key` (si API_KEY está configurada), excepto `/bulletins/health`.',
    )
    .setVersion('1.0')
    .addApiKey({ type: 'apiKey', name: 'x-api-key', in: 'header' }, 'x-api-key')
    .addTag('Bulletins', 'Extracción de boletines')
    .build();

  const document = SwaggerModule.createDocument(app, swagger);
  SwaggerModule.setup('docs', app, document);

  const port = config.get<number>('bulletin.port', 3458);
  await app.listen(port);

  const logger = new Logger('Bootstrap');
  logger.log(`🚀 RAIAVL Bulletin Extractor corriendo en http://localhost:${port}`);
  logger.log(`📚 Swagger docs en http://localhost:${port}/docs`);
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(`❌ No se pudo iniciar: ${String(err)}`);
  process.exit(1);
});
