import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  ArrayMaxSize,
  ArrayUnique,
  IsArray,
  IsBase64,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';
import { Transform } from 'class-transformer';

const trim = ({ value }: { value: unknown }) => (typeof value === 'string' ? value.trim() : value);

/**
 * DTO para extraer un boletín ya convertido a texto.
 */
export class ExtractTextDto {
  @ApiProperty({
    description: 'Texto completo del boletín (páginas en orden, saltos de línea preservados)',
    example: 'México, a 10 de noviembre de 2025\n...cifras de octubre de 2025...\nOctubre\n...',
  })
  @IsString()
  text!: string;

  @ApiProperty({
    description: 'Nombre del archivo original; si el texto no menciona el periodo se usa su patrón YYYY_MM',
    example: 'raiavl_2025_11.pdf',
  })
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  @Transform(trim)
  sourceName!: string;

  @ApiPropertyOptional({
    description: 'Vocabulario de marcas (en orden de prioridad). Default: el configurado en el servidor',
    example: ['Nissan', 'General Motors', 'Volkswagen', 'Toyota', 'KIA'],
  })
  @IsOptional()
  @IsArray()
  @ArrayUnique()
  @ArrayMaxSize(200)
  @IsString({ each: true })
  @IsNotEmpty({ each: true })
  brandVocabulary?: string[];
}

/**
 * DTO para extraer un boletín en PDF (base64).
 */
export class ExtractPdfDto {
  @ApiProperty({
    description: 'Nombre del archivo PDF',
    example: 'raiavl_2025_11.pdf',
  })
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  @Transform(trim)
  fileName!: string;

  @ApiProperty({ description: 'Contenido del PDF en base64' })
  @IsString()
  @IsNotEmpty()
  @IsBase64()
  contentBase64!: string;

  @ApiPropertyOptional({
    description: 'Vocabulario de marcas (en orden de prioridad)',
    example: ['Nissan', 'General Motors'],
  })
  @IsOptional()
  @IsArray()
  @ArrayUnique()
  @ArrayMaxSize(200)
  @IsString({ each: true })
  @IsNotEmpty({ each: true })
  brandVocabulary?: string[];
}
