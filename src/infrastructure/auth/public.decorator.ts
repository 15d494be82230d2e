import { SetMetadata } from '@nestjs/common';

export const IS_PUBLIC_KEY = 'isPublic';

/**
 * Excluye un handler (o un controller completo) de la validación de x-api-key.
 * Uso: @Public() encima del handler, p. ej. en GET /bulletins/health.
 */
export const Public = () => SetMetadata(IS_PUBLIC_KEY, true);
