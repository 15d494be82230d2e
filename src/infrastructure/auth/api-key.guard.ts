import {
  CanActivate,
  ExecutionContext,
  Injectable,
  UnauthorizedException,
  Logger,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Reflector } from '@nestjs/core';
import { IS_PUBLIC_KEY } from './public.decorator';

interface RequestLike {
  ip?: string;
  headers: Record<string, string | string[] | undefined>;
}

/**
 * Guard que valida el header x-api-key contra `bulletin.apiKey`.
 *
 * Todos los endpoints quedan protegidos; sin API_KEY configurada se rechazan
 * todos los requests salvo los marcados con @Public().
 */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  private readonly logger = new Logger(ApiKeyGuard.name);
  private readonly apiKey: string;

  constructor(
    private readonly config: ConfigService,
    private readonly reflector: Reflector,
  ) {
    this.apiKey = this.config.get<string>('bulletin.apiKey', '');
    if (!this.apiKey) {
      this.logger.warn('⚠️  API_KEY no configurada: se rechazarán los requests protegidos.');
    }
  }

  canActivate(context: ExecutionContext): boolean {
    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic) return true;

    if (!this.apiKey) {
      throw new UnauthorizedException('API_KEY no configurada en el servidor');
    }

    const request = context.switchToHttp().getRequest<RequestLike>();
    const header = request.headers['x-api-key'];
    const key = Array.isArray(header) ? header[0] : header;

    if (!key) {
      throw new UnauthorizedException('Header x-api-key requerido');
    }

    if (key !== this.apiKey) {
      this.logger.warn(`🚫 API Key inválida desde ${request.ip ?? 'desconocido'}`);
      throw new UnauthorizedException('API Key inválida');
    }

    return true;
  }
}
