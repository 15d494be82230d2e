import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { BulletinModule } from './infrastructure/http/bulletin.module';
import { bulletinConfig } from './shared/config/bulletin.config';
import { ApiKeyGuard } from './infrastructure/auth/api-key.guard';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [bulletinConfig],
      envFilePath: ['.env', '.env.local'],
    }),
    BulletinModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ApiKeyGuard,
    },
  ],
})
export class AppModule {}
