import { Module, NestModule, MiddlewareConsumer } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { join } from 'path';
import { validateEnv } from './config/env.validation';
import { LoggerModule } from './common/logger/logger.module';
import { DatabaseModule } from './database/database.module';
import { AccountsModule } from './accounts/accounts.module';
import { AuditModule } from './audit/audit.module';
import { RegistriesModule } from './registries/registries.module';
import { QualificationsModule } from './qualifications/qualifications.module';
import { PrivilegesModule } from './privileges/privileges.module';
import { PanelsModule } from './panels/panels.module';
import { HealthModule } from './health/health.module';
import { RequestIdMiddleware } from './common/middleware/request-id.middleware';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv,
      envFilePath: [
        join(process.cwd(), 'apps/backend/.env'),
        join(process.cwd(), '.env'),
      ],
    }),
    LoggerModule,
    DatabaseModule,
    AccountsModule,
    AuditModule,
    RegistriesModule,
    QualificationsModule,
    PrivilegesModule,
    PanelsModule,
    HealthModule,
  ],
  providers: [RequestIdMiddleware],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(RequestIdMiddleware).forRoutes('{*splat}');
  }
}
