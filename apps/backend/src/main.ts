import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import type { LoggerService } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { WINSTON_MODULE_NEST_PROVIDER } from 'nest-winston';
import { AppModule } from './app.module';
import type { Env } from './config/env.validation';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  const logger = app.get<LoggerService>(WINSTON_MODULE_NEST_PROVIDER);
  app.useLogger(logger);

  // Enable shutdown hooks for graceful termination
  app.enableShutdownHooks();

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  const config = new DocumentBuilder()
    .setTitle('Credentia API')
    .setDescription(
      'Credential lifecycle and authorization for provider qualifications, hospital privileges and insurance panel memberships.',
    )
    .setVersion('0.1.0')
    .addBearerAuth()
    .addTag('accounts', 'API keys and the identities they act as')
    .addTag('admins', 'Per-registry admin management (owner only)')
    .addTag('authorities', 'Authority registration and verification')
    .addTag('qualifications', 'Licenses, board certifications and degrees')
    .addTag('privileges', 'Hospital clinical privileges')
    .addTag('panels', 'Insurance panel memberships')
    .addTag('audit', 'Audit trail of registry operations')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document, {
    customSiteTitle: 'Credentia API Documentation',
  });

  const port = app
    .get<ConfigService<Env, true>>(ConfigService)
    .get('PORT', { infer: true });
  await app.listen(port);
  logger.log(`Credentia backend listening on port ${port}`, 'Bootstrap');
}
void bootstrap();
