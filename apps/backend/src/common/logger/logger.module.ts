import { Module, Global } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { WinstonModule } from 'nest-winston';
import { transports, format } from 'winston';
import type { Env } from '../../config/env.validation';

@Global()
@Module({
  imports: [
    WinstonModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService<Env, true>) => ({
        level: config.get('LOG_LEVEL', { infer: true }),
        defaultMeta: { service: 'credentia-backend' },
        format: format.combine(
          format.timestamp(),
          format.errors({ stack: true }),
          format.json(),
        ),
        transports: [
          new transports.Console({
            format:
              config.get('NODE_ENV', { infer: true }) === 'production'
                ? format.json()
                : format.combine(format.colorize(), format.simple()),
          }),
        ],
      }),
    }),
  ],
  exports: [WinstonModule],
})
export class LoggerModule {}
