import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { RegistriesModule } from '../registries/registries.module';
import { HealthController } from './health.controller';
import { DatabaseHealthIndicator } from './database.health';
import { LedgerHealthIndicator } from './ledger.health';

@Module({
  imports: [TerminusModule, RegistriesModule],
  controllers: [HealthController],
  providers: [DatabaseHealthIndicator, LedgerHealthIndicator],
})
export class HealthModule {}
