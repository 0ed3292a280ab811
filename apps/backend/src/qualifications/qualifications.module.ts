import { Module } from '@nestjs/common';
import { AccountsModule } from '../accounts/accounts.module';
import { RegistriesModule } from '../registries/registries.module';
import { QualificationsController } from './qualifications.controller';

@Module({
  imports: [AccountsModule, RegistriesModule],
  controllers: [QualificationsController],
})
export class QualificationsModule {}
