import { Module } from '@nestjs/common';
import { AccountsModule } from '../accounts/accounts.module';
import { RegistriesModule } from '../registries/registries.module';
import { PanelsController } from './panels.controller';

@Module({
  imports: [AccountsModule, RegistriesModule],
  controllers: [PanelsController],
})
export class PanelsModule {}
