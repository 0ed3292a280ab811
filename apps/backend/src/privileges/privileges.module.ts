import { Module } from '@nestjs/common';
import { AccountsModule } from '../accounts/accounts.module';
import { RegistriesModule } from '../registries/registries.module';
import { PrivilegesController } from './privileges.controller';

@Module({
  imports: [AccountsModule, RegistriesModule],
  controllers: [PrivilegesController],
})
export class PrivilegesModule {}
