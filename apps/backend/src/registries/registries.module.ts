import { Module } from '@nestjs/common';
import { AccountsModule } from '../accounts/accounts.module';
import { AuditModule } from '../audit/audit.module';
import { RegistriesService } from './registries.service';
import { AdminsController } from './admins.controller';
import { AuthoritiesController } from './authorities.controller';

@Module({
  imports: [AccountsModule, AuditModule],
  controllers: [AdminsController, AuthoritiesController],
  providers: [RegistriesService],
  exports: [RegistriesService],
})
export class RegistriesModule {}
