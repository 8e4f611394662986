import { Module } from '@nestjs/common';
import { RegistrationToolsController } from './registration-tools.controller';
import { RegistrationToolsService } from './registration-tools.service';
import { RegistrationValidator } from './registration-validator';
import { RegistrationsController } from './registrations.controller';
import { RegistrationsService } from './registrations.service';

@Module({
  controllers: [RegistrationsController, RegistrationToolsController],
  providers: [
    RegistrationsService,
    RegistrationValidator,
    RegistrationToolsService,
  ],
  exports: [RegistrationsService],
})
export class RegistrationsModule {}
