import {
  BadRequestException,
  Body,
  ConflictException,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  Query,
} from '@nestjs/common';
import { RegistrationBodyDto } from './dtos/registration-body.dto';
import { SearchRegistrationsDto } from './dtos/search-registrations.dto';
import { RegistrationsService } from './registrations.service';

@Controller('registrations')
export class RegistrationsController {
  constructor(private readonly registrations: RegistrationsService) {}

  @Get()
  listAll() {
    const data = this.registrations.listAll();
    return { count: data.length, data };
  }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  add(@Body() dto: RegistrationBodyDto) {
    const result = this.registrations.add(
      dto.name ?? '',
      dto.email ?? '',
      dto.dob ?? '',
    );
    if (result.ok) return result.registration;

    const body = {
      message:
        result.reason === 'duplicate'
          ? 'Email already registered'
          : 'Validation failed',
      violations: result.report.violations,
    };
    throw result.reason === 'duplicate'
      ? new ConflictException(body)
      : new BadRequestException(body);
  }

  @Get('search')
  search(@Query() dto: SearchRegistrationsDto) {
    const query = dto.q ?? '';
    const data = this.registrations.search(query);
    return { query, count: data.length, data };
  }

  @Get('statistics')
  statistics() {
    return this.registrations.stats();
  }

  // Live feedback: nothing is written.
  @Post('validate')
  @HttpCode(HttpStatus.OK)
  validate(@Body() dto: RegistrationBodyDto) {
    return this.registrations.validate(
      dto.name ?? '',
      dto.email ?? '',
      dto.dob ?? '',
    );
  }
}
