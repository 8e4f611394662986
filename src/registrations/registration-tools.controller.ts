import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
} from '@nestjs/common';
import { RegistrationToolsService } from './registration-tools.service';

@Controller('tools')
export class RegistrationToolsController {
  constructor(private readonly tools: RegistrationToolsService) {}

  @Get()
  list() {
    return { tools: this.tools.list() };
  }

  @Get('resources/registrations')
  resource() {
    return this.tools.readResource();
  }

  // Arguments are a flat object of strings, e.g. { "query": "john" }
  @Post(':name')
  @HttpCode(HttpStatus.OK)
  call(
    @Param('name') name: string,
    @Body() args: Record<string, unknown> | undefined,
  ) {
    return this.tools.call(name, args ?? {});
  }
}
