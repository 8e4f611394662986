import { IsOptional, IsString } from 'class-validator';

export class SearchRegistrationsDto {
  @IsOptional()
  @IsString()
  q?: string;
}
