import { IsOptional, IsString } from 'class-validator';

// Field rules are applied by the store so that every violation is reported.
export class RegistrationBodyDto {
  @IsOptional()
  @IsString()
  name?: string;

  @IsOptional()
  @IsString()
  email?: string;

  @IsOptional()
  @IsString()
  dob?: string;
}
