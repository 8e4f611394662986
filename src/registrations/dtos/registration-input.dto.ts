import { Transform } from 'class-transformer';
import {
  IsNotEmpty,
  IsString,
  Matches,
  MaxLength,
  MinLength,
} from 'class-validator';
import {
  EMAIL_PATTERN,
  MAX_AGE_YEARS,
  NAME_MAX_LENGTH,
  NAME_MIN_LENGTH,
  RULE_MESSAGES,
} from '../registration.rules';
import {
  IsCalendarDate,
  IsNotFutureDate,
  IsWithinAgeLimit,
} from '../validators/birth-date.validators';

const trim = ({ value }: { value: unknown }) =>
  typeof value === 'string' ? value.trim() : value;

export class RegistrationInputDto {
  @Transform(trim)
  @IsString({ message: RULE_MESSAGES.name_required })
  @IsNotEmpty({ message: RULE_MESSAGES.name_required })
  @MinLength(NAME_MIN_LENGTH, { message: RULE_MESSAGES.name_too_short })
  @MaxLength(NAME_MAX_LENGTH, { message: RULE_MESSAGES.name_too_long })
  name!: string;

  @Transform(trim)
  @IsString({ message: RULE_MESSAGES.email_required })
  @IsNotEmpty({ message: RULE_MESSAGES.email_required })
  @Matches(EMAIL_PATTERN, { message: RULE_MESSAGES.email_format })
  email!: string;

  @Transform(trim)
  @IsString({ message: RULE_MESSAGES.dob_required })
  @IsNotEmpty({ message: RULE_MESSAGES.dob_required })
  @IsCalendarDate({ message: RULE_MESSAGES.dob_format })
  @IsNotFutureDate({ message: RULE_MESSAGES.dob_future })
  @IsWithinAgeLimit(MAX_AGE_YEARS, { message: RULE_MESSAGES.dob_too_old })
  dob!: string;
}
