import { RegistrationField, ViolationRule } from './registration.types';

export const NAME_MIN_LENGTH = 2;
export const NAME_MAX_LENGTH = 100;
export const MAX_AGE_YEARS = 150;

export const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export const RULE_MESSAGES: Record<ViolationRule, string> = {
  name_required: 'Name is required',
  name_too_short: `Name must be at least ${NAME_MIN_LENGTH} characters long`,
  name_too_long: `Name must be at most ${NAME_MAX_LENGTH} characters long`,
  email_required: 'Email is required',
  email_format: 'Invalid email format',
  email_duplicate: 'Email is already registered',
  dob_required: 'Date of birth is required',
  dob_format: 'Invalid date format. Use YYYY-MM-DD',
  dob_future: 'Date of birth cannot be in the future',
  dob_too_old: 'Invalid birth date (too old)',
};

/**
 * class-validator constraint name -> rule, per field, in reporting order.
 * A non-string value counts as a missing one.
 */
export const CONSTRAINT_RULES: Record<
  RegistrationField,
  ReadonlyArray<readonly [string, ViolationRule]>
> = {
  name: [
    ['isString', 'name_required'],
    ['isNotEmpty', 'name_required'],
    ['minLength', 'name_too_short'],
    ['maxLength', 'name_too_long'],
  ],
  email: [
    ['isString', 'email_required'],
    ['isNotEmpty', 'email_required'],
    ['matches', 'email_format'],
  ],
  dob: [
    ['isString', 'dob_required'],
    ['isNotEmpty', 'dob_required'],
    ['isCalendarDate', 'dob_format'],
    ['isNotFutureDate', 'dob_future'],
    ['isWithinAgeLimit', 'dob_too_old'],
  ],
};

export const REQUIRED_RULES: Record<RegistrationField, ViolationRule> = {
  name: 'name_required',
  email: 'email_required',
  dob: 'dob_required',
};

export const FIELD_LABELS: Record<RegistrationField, string> = {
  name: 'Name',
  email: 'Email',
  dob: 'Date of Birth',
};
