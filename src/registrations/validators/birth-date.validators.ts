import { registerDecorator, ValidationOptions } from 'class-validator';
import { differenceInYears, isAfter, isValid, parse } from 'date-fns';

export const DATE_OF_BIRTH_FORMAT = 'yyyy-MM-dd';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parses a `YYYY-MM-DD` string into a local date.
 * Returns null for anything else, including impossible dates (2023-02-30).
 */
export function parseDateOfBirth(value: unknown): Date | null {
  if (typeof value !== 'string' || !ISO_DATE.test(value)) return null;
  const date = parse(value, DATE_OF_BIRTH_FORMAT, new Date());
  return isValid(date) ? date : null;
}

export function ageInYears(birthDate: Date, now: Date = new Date()): number {
  return differenceInYears(now, birthDate);
}

export function IsCalendarDate(options?: ValidationOptions) {
  return function (object: object, propertyName: string) {
    registerDecorator({
      name: 'isCalendarDate',
      target: object.constructor,
      propertyName,
      options,
      validator: {
        validate(value: unknown) {
          return parseDateOfBirth(value) !== null;
        },
      },
    });
  };
}

// Unparseable values pass here; IsCalendarDate reports them.
export function IsNotFutureDate(options?: ValidationOptions) {
  return function (object: object, propertyName: string) {
    registerDecorator({
      name: 'isNotFutureDate',
      target: object.constructor,
      propertyName,
      options,
      validator: {
        validate(value: unknown) {
          const date = parseDateOfBirth(value);
          return date === null || !isAfter(date, new Date());
        },
      },
    });
  };
}

export function IsWithinAgeLimit(maxAge: number, options?: ValidationOptions) {
  return function (object: object, propertyName: string) {
    registerDecorator({
      name: 'isWithinAgeLimit',
      target: object.constructor,
      propertyName,
      constraints: [maxAge],
      options,
      validator: {
        validate(value: unknown) {
          const date = parseDateOfBirth(value);
          return date === null || ageInYears(date) <= maxAge;
        },
      },
    });
  };
}
