import { Injectable } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { RegistrationInputDto } from './dtos/registration-input.dto';
import {
  CONSTRAINT_RULES,
  REQUIRED_RULES,
  RULE_MESSAGES,
} from './registration.rules';
import {
  FieldViolation,
  REGISTRATION_FIELDS,
  RegistrationField,
  RegistrationInput,
  ValidationReport,
} from './registration.types';

export function buildValidationReport(
  violations: FieldViolation[],
): ValidationReport {
  const ordered = REGISTRATION_FIELDS.flatMap((field) =>
    violations.filter((v) => v.field === field),
  );
  const forField = (field: RegistrationField) => {
    const list = ordered.filter((v) => v.field === field);
    return { valid: list.length === 0, violations: list };
  };

  return {
    valid: ordered.length === 0,
    fields: {
      name: forField('name'),
      email: forField('email'),
      dob: forField('dob'),
    },
    violations: ordered,
  };
}

/**
 * Stateless field rules. Duplicate detection needs the store and lives in
 * RegistrationsService.
 */
@Injectable()
export class RegistrationValidator {
  validate(input: Partial<RegistrationInput>): ValidationReport {
    const dto = plainToInstance(RegistrationInputDto, {
      name: input.name ?? '',
      email: input.email ?? '',
      dob: input.dob ?? '',
    });
    const errors = validateSync(dto);

    const violations = REGISTRATION_FIELDS.flatMap((field) =>
      this.toViolations(
        field,
        errors.find((e) => e.property === field),
      ),
    );
    return buildValidationReport(violations);
  }

  validateField(field: RegistrationField, value: string): FieldViolation[] {
    return this.validate({ [field]: value }).fields[field].violations;
  }

  private toViolations(
    field: RegistrationField,
    error: ValidationError | undefined,
  ): FieldViolation[] {
    const constraints = error?.constraints;
    if (!constraints) return [];

    const violations: FieldViolation[] = [];
    for (const [constraint, rule] of CONSTRAINT_RULES[field]) {
      if (constraints[constraint] === undefined) continue;
      if (violations.some((v) => v.rule === rule)) continue;
      violations.push({ field, rule, message: RULE_MESSAGES[rule] });
    }

    // A missing value is only reported as missing.
    const required = violations.find((v) => v.rule === REQUIRED_RULES[field]);
    return required ? [required] : violations;
  }
}
