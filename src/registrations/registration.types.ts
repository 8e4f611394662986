export type RegistrationField = 'name' | 'email' | 'dob';

export const REGISTRATION_FIELDS: readonly RegistrationField[] = [
  'name',
  'email',
  'dob',
];

export type ViolationRule =
  | 'name_required'
  | 'name_too_short'
  | 'name_too_long'
  | 'email_required'
  | 'email_format'
  | 'email_duplicate'
  | 'dob_required'
  | 'dob_format'
  | 'dob_future'
  | 'dob_too_old';

export interface FieldViolation {
  field: RegistrationField;
  rule: ViolationRule;
  message: string;
}

export interface FieldReport {
  valid: boolean;
  violations: FieldViolation[];
}

export interface ValidationReport {
  valid: boolean;
  fields: Record<RegistrationField, FieldReport>;
  violations: FieldViolation[];
}

export interface RegistrationInput {
  name: string;
  email: string;
  dob: string;
}

// Persisted row. `id` is the 1-based position in the file.
export interface Registration {
  id: number;
  name: string;
  email: string;
  dateOfBirth: string;
  registeredAt: string;
}

export type AddRegistrationResult =
  | { ok: true; registration: Registration }
  | { ok: false; reason: 'invalid' | 'duplicate'; report: ValidationReport };

export interface AgeDistribution {
  youngest: number;
  oldest: number;
  average: number;
}

export interface RegistrationStatistics {
  totalRegistrations: number;
  uniqueEmailDomains: number;
  firstRegistration: string | null;
  latestRegistration: string | null;
  ages: AgeDistribution | null;
  fileSizeBytes: number;
  filePath: string;
}
