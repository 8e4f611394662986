import { FIELD_LABELS } from './registration.rules';
import {
  AddRegistrationResult,
  FieldViolation,
  REGISTRATION_FIELDS,
  Registration,
  RegistrationStatistics,
  ValidationReport,
} from './registration.types';

// Conversational renderings shared by the RPC shim and the chat dialogue.

export function formatRegistration(r: Registration): string {
  return [
    `**${r.id}. ${r.name}**`,
    `   Email: ${r.email}`,
    `   Date of Birth: ${r.dateOfBirth}`,
    `   Registered: ${r.registeredAt}`,
  ].join('\n');
}

export function formatRegistrationList(records: Registration[]): string {
  if (records.length === 0) {
    return 'No registrations found yet.\n\nThe registration system is ready to accept new registrations!';
  }
  return [
    `**All Registrations (${records.length} total):**`,
    ...records.map(formatRegistration),
  ].join('\n\n');
}

export function formatSearchResults(
  query: string,
  records: Registration[],
): string {
  if (records.length === 0) {
    return `No matches found for '${query}'\n\nTry searching with a different name or email.`;
  }
  return [
    `**Search Results for '${query}' (${records.length} matches):**`,
    ...records.map(formatRegistration),
  ].join('\n\n');
}

export function formatStatistics(stats: RegistrationStatistics): string {
  const lines = [
    '**Registration Statistics:**',
    '',
    `Total Registrations: ${stats.totalRegistrations}`,
  ];

  if (stats.totalRegistrations === 0) {
    lines.push('', 'No demographic data available yet.');
  } else {
    lines.push(
      `Unique Email Domains: ${stats.uniqueEmailDomains}`,
      `First Registration: ${stats.firstRegistration}`,
      `Latest Registration: ${stats.latestRegistration}`,
      `File Size: ${stats.fileSizeBytes} bytes`,
    );
    if (stats.ages) {
      lines.push(
        '',
        '**Age Demographics:**',
        `   Average Age: ${stats.ages.average} years`,
        `   Youngest User: ${stats.ages.youngest} years`,
        `   Oldest User: ${stats.ages.oldest} years`,
      );
    }
  }

  lines.push('', `Data File: ${stats.filePath}`);
  return lines.join('\n');
}

export function formatViolations(violations: FieldViolation[]): string {
  return violations
    .map((v) => `- ${FIELD_LABELS[v.field]}: ${v.message}`)
    .join('\n');
}

export function formatValidationReport(report: ValidationReport): string {
  const lines = REGISTRATION_FIELDS.map((field) => {
    const { valid, violations } = report.fields[field];
    const verdict = valid
      ? '✓ Valid'
      : `✗ ${violations.map((v) => v.message).join('; ')}`;
    return `**${FIELD_LABELS[field]}:** ${verdict}`;
  });

  const overall = report.valid
    ? 'Ready for registration!'
    : 'Fix validation errors before registering';

  return [
    '**Validation Results:**',
    '',
    ...lines,
    '',
    `**Overall Status:** ${overall}`,
  ].join('\n');
}

export function formatAddResult(result: AddRegistrationResult): string {
  if (result.ok) {
    const r = result.registration;
    return [
      `SUCCESS: Registered ${r.name}`,
      '',
      'Registration Details:',
      `- Name: ${r.name}`,
      `- Email: ${r.email}`,
      `- Date of Birth: ${r.dateOfBirth}`,
      `- Registered: ${r.registeredAt}`,
    ].join('\n');
  }

  const error =
    result.reason === 'duplicate'
      ? 'Email already registered'
      : 'Validation failed';
  return [
    `ERROR: Registration failed: ${error}`,
    '',
    'Validation errors:',
    formatViolations(result.report.violations),
  ].join('\n');
}
