import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { format } from 'date-fns';
import {
  appendFileSync,
  existsSync,
  mkdirSync,
  readFileSync,
  statSync,
  writeFileSync,
} from 'fs';
import { dirname, resolve } from 'path';
import { RegistrationStorageException } from './registration-storage.exception';
import {
  RegistrationValidator,
  buildValidationReport,
} from './registration-validator';
import { RULE_MESSAGES } from './registration.rules';
import {
  AddRegistrationResult,
  FieldReport,
  Registration,
  RegistrationField,
  RegistrationInput,
  RegistrationStatistics,
  ValidationReport,
} from './registration.types';
import {
  decodeRegistrations,
  encodeHeader,
  encodeRegistration,
  recordDelimiterOf,
} from './registrations.csv';
import {
  ageInYears,
  parseDateOfBirth,
} from './validators/birth-date.validators';

export const DEFAULT_REGISTRATIONS_FILE = 'user_registrations.csv';
export const REGISTERED_AT_FORMAT = 'yyyy-MM-dd HH:mm:ss';

/**
 * Append-only registration table kept in a single CSV file.
 *
 * All file access is synchronous: a call reads, checks and appends without
 * yielding, so a single process never interleaves two writes.
 */
@Injectable()
export class RegistrationsService implements OnModuleInit {
  private readonly logger = new Logger(RegistrationsService.name);
  readonly filePath: string;

  constructor(
    private readonly configService: ConfigService,
    private readonly validator: RegistrationValidator,
  ) {
    this.filePath = resolve(
      this.configService.get<string>('REGISTRATIONS_FILE') ??
        DEFAULT_REGISTRATIONS_FILE,
    );
  }

  onModuleInit() {
    this.ensureFile();
  }

  /** Creates the file with its header row when missing or empty. */
  ensureFile(): void {
    try {
      if (existsSync(this.filePath)) {
        const stats = statSync(this.filePath);
        if (!stats.isFile()) {
          throw new Error(`${this.filePath} is not a regular file`);
        }
        if (stats.size > 0) return;
      }
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(this.filePath, encodeHeader(), 'utf-8');
      this.logger.log(`Created registrations file ${this.filePath}`);
    } catch (error) {
      throw this.storageFailure('prepare', error);
    }
  }

  add(name: string, email: string, dob: string): AddRegistrationResult {
    const content = this.readRaw();
    const existing = this.decode(content);
    const report = this.validateAgainst(existing, { name, email, dob });

    if (!report.valid) {
      const duplicate = report.fields.email.violations.some(
        (v) => v.rule === 'email_duplicate',
      );
      return { ok: false, reason: duplicate ? 'duplicate' : 'invalid', report };
    }

    const row = {
      name: name.trim(),
      email: email.trim(),
      dateOfBirth: dob.trim(),
      registeredAt: this.nextTimestamp(existing),
    };

    // Match the file's line endings and terminate an unterminated last row.
    const delimiter = recordDelimiterOf(content);
    const lead = content && !content.endsWith('\n') ? delimiter : '';

    this.ensureFile();
    try {
      appendFileSync(
        this.filePath,
        lead + encodeRegistration(row, delimiter),
        'utf-8',
      );
    } catch (error) {
      throw this.storageFailure('write', error);
    }

    const registration: Registration = { id: existing.length + 1, ...row };
    this.logger.log(
      `Registered ${registration.email} as #${registration.id} at ${registration.registeredAt}`,
    );
    return { ok: true, registration };
  }

  listAll(): Registration[] {
    return this.readTable();
  }

  search(query: string): Registration[] {
    const needle = query.trim().toLowerCase();
    const all = this.readTable();
    if (!needle) return all;

    return all.filter(
      (r) =>
        r.name.toLowerCase().includes(needle) ||
        r.email.toLowerCase().includes(needle),
    );
  }

  stats(): RegistrationStatistics {
    const records = this.readTable();
    let fileSizeBytes: number;
    try {
      fileSizeBytes = existsSync(this.filePath)
        ? statSync(this.filePath).size
        : 0;
    } catch (error) {
      throw this.storageFailure('read', error);
    }

    if (records.length === 0) {
      return {
        totalRegistrations: 0,
        uniqueEmailDomains: 0,
        firstRegistration: null,
        latestRegistration: null,
        ages: null,
        fileSizeBytes,
        filePath: this.filePath,
      };
    }

    const domains = new Set(
      records.map((r) =>
        r.email.slice(r.email.lastIndexOf('@') + 1).toLowerCase(),
      ),
    );
    const timestamps = records.map((r) => r.registeredAt).sort();

    const now = new Date();
    const ages = records
      .map((r) => parseDateOfBirth(r.dateOfBirth))
      .filter((d): d is Date => d !== null)
      .map((d) => ageInYears(d, now));

    return {
      totalRegistrations: records.length,
      uniqueEmailDomains: domains.size,
      firstRegistration: timestamps[0],
      latestRegistration: timestamps[timestamps.length - 1],
      ages:
        ages.length > 0
          ? {
              youngest: Math.min(...ages),
              oldest: Math.max(...ages),
              average:
                Math.round(
                  (ages.reduce((sum, age) => sum + age, 0) / ages.length) * 10,
                ) / 10,
            }
          : null,
      fileSizeBytes,
      filePath: this.filePath,
    };
  }

  /** Same checks as `add`, without writing anything. */
  validate(name: string, email: string, dob: string): ValidationReport {
    return this.validateAgainst(this.readTable(), { name, email, dob });
  }

  validateField(field: RegistrationField, value: string): FieldReport {
    if (field !== 'email') {
      const violations = this.validator.validateField(field, value);
      return { valid: violations.length === 0, violations };
    }
    return this.validateAgainst(this.readTable(), { email: value }).fields
      .email;
  }

  emailExists(email: string): boolean {
    return this.containsEmail(this.readTable(), email);
  }

  readRaw(): string {
    if (!existsSync(this.filePath)) return '';
    try {
      return readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      throw this.storageFailure('read', error);
    }
  }

  private readTable(): Registration[] {
    return this.decode(this.readRaw());
  }

  private decode(content: string): Registration[] {
    try {
      return decodeRegistrations(content);
    } catch (error) {
      throw this.storageFailure('read', error);
    }
  }

  private validateAgainst(
    records: Registration[],
    input: Partial<RegistrationInput>,
  ): ValidationReport {
    const report = this.validator.validate(input);
    if (!report.fields.email.valid) return report;
    if (!this.containsEmail(records, input.email ?? '')) return report;

    return buildValidationReport([
      ...report.violations,
      {
        field: 'email',
        rule: 'email_duplicate',
        message: RULE_MESSAGES.email_duplicate,
      },
    ]);
  }

  private containsEmail(records: Registration[], email: string): boolean {
    const needle = email.trim().toLowerCase();
    return records.some((r) => r.email.toLowerCase() === needle);
  }

  // Never earlier than the last row, even if the clock steps back.
  private nextTimestamp(existing: Registration[]): string {
    const now = format(new Date(), REGISTERED_AT_FORMAT);
    const last = existing[existing.length - 1]?.registeredAt;
    return last !== undefined && last > now ? last : now;
  }

  private storageFailure(
    operation: RegistrationStorageException['operation'],
    error: unknown,
  ): RegistrationStorageException {
    if (error instanceof RegistrationStorageException) return error;
    const failure = new RegistrationStorageException(
      operation,
      this.filePath,
      error,
    );
    this.logger.error(failure.message, failure.reason);
    return failure;
  }
}
