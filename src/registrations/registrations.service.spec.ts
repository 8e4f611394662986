import { addDays, format, subYears } from 'date-fns';
import {
  appendFileSync,
  mkdirSync,
  readFileSync,
  rmSync,
  statSync,
  writeFileSync,
} from 'fs';
import {
  createRegistrationsModule,
  isoDate,
  tempRegistrationsFile,
} from '../testing/registrations-store';
import { RegistrationStorageException } from './registration-storage.exception';
import {
  REGISTERED_AT_FORMAT,
  RegistrationsService,
} from './registrations.service';

const HEADER = 'Name,Email,Date_of_Birth,Registration_Date\n';

describe('RegistrationsService', () => {
  let dir: string;
  let file: string;
  let service: RegistrationsService;

  beforeEach(async () => {
    ({ dir, file } = tempRegistrationsFile());
    const module = await createRegistrationsModule(file);
    service = module.get<RegistrationsService>(RegistrationsService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('creates the file with its header row', () => {
    expect(readFileSync(file, 'utf-8')).toBe(HEADER);
    expect(service.listAll()).toEqual([]);
  });

  describe('add', () => {
    it('stores a valid registration exactly once', () => {
      const before = format(new Date(), REGISTERED_AT_FORMAT);

      const result = service.add('John Doe', 'john@example.com', '1990-05-15');

      expect(result.ok).toBe(true);
      const all = service.listAll();
      expect(all).toHaveLength(1);
      expect(all[0]).toMatchObject({
        id: 1,
        name: 'John Doe',
        email: 'john@example.com',
        dateOfBirth: '1990-05-15',
      });
      expect(all[0].registeredAt).toMatch(
        /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/,
      );
      expect(all[0].registeredAt >= before).toBe(true);
    });

    it('writes trimmed values in the four-column layout', () => {
      const result = service.add(
        '  Jane Roe ',
        ' jane@example.com ',
        '1985-01-02',
      );
      if (!result.ok) throw new Error('expected the registration to succeed');

      expect(readFileSync(file, 'utf-8')).toBe(
        `${HEADER}Jane Roe,jane@example.com,1985-01-02,${result.registration.registeredAt}\n`,
      );
    });

    it('quotes names containing commas', () => {
      service.add('Doe, John', 'john@example.com', '1990-05-15');

      expect(readFileSync(file, 'utf-8')).toContain(
        '"Doe, John",john@example.com,1990-05-15,',
      );
      expect(service.listAll()[0].name).toBe('Doe, John');
    });

    it('rejects a duplicate email without writing a second row', () => {
      service.add('John Doe', 'john@example.com', '1990-05-15');

      const result = service.add(
        'Johnny Doe',
        'john@example.com',
        '1991-01-01',
      );

      expect(result).toMatchObject({ ok: false, reason: 'duplicate' });
      if (result.ok) return;
      expect(result.report.violations).toEqual([
        {
          field: 'email',
          rule: 'email_duplicate',
          message: 'Email is already registered',
        },
      ]);
      expect(service.listAll()).toHaveLength(1);
    });

    // Uniqueness is case-insensitive by policy.
    it('treats emails differing only in case as duplicates', () => {
      service.add('John Doe', 'john@example.com', '1990-05-15');

      const result = service.add('John Doe', 'John@Example.COM', '1990-05-15');

      expect(result).toMatchObject({ ok: false, reason: 'duplicate' });
      expect(service.emailExists('JOHN@example.com')).toBe(true);
      expect(service.listAll()).toHaveLength(1);
    });

    it('reports every violated rule of a rejected registration', () => {
      const result = service.add('A', 'bad-email', '1990-05-15');

      expect(result).toMatchObject({ ok: false, reason: 'invalid' });
      if (result.ok) return;
      expect(result.report.violations.map((v) => v.rule)).toEqual([
        'name_too_short',
        'email_format',
      ]);
      expect(service.listAll()).toEqual([]);
    });

    it('accepts a two-character name', () => {
      expect(service.add('Al', 'al@example.com', '1990-05-15').ok).toBe(true);
    });

    it('rejects a date of birth in the future', () => {
      const result = service.add(
        'John Doe',
        'john@example.com',
        isoDate(addDays(new Date(), 1)),
      );

      expect(result).toMatchObject({ ok: false, reason: 'invalid' });
      if (result.ok) return;
      expect(result.report.violations.map((v) => v.rule)).toEqual([
        'dob_future',
      ]);
    });

    it('never assigns a timestamp earlier than the last row', () => {
      appendFileSync(
        file,
        'Future Person,future@example.com,1990-01-01,2999-01-01 00:00:00\n',
      );

      const result = service.add('John Doe', 'john@example.com', '1990-05-15');

      expect(result).toMatchObject({
        ok: true,
        registration: { id: 2, registeredAt: '2999-01-01 00:00:00' },
      });
    });

    it('recreates the file when it has been removed', () => {
      rmSync(file);
      expect(service.listAll()).toEqual([]);

      expect(service.add('John Doe', 'john@example.com', '1990-05-15').ok).toBe(
        true,
      );
      expect(readFileSync(file, 'utf-8').startsWith(HEADER)).toBe(true);
    });
  });

  describe('add to a file written elsewhere', () => {
    const CRLF_HEADER = 'Name,Email,Date_of_Birth,Registration_Date\r\n';
    const ANN = 'Ann Lee,ann@example.com,1990-01-01,2024-01-01 10:00:00';

    it('keeps CRLF line endings and ends an unterminated last row', () => {
      writeFileSync(file, `${CRLF_HEADER}${ANN}`);

      const result = service.add('John Doe', 'john@example.com', '1990-05-15');
      if (!result.ok) throw new Error('expected the registration to succeed');

      expect(readFileSync(file, 'utf-8')).toBe(
        `${CRLF_HEADER}${ANN}\r\nJohn Doe,john@example.com,1990-05-15,${result.registration.registeredAt}\r\n`,
      );
      expect(service.listAll().map((r) => r.name)).toEqual([
        'Ann Lee',
        'John Doe',
      ]);
    });

    it('keeps timestamps clean across repeated CRLF appends', () => {
      writeFileSync(file, `${CRLF_HEADER}${ANN}\r\n`);

      const john = service.add('John Doe', 'john@example.com', '1990-05-15');
      const jane = service.add('Jane Roe', 'jane@example.com', '1985-01-02');

      expect([john.ok, jane.ok]).toEqual([true, true]);

      const all = service.listAll();
      expect(all.map((r) => r.id)).toEqual([1, 2, 3]);
      for (const { registeredAt } of all) {
        expect(registeredAt).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
      }
      expect(readFileSync(file, 'utf-8').split('\r\n')).toHaveLength(5);
    });

    it('ends an unterminated last row of an LF file', () => {
      writeFileSync(file, `${HEADER}${ANN}`);

      const result = service.add('John Doe', 'john@example.com', '1990-05-15');
      if (!result.ok) throw new Error('expected the registration to succeed');

      expect(readFileSync(file, 'utf-8')).toBe(
        `${HEADER}${ANN}\nJohn Doe,john@example.com,1990-05-15,${result.registration.registeredAt}\n`,
      );
      expect(service.listAll()).toHaveLength(2);
    });
  });

  describe('validate', () => {
    it('agrees with add on every field and writes nothing', () => {
      service.add('John Doe', 'john@example.com', '1990-05-15');
      const tomorrow = isoDate(addDays(new Date(), 1));
      const inputs: [string, string, string][] = [
        ['John Doe', 'JOHN@example.com', '1990-05-15'],
        ['A', 'bad', '2999-01-01'],
        ['Mary Major', 'mary@example.org', tomorrow],
        ['', '', ''],
      ];

      for (const [name, email, dob] of inputs) {
        const report = service.validate(name, email, dob);
        expect(service.listAll()).toHaveLength(1);

        const result = service.add(name, email, dob);
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.report).toEqual(report);
      }
    });

    it('passes a registration that add would accept', () => {
      expect(
        service.validate('Jane Roe', 'jane@example.com', '1985-01-02').valid,
      ).toBe(true);
    });

    it('checks a single email field against the store', () => {
      service.add('John Doe', 'john@example.com', '1990-05-15');

      expect(service.validateField('email', 'john@example.com')).toEqual({
        valid: false,
        violations: [
          {
            field: 'email',
            rule: 'email_duplicate',
            message: 'Email is already registered',
          },
        ],
      });
      expect(service.validateField('email', 'jane@example.com').valid).toBe(
        true,
      );
      expect(service.validateField('name', 'Jane Roe').valid).toBe(true);
    });
  });

  describe('search', () => {
    beforeEach(() => {
      service.add('John Doe', 'john@example.com', '1990-05-15');
      service.add('Jane Smith', 'jane.smith@work.org', '1988-03-04');
      service.add('Bob Johnson', 'bob@example.com', '1975-11-30');
    });

    it('matches names and emails case-insensitively', () => {
      expect(service.search('JOHN').map((r) => r.id)).toEqual([1, 3]);
      expect(service.search('@example.com').map((r) => r.id)).toEqual([1, 3]);
      expect(service.search('smith').map((r) => r.name)).toEqual([
        'Jane Smith',
      ]);
    });

    it('returns every record for an empty query', () => {
      expect(service.search('')).toHaveLength(3);
      expect(service.search('   ')).toHaveLength(3);
    });

    it('returns nothing when no record matches', () => {
      expect(service.search('nobody')).toEqual([]);
    });
  });

  describe('stats', () => {
    it('reports an empty store', () => {
      expect(service.stats()).toEqual({
        totalRegistrations: 0,
        uniqueEmailDomains: 0,
        firstRegistration: null,
        latestRegistration: null,
        ages: null,
        fileSizeBytes: HEADER.length,
        filePath: file,
      });
    });

    it('counts registrations, domains and ages', () => {
      const now = new Date();
      service.add('John Doe', 'john@example.com', isoDate(subYears(now, 30)));
      service.add('Jane Roe', 'jane@EXAMPLE.com', isoDate(subYears(now, 40)));
      const [first, second] = service.listAll();

      expect(service.stats()).toEqual({
        totalRegistrations: 2,
        uniqueEmailDomains: 1,
        firstRegistration: first.registeredAt,
        latestRegistration: second.registeredAt,
        ages: { youngest: 30, oldest: 40, average: 35 },
        fileSizeBytes: statSync(file).size,
        filePath: file,
      });
    });

    it('counts distinct domains and rounds the average age', () => {
      const now = new Date();
      service.add('Ann Lee', 'ann@example.com', isoDate(subYears(now, 20)));
      service.add('Ben Lee', 'ben@example.org', isoDate(subYears(now, 21)));
      service.add('Cal Lee', 'cal@example.org', isoDate(subYears(now, 21)));

      const stats = service.stats();

      expect(stats.uniqueEmailDomains).toBe(2);
      expect(stats.ages).toEqual({ youngest: 20, oldest: 21, average: 20.7 });
    });
  });

  describe('storage failures', () => {
    it('raises a storage exception when the file cannot be read', () => {
      rmSync(file);
      mkdirSync(file);

      expect(() => service.listAll()).toThrow(RegistrationStorageException);
      expect(() =>
        service.add('John Doe', 'john@example.com', '1990-05-15'),
      ).toThrow(RegistrationStorageException);
    });

    it('rejects a file with an unexpected header', () => {
      writeFileSync(file, 'a,b,c,d\n1,2,3,4\n');

      expect(() => service.listAll()).toThrow(RegistrationStorageException);
    });

    it('raises a storage exception when the file size cannot be read', () => {
      const fs = jest.requireActual<typeof import('fs')>('fs');
      jest.spyOn(fs, 'statSync').mockImplementationOnce(() => {
        throw new Error('stat failed');
      });

      expect(() => service.stats()).toThrow(RegistrationStorageException);
    });

    it('refuses to start on a path that is not a file', async () => {
      await expect(createRegistrationsModule(dir)).rejects.toThrow(
        RegistrationStorageException,
      );
    });
  });
});
