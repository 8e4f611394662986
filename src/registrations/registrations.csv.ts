import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { Registration } from './registration.types';

export const CSV_COLUMNS = [
  'Name',
  'Email',
  'Date_of_Birth',
  'Registration_Date',
] as const;

export type RecordDelimiter = '\n' | '\r\n';

export function encodeHeader(): string {
  return stringify([[...CSV_COLUMNS]]);
}

export function encodeRegistration(
  row: Omit<Registration, 'id'>,
  delimiter: RecordDelimiter = '\n',
): string {
  return stringify(
    [[row.name, row.email, row.dateOfBirth, row.registeredAt]],
    { record_delimiter: delimiter },
  );
}

/** Line ending of the header row, `\n` for an empty file. */
export function recordDelimiterOf(content: string): RecordDelimiter {
  const end = content.indexOf('\n');
  return end > 0 && content[end - 1] === '\r' ? '\r\n' : '\n';
}

export function decodeRegistrations(content: string): Registration[] {
  const rows: string[][] = parse(content, {
    bom: true,
    skip_empty_lines: true,
  });
  if (rows.length === 0) return [];

  const [header, ...body] = rows;
  const expected = CSV_COLUMNS.join(',');
  if (header.join(',') !== expected) {
    throw new Error(
      `Unexpected header "${header.join(',')}", expected "${expected}"`,
    );
  }

  return body.map(([name, email, dateOfBirth, registeredAt], index) => ({
    id: index + 1,
    name,
    email,
    dateOfBirth,
    registeredAt,
  }));
}
