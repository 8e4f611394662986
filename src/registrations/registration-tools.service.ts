import { Injectable } from '@nestjs/common';
import { RegistrationStorageException } from './registration-storage.exception';
import {
  formatAddResult,
  formatRegistrationList,
  formatSearchResults,
  formatStatistics,
  formatValidationReport,
} from './registration.formatter';
import {
  AddRegistrationResult,
  Registration,
  RegistrationStatistics,
  ValidationReport,
} from './registration.types';
import { RegistrationsService } from './registrations.service';

export type ToolName =
  | 'add_registration'
  | 'get_all_registrations'
  | 'search_registrations'
  | 'get_registration_statistics'
  | 'validate_registration_data';

export interface ToolDefinition {
  name: ToolName;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, { type: 'string'; description: string }>;
    required: string[];
  };
}

export interface ToolResult {
  isError: boolean;
  content: { type: 'text'; text: string }[];
  data:
    | AddRegistrationResult
    | Registration[]
    | RegistrationStatistics
    | ValidationReport
    | null;
}

export interface ToolResource {
  uri: string;
  mimeType: 'text/csv';
  text: string;
}

const registrationFields = (verb: string) => ({
  name: {
    type: 'string' as const,
    description: `${verb} full name (2-100 characters)`,
  },
  email: { type: 'string' as const, description: `${verb} email address` },
  dob: {
    type: 'string' as const,
    description: `${verb} date of birth (YYYY-MM-DD)`,
  },
});

export const TOOL_DEFINITIONS: readonly ToolDefinition[] = [
  {
    name: 'add_registration',
    description:
      'Add a new user registration with name, email, and date of birth',
    inputSchema: {
      type: 'object',
      properties: registrationFields('User'),
      required: ['name', 'email', 'dob'],
    },
  },
  {
    name: 'get_all_registrations',
    description: 'Retrieve all user registrations',
    inputSchema: { type: 'object', properties: {}, required: [] },
  },
  {
    name: 'search_registrations',
    description: 'Search registrations by name or email',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Search query (name or email)' },
      },
      required: ['query'],
    },
  },
  {
    name: 'get_registration_statistics',
    description:
      'Get statistics about registrations (count, age demographics, etc.)',
    inputSchema: { type: 'object', properties: {}, required: [] },
  },
  {
    name: 'validate_registration_data',
    description: 'Validate registration data without saving',
    inputSchema: {
      type: 'object',
      properties: registrationFields('Candidate'),
      required: ['name', 'email', 'dob'],
    },
  },
];

const text = (
  body: string,
  data: ToolResult['data'],
  isError = false,
): ToolResult => ({
  isError,
  content: [{ type: 'text', text: body }],
  data,
});

/**
 * Named-operation call surface over the store. Business failures come back
 * as `isError` results rather than exceptions.
 */
@Injectable()
export class RegistrationToolsService {
  constructor(private readonly registrations: RegistrationsService) {}

  list(): readonly ToolDefinition[] {
    return TOOL_DEFINITIONS;
  }

  call(name: string, args: Record<string, unknown> = {}): ToolResult {
    const arg = (key: string) => {
      const value = args[key];
      return typeof value === 'string' ? value : '';
    };

    const tool = TOOL_DEFINITIONS.find((t) => t.name === name);
    if (!tool) {
      const available = TOOL_DEFINITIONS.map((t) => `- ${t.name}`).join('\n');
      return text(
        `ERROR: Unknown tool: ${name}\n\nAvailable tools:\n${available}`,
        null,
        true,
      );
    }

    try {
      switch (tool.name) {
        case 'add_registration': {
          const result = this.registrations.add(
            arg('name'),
            arg('email'),
            arg('dob'),
          );
          return text(formatAddResult(result), result, !result.ok);
        }
        case 'get_all_registrations': {
          const records = this.registrations.listAll();
          return text(formatRegistrationList(records), records);
        }
        case 'search_registrations': {
          const query = arg('query');
          const records = this.registrations.search(query);
          return text(formatSearchResults(query, records), records);
        }
        case 'get_registration_statistics': {
          const stats = this.registrations.stats();
          return text(formatStatistics(stats), stats);
        }
        case 'validate_registration_data': {
          const report = this.registrations.validate(
            arg('name'),
            arg('email'),
            arg('dob'),
          );
          return text(formatValidationReport(report), report);
        }
      }
    } catch (error) {
      if (error instanceof RegistrationStorageException) {
        return text(`ERROR: ${error.message}: ${error.reason}`, null, true);
      }
      throw error;
    }
  }

  readResource(): ToolResource {
    const raw = this.registrations.readRaw();
    return {
      uri: `file://${this.registrations.filePath}`,
      mimeType: 'text/csv',
      text: raw || "CSV file doesn't exist yet. No registrations found.",
    };
  }
}
