import { RegistrationStorageException } from '../../registrations/registration-storage.exception';
import {
  formatAddResult,
  formatRegistrationList,
  formatSearchResults,
  formatStatistics,
  formatViolations,
} from '../../registrations/registration.formatter';
import {
  AddRegistrationResult,
  RegistrationField,
} from '../../registrations/registration.types';
import { RegistrationsService } from '../../registrations/registrations.service';
import { ChatCommand, parseChatCommand } from './chat-command';
import {
  CANCELLED_MESSAGE,
  FIELD_PROMPTS,
  HELP_MESSAGE,
  RESTART_MESSAGE,
  SEARCH_USAGE_MESSAGE,
  START_REGISTRATION_MESSAGE,
  UNKNOWN_COMMAND_MESSAGE,
  WHATS_NEXT_MESSAGE,
} from './chat-messages';

export enum DialogueState {
  IDLE = 'idle',
  AWAITING_NAME = 'awaiting_name',
  AWAITING_EMAIL = 'awaiting_email',
  AWAITING_DOB = 'awaiting_dob',
  AWAITING_CONFIRMATION = 'awaiting_confirmation',
  COMPLETED = 'completed',
  CANCELLED = 'cancelled',
}

export interface RegistrationDraft {
  name?: string;
  email?: string;
  dob?: string;
}

export interface DialogueReply {
  text: string;
  state: DialogueState;
}

const FIELD_STATES: Record<RegistrationField, DialogueState> = {
  name: DialogueState.AWAITING_NAME,
  email: DialogueState.AWAITING_EMAIL,
  dob: DialogueState.AWAITING_DOB,
};

const IN_PROGRESS: readonly DialogueState[] = [
  DialogueState.AWAITING_NAME,
  DialogueState.AWAITING_EMAIL,
  DialogueState.AWAITING_DOB,
  DialogueState.AWAITING_CONFIRMATION,
];

const CONFIRM_WORDS = ['confirm', 'yes', 'y'];

/**
 * One registration conversation: collects name, email and date of birth in
 * that order, then asks for confirmation before writing to the store.
 *
 * Store commands (list, search, statistics, help) are only understood while
 * no registration is in progress; `register`, `restart` and `cancel` are
 * understood at every step.
 */
export class RegistrationDialogue {
  private current = DialogueState.IDLE;
  private draft: RegistrationDraft = {};

  constructor(private readonly registrations: RegistrationsService) {}

  get state(): DialogueState {
    return this.current;
  }

  get currentDraft(): Readonly<RegistrationDraft> {
    return { ...this.draft };
  }

  handle(input: string): DialogueReply {
    const text = input.trim();
    try {
      if (IN_PROGRESS.includes(this.current)) {
        const interrupted = this.interrupt(text);
        if (interrupted) return interrupted;
      }
      switch (this.current) {
        case DialogueState.AWAITING_NAME:
          return this.collect('name', text);
        case DialogueState.AWAITING_EMAIL:
          return this.collect('email', text);
        case DialogueState.AWAITING_DOB:
          return this.collect('dob', text);
        case DialogueState.AWAITING_CONFIRMATION:
          return this.confirm(text);
        default:
          this.current = DialogueState.IDLE;
          return this.dispatch(parseChatCommand(text));
      }
    } catch (error) {
      if (!(error instanceof RegistrationStorageException)) throw error;
      return this.reply(
        `**The registrations file could not be accessed.**\n\n${error.reason}\n\nPlease try again.`,
      );
    }
  }

  private dispatch(command: ChatCommand): DialogueReply {
    switch (command.type) {
      case 'register':
        return this.start(START_REGISTRATION_MESSAGE);
      case 'list':
        return this.reply(formatRegistrationList(this.registrations.listAll()));
      case 'search':
        if (!command.query) return this.reply(SEARCH_USAGE_MESSAGE);
        return this.reply(
          formatSearchResults(
            command.query,
            this.registrations.search(command.query),
          ),
        );
      case 'statistics':
        return this.reply(formatStatistics(this.registrations.stats()));
      case 'help':
        return this.reply(HELP_MESSAGE);
      case 'unknown':
        return this.reply(UNKNOWN_COMMAND_MESSAGE);
      default: {
        const unhandled: never = command;
        throw new Error(`Unhandled command ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private interrupt(text: string): DialogueReply | null {
    const word = text.toLowerCase();
    if (word === 'restart') return this.start(RESTART_MESSAGE);
    if (word === 'cancel') return this.cancel();
    if (parseChatCommand(text).type === 'register') {
      return this.start(START_REGISTRATION_MESSAGE);
    }
    return null;
  }

  private start(message: string): DialogueReply {
    this.draft = {};
    this.current = DialogueState.AWAITING_NAME;
    return this.reply(message);
  }

  private cancel(): DialogueReply {
    this.draft = {};
    this.current = DialogueState.CANCELLED;
    return this.reply(CANCELLED_MESSAGE);
  }

  private collect(field: RegistrationField, value: string): DialogueReply {
    const report = this.registrations.validateField(field, value);
    if (!report.valid) {
      return this.reply(
        `Please fix the following:\n${formatViolations(report.violations)}\n\n${FIELD_PROMPTS[field]}`,
      );
    }

    this.draft[field] = value;
    switch (field) {
      case 'name':
        this.current = DialogueState.AWAITING_EMAIL;
        return this.reply(
          `Nice to meet you, **${value}**!\n\nNow, please provide your email address:`,
        );
      case 'email':
        this.current = DialogueState.AWAITING_DOB;
        return this.reply(`Perfect!\n\n${FIELD_PROMPTS.dob}`);
      case 'dob':
        this.current = DialogueState.AWAITING_CONFIRMATION;
        return this.reply(this.confirmationSummary());
    }
  }

  private confirm(text: string): DialogueReply {
    if (!CONFIRM_WORDS.includes(text.toLowerCase())) return this.cancel();

    const { name = '', email = '', dob = '' } = this.draft;
    let result: AddRegistrationResult;
    try {
      result = this.registrations.add(name, email, dob);
    } catch (error) {
      if (!(error instanceof RegistrationStorageException)) throw error;
      return this.reply(
        `**Registration could not be saved.**\n\n${error.reason}\n\nYour details are kept. Type **'confirm'** to try again.`,
      );
    }

    if (result.ok) {
      this.draft = {};
      this.current = DialogueState.COMPLETED;
      return this.reply(
        `**Registration Completed Successfully!**\n\n${formatAddResult(result)}\n\n${WHATS_NEXT_MESSAGE}`,
      );
    }

    const field =
      result.reason === 'duplicate'
        ? 'email'
        : result.report.violations[0].field;
    delete this.draft[field];
    this.current = FIELD_STATES[field];
    return this.reply(
      `**Registration could not be completed.**\n\n${formatViolations(result.report.violations)}\n\n${FIELD_PROMPTS[field]}`,
    );
  }

  private confirmationSummary(): string {
    return [
      '**Please confirm your registration details:**',
      '',
      `- **Name:** ${this.draft.name}`,
      `- **Email:** ${this.draft.email}`,
      `- **Date of Birth:** ${this.draft.dob}`,
      '',
      "Type **'confirm'** to complete registration. Anything else cancels it.",
    ].join('\n');
  }

  private reply(text: string): DialogueReply {
    return { text, state: this.current };
  }
}
