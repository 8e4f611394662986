export type ChatCommand =
  | { type: 'register' }
  | { type: 'list' }
  | { type: 'search'; query: string }
  | { type: 'statistics' }
  | { type: 'help' }
  | { type: 'unknown'; input: string };

type SimpleCommand = Exclude<ChatCommand['type'], 'search' | 'unknown'>;

const ALIASES: ReadonlyArray<{
  type: SimpleCommand;
  phrases: readonly string[];
}> = [
  {
    type: 'register',
    phrases: ['register', 'start registration', 'new registration', 'sign up'],
  },
  {
    type: 'list',
    phrases: [
      'show registrations',
      'list registrations',
      'get all registrations',
      'view all',
    ],
  },
  { type: 'statistics', phrases: ['statistics', 'stats', 'show stats'] },
  { type: 'help', phrases: ['help', '/help', 'commands'] },
];

const SEARCH = /^search(?:\s+([\s\S]*))?$/i;

/**
 * Turns idle-state input into a command. Matching ignores case and outer
 * whitespace.
 */
export function parseChatCommand(input: string): ChatCommand {
  const text = input.trim();

  const search = SEARCH.exec(text);
  if (search) return { type: 'search', query: (search[1] ?? '').trim() };

  const lower = text.toLowerCase().replace(/\s+/g, ' ');
  const alias = ALIASES.find((a) => a.phrases.includes(lower));
  return alias ? { type: alias.type } : { type: 'unknown', input: text };
}
