import { RegistrationField } from '../../registrations/registration.types';

export const WELCOME_MESSAGE = `**Welcome to the Registration System!**

I can help you with:

**Registration**
- Type **'register'** to start a new registration

**View Data**
- Type **'show registrations'** to view all registered users
- Type **'statistics'** to see registration statistics
- Type **'search [query]'** to search by name or email

**Help**
- Type **'help'** to see all available commands

What would you like to do?`;

export const HELP_MESSAGE = `**Registration Chatbot Help**

**Registration Commands:**
- \`register\` or \`start registration\` - Begin a new user registration
- \`confirm\` - Save your details once they are all collected (anything else cancels)
- \`restart\` - Start over with an empty registration at any step
- \`cancel\` - Abandon the registration in progress

**Data Commands:**
- \`show registrations\` or \`list registrations\` - View all registered users
- \`search [query]\` - Search by name or email (e.g., "search john" or "search @gmail")
- \`statistics\` or \`stats\` - View registration statistics

**General Commands:**
- \`help\` or \`commands\` - Show this help message

**Registration Process:**
1. **Name** - Provide your full name (2-100 characters)
2. **Email** - Enter a valid, not yet registered email address
3. **Date of Birth** - Enter in YYYY-MM-DD format (e.g., 1990-05-15)
4. **Confirmation** - Review and confirm your details

What would you like to do?`;

export const UNKNOWN_COMMAND_MESSAGE = `I didn't understand that.\n\n${HELP_MESSAGE}`;

export const SEARCH_USAGE_MESSAGE =
  'Please provide a search query.\n\n**Usage:** search [name or email]';

export const START_REGISTRATION_MESSAGE =
  "Great! Let's start your registration.\n\nWhat's your full name?";

export const RESTART_MESSAGE =
  "Let's start over!\n\nWhat's your full name?";

export const FIELD_PROMPTS: Record<RegistrationField, string> = {
  name: "What's your full name?",
  email: 'Please provide your email address:',
  dob: 'Please enter your date of birth.\n\n**Format:** YYYY-MM-DD (e.g., 1990-05-15)',
};

export const CANCELLED_MESSAGE =
  "Registration cancelled. Your details were discarded.\n\nType **'register'** to start again.";

export const WHATS_NEXT_MESSAGE = `**What's next?**
- Type **'register'** for a new registration
- Type **'show registrations'** to view all users
- Type **'statistics'** to view registration stats`;
