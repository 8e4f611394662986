import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { RegistrationsService } from '../registrations/registrations.service';
import { WELCOME_MESSAGE } from './dialogue/chat-messages';
import {
  DialogueReply,
  DialogueState,
  RegistrationDialogue,
  RegistrationDraft,
} from './dialogue/registration-dialogue';

export interface ChatSessionView {
  sessionId: string;
  state: DialogueState;
  draft: Readonly<RegistrationDraft>;
}

export const DEFAULT_SESSION_TTL_MS = 30 * 60 * 1000;

interface ChatSession {
  dialogue: RegistrationDialogue;
  lastActiveAt: number;
}

/**
 * In-memory registry of conversations, one dialogue per session id.
 * Sessions idle for longer than `CHAT_SESSION_TTL_MS` are dropped the next
 * time any session is opened or looked up.
 */
@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name);
  private readonly sessions = new Map<string, ChatSession>();
  private readonly ttlMs: number;

  constructor(
    private readonly registrations: RegistrationsService,
    private readonly configService: ConfigService,
  ) {
    this.ttlMs = Number(
      this.configService.get<string>('CHAT_SESSION_TTL_MS') ??
        DEFAULT_SESSION_TTL_MS,
    );
  }

  open(): { sessionId: string; reply: DialogueReply } {
    this.evictIdle();
    const sessionId = uuidv4();
    const dialogue = new RegistrationDialogue(this.registrations);
    this.sessions.set(sessionId, { dialogue, lastActiveAt: Date.now() });
    this.logger.log(`Chat session ${sessionId} opened`);

    return {
      sessionId,
      reply: { text: WELCOME_MESSAGE, state: dialogue.state },
    };
  }

  send(sessionId: string, text: string): DialogueReply {
    return this.find(sessionId).handle(text);
  }

  describe(sessionId: string): ChatSessionView {
    const dialogue = this.find(sessionId);
    return { sessionId, state: dialogue.state, draft: dialogue.currentDraft };
  }

  close(sessionId: string): void {
    this.evictIdle();
    if (!this.sessions.delete(sessionId)) {
      throw new NotFoundException(`Chat session ${sessionId} not found`);
    }
    this.logger.log(`Chat session ${sessionId} closed`);
  }

  private find(sessionId: string): RegistrationDialogue {
    this.evictIdle();
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new NotFoundException(`Chat session ${sessionId} not found`);
    }
    session.lastActiveAt = Date.now();
    return session.dialogue;
  }

  private evictIdle(): void {
    const cutoff = Date.now() - this.ttlMs;
    for (const [sessionId, session] of this.sessions) {
      if (session.lastActiveAt > cutoff) continue;
      this.sessions.delete(sessionId);
      this.logger.log(`Chat session ${sessionId} expired`);
    }
  }
}
