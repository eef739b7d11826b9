import { Backoff, type BackoffOptions } from './Backoff';
import type { ChatModel } from './GenAI';
import { silentLogger, type Logger } from './Log';
import {
  collapseMessages,
  formatMessages,
  messageText,
  systemMessage,
  userMessage,
  type Message,
  type MessageContent,
} from './Message';
import { TokenUsageLog } from './TokenUsage';

export interface ConversationOptions {
  model: ChatModel;
  // Overrides the backend's own vision flag
  vision?: boolean;
  backoff?: BackoffOptions;
  logger?: Logger;
}

/**
 * Drives request/response cycles with one model and keeps the token ledger for
 * every step that goes through it. One instance per agent run.
 */
export class Conversation {
  readonly model: ChatModel;
  readonly vision: boolean;
  readonly tokenUsageLog: TokenUsageLog;
  private readonly backoff: Backoff;
  private readonly logger: Logger;

  constructor(options: ConversationOptions) {
    this.model = options.model;
    this.vision = options.vision ?? options.model.vision;
    this.logger = options.logger ?? silentLogger;
    this.backoff = new Backoff({ logger: this.logger, ...options.backoff });
    this.tokenUsageLog = new TokenUsageLog(options.model.model, this.logger);
  }

  /** Opens a transcript with a system and a user message and gets the first reply. */
  async start(system: string, user: MessageContent, stepName: string): Promise<Message[]> {
    return this.next([systemMessage(system), userMessage(user)], undefined, stepName);
  }

  /**
   * Sends the transcript (plus `prompt` as a new user message, when given) and
   * returns a new transcript ending with the model's reply.
   */
  async next(messages: readonly Message[], prompt: string | undefined, stepName: string): Promise<Message[]> {
    let transcript = prompt ? [...messages, userMessage(prompt)] : [...messages];
    if (!this.vision) {
      transcript = collapseMessages(transcript);
    }

    this.logger.debug(`Creating a new chat completion (${stepName}):\n${formatMessages(transcript)}`);
    const reply = await this.backoff.run(() => this.model.invoke(transcript));

    await this.tokenUsageLog.update(transcript, messageText(reply.content), stepName);
    this.logger.debug(`Chat completion finished (${stepName})`);
    return [...transcript, reply];
  }
}
