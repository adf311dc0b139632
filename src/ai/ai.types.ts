/**
 * DI token for the reply generator used on the live reply path.
 */
export const REPLY_GENERATOR = Symbol('REPLY_GENERATOR');

/**
 * DI token for the judge consulted by follow-ups and reminders.
 */
export const CONVERSATION_JUDGE = Symbol('CONVERSATION_JUDGE');

export interface ReplyRequest {
  tenantId: string;
  chatId: string;
  /** The flushed buffer: every fragment of the burst joined in order */
  mergedText: string;
  /** Recent `User: …` / `AI: …` lines, oldest first */
  context: string;
}

/**
 * Produces the assistant's answer to a merged user message.
 * Rejects when no reply could be produced.
 */
export interface ReplyGenerator {
  generateReply(request: ReplyRequest): Promise<string>;
}

export interface JudgeRequest {
  tenantId: string;
  chatId: string;
  /** What this stage or reminder should try to achieve */
  instruction: string;
  recentContext: string;
}

export type Judgment =
  | { verdict: 'send'; text: string }
  | { verdict: 'suppress'; reason?: string };

/**
 * Decides whether an unsolicited message should go out, and with what text.
 */
export interface ConversationJudge {
  judge(request: JudgeRequest): Promise<Judgment>;
}
