import { randomUUID } from 'crypto';
import { Logger } from 'pino';
import { logAIUsage, createChildLogger } from '../../infra/logging/logger';
import {
  BadRequestError,
  ConversationClosedError,
  isRetryableError,
  toAppError,
} from '../../shared/errors';
import {
  ConversationOverview,
  ConversationSummary,
  ConversationView,
  DiagnosticAnalysis,
  EngineResult,
  Message,
  MessageRole,
  TurnResult,
} from '../../shared/types';
import { isValidMessage, sanitizeInput } from '../../shared/validation';
import {
  CompletionClient,
  classifyAIError,
  failureReply,
  offlineReply,
} from '../ai/service';
import { buildCompletionPayload } from '../assessment/context';
import { buildAnalysisPrompt } from '../assessment/prompts';
import { computeStage, isTerminalStage, needsDiagnosis } from '../assessment/state-machine';
import { extractSymptoms, mergeEvidence } from '../assessment/symptoms';
import { getHealthFactorsBySymptoms } from '../assessment/taxonomy';
import { ConversationRepository, DEFAULT_CONVERSATION_TITLE } from '../conversation/repository';

export const CHAT_MAX_TOKENS = 500;
export const CHAT_TEMPERATURE = 0.7;
export const ANALYSIS_MAX_TOKENS = 1500;
export const ANALYSIS_TEMPERATURE = 0.3;

const ANALYSIS_SYSTEM_PROMPT =
  'You are a health analysis assistant. Produce a structured, non-diagnostic analysis that connects the reported skin and hair symptoms with internal health factors.';

export interface SessionEngineOptions {
  /** Model for diagnostic analysis; chat turns use the client's default. */
  analysisModel?: string;
  logger?: Logger;
  now?: () => Date;
}

export interface ChatTurnResult extends TurnResult {
  /** True when /chat had to open a fresh conversation for this turn. */
  conversationCreated: boolean;
}

interface GeneratedReply {
  reply: string;
  fallback: boolean;
  /** The completion call failed; the reply is a notice, not part of the dialogue. */
  failed: boolean;
}

function ok<T>(value: T): EngineResult<T> {
  return { status: 'ok', value };
}

function notFound<T>(conversationId: string): EngineResult<T> {
  return { status: 'not_found', message: `Conversation not found: ${conversationId}` };
}

/**
 * Produced contract of the service. Every operation resolves to an
 * EngineResult; nothing is thrown to the caller.
 */
export class SessionEngine {
  private log: Logger;
  private now: () => Date;

  constructor(
    private repository: ConversationRepository,
    private completion: CompletionClient | null,
    private options: SessionEngineOptions = {}
  ) {
    this.log = options.logger ?? createChildLogger({ component: 'session-engine' });
    this.now = options.now ?? (() => new Date());
  }

  async getConversation(conversationId: string): Promise<EngineResult<ConversationView>> {
    return this.run<ConversationView>('getConversation', async () => {
      const conversation = await this.repository.getConversation(conversationId);
      return conversation ? ok(conversation) : notFound(conversationId);
    });
  }

  async getConversationSummary(conversationId: string): Promise<EngineResult<ConversationOverview>> {
    return this.run<ConversationOverview>('getConversationSummary', async () => {
      const conversation = await this.repository.getConversation(conversationId);
      if (!conversation) {
        return notFound(conversationId);
      }

      return ok({
        conversationId: conversation.conversationId,
        userId: conversation.userId,
        messageCount: conversation.messages.length,
        symptomsCollected: conversation.symptomsCollected,
        assessmentStage: conversation.assessmentStage,
        needsDiagnosis: conversation.needsDiagnosis,
      });
    });
  }

  async getUserConversations(userId: string): Promise<EngineResult<ConversationSummary[]>> {
    return this.run<ConversationSummary[]>('getUserConversations', async () =>
      ok(await this.repository.getUserConversations(userId))
    );
  }

  async createConversation(
    userId: string,
    title: string = DEFAULT_CONVERSATION_TITLE
  ): Promise<EngineResult<ConversationView>> {
    return this.run<ConversationView>('createConversation', async () =>
      ok(await this.repository.createConversation(userId, title))
    );
  }

  async deleteConversation(conversationId: string): Promise<EngineResult<{ conversationId: string }>> {
    return this.run<{ conversationId: string }>('deleteConversation', async () => {
      const deleted = await this.repository.deleteConversation(conversationId);
      return deleted ? ok({ conversationId }) : notFound(conversationId);
    });
  }

  async appendTurn(conversationId: string, userMessage: string): Promise<EngineResult<TurnResult>> {
    return this.run<TurnResult>('appendTurn', async () => {
      const text = sanitizeInput(userMessage);
      if (!isValidMessage(text)) {
        throw new BadRequestError('Message must not be empty');
      }

      const conversation = await this.repository.getConversation(conversationId);
      if (!conversation) {
        return notFound(conversationId);
      }

      return this.runTurn(conversation, text);
    });
  }

  /**
   * Turn against the user's newest active conversation, opening one if needed.
   */
  async startOrContinueChat(userId: string, userMessage: string): Promise<EngineResult<ChatTurnResult>> {
    return this.run<ChatTurnResult>('startOrContinueChat', async () => {
      const text = sanitizeInput(userMessage);
      if (!isValidMessage(text)) {
        throw new BadRequestError('Message must not be empty');
      }

      let conversation = await this.repository.findActiveConversation(userId);
      const conversationCreated = conversation === null;
      if (!conversation) {
        conversation = await this.repository.createConversation(userId);
      }

      const result = await this.runTurn(conversation, text);
      if (result.status !== 'ok') {
        return result;
      }

      return ok({ ...result.value, conversationCreated });
    });
  }

  async analyzeConversation(conversationId: string): Promise<EngineResult<DiagnosticAnalysis>> {
    return this.run<DiagnosticAnalysis>('analyzeConversation', async () => {
      const conversation = await this.repository.getConversation(conversationId);
      if (!conversation) {
        return notFound(conversationId);
      }

      const symptoms = conversation.symptomsCollected;
      if (Object.keys(symptoms).length === 0) {
        throw new BadRequestError('No symptoms collected yet for analysis');
      }

      const healthFactors = getHealthFactorsBySymptoms(Object.keys(symptoms));
      const base = { conversationId, symptomsAnalyzed: symptoms, healthFactors };

      if (!this.completion) {
        return ok({ ...base, analysis: null, error: 'AI analysis is not configured' });
      }

      try {
        const response = await this.completion.complete({
          system: ANALYSIS_SYSTEM_PROMPT,
          messages: [{ role: 'user', content: buildAnalysisPrompt(symptoms, healthFactors) }],
          maxTokens: ANALYSIS_MAX_TOKENS,
          temperature: ANALYSIS_TEMPERATURE,
          ...(this.options.analysisModel ? { model: this.options.analysisModel } : {}),
        });

        logAIUsage({ conversationId, model: response.model, ...response.usage, latencyMs: response.latencyMs }, this.log);

        return ok({ ...base, analysis: response.content });
      } catch (error) {
        const aiError = classifyAIError(error);
        this.log.warn({ conversationId, kind: aiError.kind }, 'Analysis completion failed');
        return ok({ ...base, analysis: null, error: `Analysis failed: ${aiError.message}` });
      }
    });
  }

  // ==========================================================================
  // Turn pipeline
  // ==========================================================================

  private async runTurn(conversation: ConversationView, text: string): Promise<EngineResult<TurnResult>> {
    const { conversationId } = conversation;

    if (isTerminalStage(conversation.assessmentStage)) {
      throw new ConversationClosedError(conversationId);
    }

    const found = extractSymptoms(text);
    const evidence = mergeEvidence(conversation.symptomsCollected, found);
    const symptomCount = Object.keys(evidence).length;
    const assistantCount = conversation.messages.filter((m) => m.role === 'assistant').length;

    const stageBefore = computeStage({ assistantMessageCount: assistantCount, symptomCount });

    const userRecorded = await this.repository.updateConversation(conversationId, this.message('user', text), {
      symptomsCollected: found,
      assessmentStage: stageBefore,
      needsDiagnosis: needsDiagnosis(stageBefore),
    });
    if (!userRecorded) {
      return notFound(conversationId);
    }

    const payload = buildCompletionPayload({
      stage: stageBefore,
      evidence,
      messages: [
        ...conversation.messages.map((m) => ({ role: m.role, content: m.content })),
        { role: 'user', content: text },
      ],
    });

    const { reply, fallback, failed } = await this.generateReply(
      conversationId,
      text,
      payload.system,
      payload.messages
    );

    // Failure notices are not stored; only stored replies count toward diagnostic_ready.
    if (failed) {
      this.log.info({ conversationId, stage: stageBefore, symptoms: Object.keys(evidence) }, 'Turn recorded without reply');

      return ok({
        conversationId,
        reply,
        stage: stageBefore,
        evidence,
        needsDiagnosis: false,
        assistantReplyContext: payload.context,
        fallback,
      });
    }

    const stageAfter = computeStage({ assistantMessageCount: assistantCount + 1, symptomCount });

    const assistantRecorded = await this.repository.updateConversation(
      conversationId,
      this.message('assistant', reply),
      {
        assessmentStage: stageAfter,
        needsDiagnosis: needsDiagnosis(stageAfter),
      }
    );
    if (!assistantRecorded) {
      return notFound(conversationId);
    }

    this.log.info(
      { conversationId, stage: stageAfter, symptoms: Object.keys(evidence), fallback },
      'Turn recorded'
    );

    return ok({
      conversationId,
      reply,
      stage: stageAfter,
      evidence,
      needsDiagnosis: needsDiagnosis(stageAfter),
      assistantReplyContext: payload.context,
      fallback,
    });
  }

  private async generateReply(
    conversationId: string,
    userText: string,
    system: string,
    messages: Array<{ role: MessageRole; content: string }>
  ): Promise<GeneratedReply> {
    if (!this.completion) {
      return { reply: offlineReply(userText), fallback: true, failed: false };
    }

    try {
      const response = await this.completion.complete({
        system,
        messages,
        maxTokens: CHAT_MAX_TOKENS,
        temperature: CHAT_TEMPERATURE,
      });

      logAIUsage({ conversationId, model: response.model, ...response.usage, latencyMs: response.latencyMs }, this.log);

      if (response.content.length === 0) {
        return { reply: offlineReply(userText), fallback: true, failed: false };
      }

      return { reply: response.content, fallback: false, failed: false };
    } catch (error) {
      const aiError = classifyAIError(error);
      this.log.warn({ conversationId, kind: aiError.kind, error: aiError.message }, 'Using fallback reply');
      return { reply: failureReply(aiError), fallback: true, failed: true };
    }
  }

  private message(role: MessageRole, content: string): Message {
    return {
      role,
      content,
      timestamp: this.now(),
      messageId: `msg_${randomUUID()}`,
    };
  }

  private async run<T>(operation: string, fn: () => Promise<EngineResult<T>>): Promise<EngineResult<T>> {
    try {
      return await fn();
    } catch (error) {
      const appError = toAppError(error);
      const retryable = isRetryableError(error);
      this.log.error({ operation, code: appError.code, error: appError.message, retryable }, 'Engine operation failed');
      return { status: 'error', error: appError, retryable };
    }
  }
}
