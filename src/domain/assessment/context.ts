import { AssessmentStage, CompletionMessage, Evidence } from '../../shared/types';
import { OPTIONS_FOLLOW_UP_INSTRUCTION, SYSTEM_PROMPT, buildDiagnosticReference } from './prompts';

/** Messages of history handed to the completion service. */
export const HISTORY_WINDOW = 10;

const MAX_LISTED_OPTIONS = 3;
const SELECTION_MARKERS = ['option', 'choice', 'select', 'choose', '1', '2', '3', '4', '5'];

export type ExchangeKind =
  | 'responding_to_options'
  | 'responding_to_question'
  | 'providing_information';

export type LengthBucket = 'early' | 'mid' | 'advanced';

export interface ExchangeAnalysis {
  kind: ExchangeKind;
  /** Option lines offered by the prior assistant message (options case only). */
  options: string[];
  looksLikeSelection: boolean;
}

export interface ContextSnapshot {
  stage: AssessmentStage;
  evidenceKeys: string[];
  exchange: ExchangeAnalysis | null;
  lengthBucket: LengthBucket;
}

export interface CompletionPayload {
  context: string;
  system: string;
  messages: CompletionMessage[];
}

// ============================================================================
// Classification
// ============================================================================

export function classifyExchange(priorAssistantMessage: string): ExchangeKind {
  const hasDigit = /\d/.test(priorAssistantMessage);
  if (hasDigit && (priorAssistantMessage.includes('.') || priorAssistantMessage.includes(':'))) {
    return 'responding_to_options';
  }
  if (priorAssistantMessage.includes('?')) {
    return 'responding_to_question';
  }
  return 'providing_information';
}

export function lengthBucket(messageCount: number): LengthBucket {
  if (messageCount <= 2) return 'early';
  if (messageCount <= 6) return 'mid';
  return 'advanced';
}

function extractOptions(assistantMessage: string): string[] {
  return assistantMessage
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && (/^\d/.test(line) || line.includes(':')))
    .slice(0, MAX_LISTED_OPTIONS);
}

function analyzeExchange(messages: CompletionMessage[]): ExchangeAnalysis | null {
  if (messages.length < 2) {
    return null;
  }

  let lastAssistant: string | undefined;
  let lastUser: string | undefined;
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    if (!message) continue;
    if (message.role === 'assistant' && lastAssistant === undefined) {
      lastAssistant = message.content;
    } else if (message.role === 'user' && lastUser === undefined) {
      lastUser = message.content;
    }
  }

  if (lastAssistant === undefined || lastUser === undefined) {
    return null;
  }

  const kind = classifyExchange(lastAssistant);
  const userText = lastUser.toLowerCase();

  return {
    kind,
    options: kind === 'responding_to_options' ? extractOptions(lastAssistant) : [],
    looksLikeSelection: SELECTION_MARKERS.some((marker) => userText.includes(marker)),
  };
}

// ============================================================================
// Synthesis
// ============================================================================

export function analyzeContext(input: {
  stage: AssessmentStage;
  evidence: Evidence;
  messages: CompletionMessage[];
}): ContextSnapshot {
  return {
    stage: input.stage,
    evidenceKeys: Object.keys(input.evidence),
    exchange: analyzeExchange(input.messages),
    lengthBucket: lengthBucket(input.messages.length),
  };
}

const EXCHANGE_TEXT: Record<ExchangeKind, string> = {
  responding_to_options: 'Previous Context: User is responding to specific options/choices you provided',
  responding_to_question: 'Previous Context: User is responding to questions you asked',
  providing_information: 'Previous Context: User is providing additional information',
};

const LENGTH_TEXT: Record<LengthBucket, string> = {
  early: 'Conversation Status: Early stage - focus on gathering basic information',
  mid: 'Conversation Status: Mid-stage - dive deeper into specific symptoms',
  advanced: 'Conversation Status: Advanced stage - ready for analysis or recommendations',
};

export function renderContext(snapshot: ContextSnapshot): string {
  const parts: string[] = [`Current Assessment Stage: ${snapshot.stage}`];

  if (snapshot.evidenceKeys.length > 0) {
    parts.push(`Identified Symptoms: ${snapshot.evidenceKeys.join(', ')}`);
  }

  if (snapshot.exchange) {
    parts.push(EXCHANGE_TEXT[snapshot.exchange.kind]);
    if (snapshot.exchange.options.length > 0) {
      parts.push(`Options provided: ${snapshot.exchange.options.join(' | ')}`);
    }
    if (snapshot.exchange.looksLikeSelection) {
      parts.push('User Response Type: Appears to be selecting from provided options');
    }
  }

  parts.push(LENGTH_TEXT[snapshot.lengthBucket]);

  return parts.join(' | ');
}

/**
 * Everything the completion service receives for one turn: system
 * instructions with the rendered context, plus the last HISTORY_WINDOW messages.
 */
export function buildCompletionPayload(input: {
  stage: AssessmentStage;
  evidence: Evidence;
  messages: CompletionMessage[];
}): CompletionPayload {
  const snapshot = analyzeContext(input);
  const context = renderContext(snapshot);

  const sections = [SYSTEM_PROMPT, buildDiagnosticReference(), `CONVERSATION CONTEXT: ${context}`];
  if (snapshot.exchange?.kind === 'responding_to_options') {
    sections.push(OPTIONS_FOLLOW_UP_INSTRUCTION);
  }

  return {
    context,
    system: sections.join('\n\n'),
    messages: input.messages.slice(-HISTORY_WINDOW).map((m) => ({ role: m.role, content: m.content })),
  };
}
