import { AppError } from './errors';

// ============================================================================
// Assessment Types
// ============================================================================

export type AssessmentStage =
  | 'initial'
  | 'gathering_info'
  | 'diagnostic_ready'
  | 'completed';

export interface SymptomEvidence {
  category: string;
  mentioned: true;
}

/** Symptom key (e.g. `hair_loss`) to the evidence recorded for it. */
export type Evidence = Record<string, SymptomEvidence>;

// ============================================================================
// Message Types
// ============================================================================

export type MessageRole = 'user' | 'assistant';

export interface Message {
  role: MessageRole;
  content: string;
  timestamp: Date;
  messageId?: string;
}

export interface MessageView {
  role: MessageRole;
  content: string;
  timestamp: string;
  messageId?: string;
}

// ============================================================================
// Conversation Types
// ============================================================================

/**
 * Durable record as held by the document store.
 */
export interface ConversationDocument {
  conversationId: string;
  userId: string;
  title: string;
  messages: Message[];
  lastMessage: string;
  createdAt: Date;
  updatedAt: Date;
  assessmentStage: AssessmentStage;
  symptomsCollected: Evidence;
  needsDiagnosis: boolean;
}

/**
 * Wire and cache representation. Timestamps are ISO-8601 strings.
 */
export interface ConversationView {
  conversationId: string;
  userId: string;
  title: string;
  messages: MessageView[];
  createdAt: string;
  updatedAt: string;
  assessmentStage: AssessmentStage;
  symptomsCollected: Evidence;
  needsDiagnosis: boolean;
}

export interface ConversationSummary {
  conversationId: string;
  title: string;
  lastMessage: string;
  messageCount: number;
  createdAt: string;
  updatedAt: string;
}

/** Assessment state of one conversation without its message bodies. */
export interface ConversationOverview {
  conversationId: string;
  userId: string;
  messageCount: number;
  symptomsCollected: Evidence;
  assessmentStage: AssessmentStage;
  needsDiagnosis: boolean;
}

export interface AssessmentDelta {
  title?: string;
  assessmentStage?: AssessmentStage;
  symptomsCollected?: Evidence;
  needsDiagnosis?: boolean;
}

// ============================================================================
// Completion Types
// ============================================================================

export interface CompletionMessage {
  role: MessageRole;
  content: string;
}

export interface CompletionRequest {
  system: string;
  messages: CompletionMessage[];
  maxTokens: number;
  temperature: number;
  model?: string;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface CompletionResponse {
  content: string;
  model: string;
  usage: TokenUsage;
  latencyMs: number;
}

// ============================================================================
// Engine Outcomes
// ============================================================================

export type EngineResult<T> =
  | { status: 'ok'; value: T }
  | { status: 'not_found'; message: string }
  | { status: 'error'; error: AppError; retryable: boolean };

export interface TurnResult {
  conversationId: string;
  reply: string;
  stage: AssessmentStage;
  evidence: Evidence;
  needsDiagnosis: boolean;
  assistantReplyContext: string;
  fallback: boolean;
}

export interface HealthFactor {
  factor: string;
  impactLevel: 'high' | 'medium' | 'low';
  relatedSymptoms: string[];
  recommendations: string[];
}

export interface DiagnosticAnalysis {
  conversationId: string;
  analysis: string | null;
  symptomsAnalyzed: Evidence;
  healthFactors: HealthFactor[];
  error?: string;
}
