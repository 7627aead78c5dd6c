import pino, { BaseLogger, Logger } from 'pino';
import { config } from '../../config';

export const logger = pino({
  level: config.logLevel,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'healthchat-session-engine',
    env: config.nodeEnv,
  },
  // Pretty print in development
  ...(config.nodeEnv === 'development' && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  }),
});

// ============================================================================
// Execution Logging
// ============================================================================

export async function logExecution<T>(
  correlationId: string,
  action: string,
  fn: () => Promise<T>,
  parentLogger?: BaseLogger
): Promise<T> {
  const log = parentLogger || logger;
  const startTime = Date.now();

  log.debug({ correlationId, action }, `Starting ${action}`);

  try {
    const result = await fn();
    const durationMs = Date.now() - startTime;

    log.info({ correlationId, action, durationMs }, `Completed ${action}`);

    return result;
  } catch (error) {
    const durationMs = Date.now() - startTime;
    const err = error instanceof Error ? error : new Error(String(error));

    log.error({
      correlationId,
      action,
      durationMs,
      error: err.message,
      stack: err.stack,
    }, `Failed ${action}`);

    throw error;
  }
}

// ============================================================================
// AI Usage Logging
// ============================================================================

interface AIUsageLog {
  conversationId: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  latencyMs: number;
}

// USD per million tokens
const MODEL_PRICING: Record<string, { input: number; output: number }> = {
  'claude-3-5-sonnet-20241022': { input: 3.0, output: 15.0 },
  'claude-3-5-haiku-20241022': { input: 0.8, output: 4.0 },
};

const DEFAULT_PRICING = { input: 3.0, output: 15.0 };

export function estimateCostUsd(model: string, inputTokens: number, outputTokens: number): number {
  const pricing = MODEL_PRICING[model]
    ?? (model.includes('haiku') ? MODEL_PRICING['claude-3-5-haiku-20241022'] : undefined)
    ?? DEFAULT_PRICING;

  return (inputTokens * pricing.input + outputTokens * pricing.output) / 1_000_000;
}

export function logAIUsage(usage: AIUsageLog, parentLogger?: BaseLogger): void {
  const log = parentLogger || logger;
  const costUsd = estimateCostUsd(usage.model, usage.inputTokens, usage.outputTokens);

  log.info({ ...usage, costUsd }, 'AI usage');
}

// ============================================================================
// Child Logger Factory
// ============================================================================

export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
