import { z } from 'zod';

const configSchema = z.object({
  // Environment
  nodeEnv: z.enum(['development', 'production', 'test']).default('production'),

  // Server
  port: z.coerce.number().default(8002),
  apiSecretKey: z.string().min(16),
  corsOrigins: z.string().default('*').transform((s) => s.split(',').map((origin) => origin.trim())),

  // Document store
  databaseUrl: z.string().url(),
  storeTimeoutMs: z.coerce.number().int().positive().default(5000),

  // Session cache (unset = cache disabled)
  redisUrl: z.string().optional(),
  cacheTimeoutMs: z.coerce.number().int().positive().default(500),

  // AI Services (unset key = canned fallback replies)
  anthropicApiKey: z.string().optional(),
  chatModel: z.string().default('claude-3-5-haiku-20241022'),
  analysisModel: z.string().default('claude-3-5-sonnet-20241022'),
  claudeRpmLimit: z.coerce.number().default(50),

  // Logging
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

function loadConfig() {
  const result = configSchema.safeParse({
    nodeEnv: process.env.NODE_ENV,
    port: process.env.PORT,
    apiSecretKey: process.env.API_SECRET_KEY,
    corsOrigins: process.env.CORS_ORIGINS,
    databaseUrl: process.env.DATABASE_URL,
    storeTimeoutMs: process.env.STORE_TIMEOUT_MS,
    redisUrl: process.env.REDIS_URL || undefined,
    cacheTimeoutMs: process.env.CACHE_TIMEOUT_MS,
    anthropicApiKey: process.env.ANTHROPIC_API_KEY || undefined,
    chatModel: process.env.ANTHROPIC_MODEL,
    analysisModel: process.env.ANALYSIS_MODEL,
    claudeRpmLimit: process.env.CLAUDE_RPM_LIMIT,
    logLevel: process.env.LOG_LEVEL,
  });

  if (!result.success) {
    console.error('Configuration validation failed:');
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}

export const config = loadConfig();
export type Config = z.infer<typeof configSchema>;
