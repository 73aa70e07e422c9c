import { z } from 'zod';

// Provider types
export const llmProviders = [
  'openai',
  'anthropic',
  'google',
  'ollama',
  'openai-compatible'
] as const;
export type LLMProvider = (typeof llmProviders)[number];

// ═══════════════════════════════════════════════════════════════════════════════
// Retry Policies
// ═══════════════════════════════════════════════════════════════════════════════

const policyFields = z.object({
  maxAttempts: z.number().int().min(1).max(10),
  baseDelayMs: z.number().int().min(0),
  maxDelayMs: z.number().int().min(0),
  jitter: z.number().min(0).max(1),
  timeoutPerAttemptMs: z.number().int().positive()
});

export const retryPolicySchema = policyFields.superRefine((data, ctx) => {
  if (data.maxDelayMs < data.baseDelayMs) {
    ctx.addIssue({
      code: 'custom',
      path: ['maxDelayMs'],
      message: 'maxDelayMs must be greater than or equal to baseDelayMs'
    });
  }
});

export type RetryPolicyConfig = z.infer<typeof retryPolicySchema>;

export const DEFAULT_RETRY_POLICY = {
  maxAttempts: 3,
  baseDelayMs: 200,
  maxDelayMs: 5000,
  jitter: 0.2,
  timeoutPerAttemptMs: 15000
} as const;

/** Call sites that take their own policy; unset ones fall back to `resilience.default`. */
export const policyNames = [
  'graph',
  'records',
  'prediction',
  'tools',
  'planner',
  'discovery'
] as const;
export type PolicyName = (typeof policyNames)[number];

const partialPolicySchema = policyFields.partial();

// ═══════════════════════════════════════════════════════════════════════════════
// Config Schema
// ═══════════════════════════════════════════════════════════════════════════════

export const configSchema = z
  .object({
    $schema: z.string().optional(),

    server: z
      .object({
        port: z.number().int().min(1).max(65535).default(8000)
      })
      .optional(),

    llm: z
      .object({
        provider: z.enum(llmProviders),
        providerName: z.string().min(1).optional(),
        apiKey: z.string().optional(),
        baseUrl: z.string().url().optional(),
        model: z.string().min(1),
        temperature: z.number().min(0).max(2).optional(),
        maxTokens: z.number().int().positive().optional()
      })
      .superRefine((data, ctx) => {
        const cloudProviders = ['openai', 'anthropic', 'google'];
        if (cloudProviders.includes(data.provider)) {
          if (!data.apiKey)
            ctx.addIssue({
              code: 'custom',
              path: ['apiKey'],
              message: `apiKey required for provider '${data.provider}'`
            });
          if (data.baseUrl)
            ctx.addIssue({
              code: 'custom',
              path: ['baseUrl'],
              message: `baseUrl not allowed for provider '${data.provider}'`
            });
        }
        if (data.provider === 'openai-compatible' && !data.baseUrl) {
          ctx.addIssue({
            code: 'custom',
            path: ['baseUrl'],
            message: "baseUrl required for provider 'openai-compatible'"
          });
        }
        if (data.provider !== 'openai-compatible' && data.providerName) {
          ctx.addIssue({
            code: 'custom',
            path: ['providerName'],
            message: "providerName only allowed for provider 'openai-compatible'"
          });
        }
      }),

    graph: z.object({
      uri: z.string().min(1),
      user: z.string().min(1),
      password: z.string(),
      database: z.string().min(1).default('neo4j'),
      maxConnectionPoolSize: z.number().int().positive().default(20)
    }),

    records: z.object({
      connectionString: z.string().min(1),
      poolSize: z.number().int().positive().default(10)
    }),

    prediction: z.object({
      diabetesUrl: z.string().url(),
      cardioUrl: z.string().url()
    }),

    agent: z
      .object({
        maxIterations: z.number().int().min(1).max(20).default(5),
        maxPlanRepairs: z.number().int().min(0).max(5).default(2),
        requestTimeoutMs: z.number().int().positive().default(120000)
      })
      .optional(),

    tools: z
      .object({
        graphQuery: z
          .object({
            maxQueryLength: z.number().int().positive().default(2000),
            maxMatchClauses: z.number().int().positive().default(4),
            maxRows: z.number().int().positive().default(200)
          })
          .optional()
      })
      .optional(),

    resilience: z
      .object({
        default: retryPolicySchema.optional(),
        policies: z.record(z.enum(policyNames), partialPolicySchema).optional(),
        jitterSeed: z.number().int().optional()
      })
      .optional(),

    discovery: z
      .object({
        servers: z
          .array(
            z.object({
              name: z
                .string()
                .regex(/^[a-z][a-z0-9_]*$/, 'server name must be lower snake case'),
              url: z.string().url()
            })
          )
          .default([])
      })
      .optional(),

    sessions: z
      .object({
        maxSessions: z.number().int().positive().default(1000),
        maxTurns: z.number().int().positive().default(40)
      })
      .optional()
  })
  .transform((data, ctx) => {
    // Apply section defaults
    const server = { port: data.server?.port ?? 8000 };
    const agent = data.agent ?? { maxIterations: 5, maxPlanRepairs: 2, requestTimeoutMs: 120000 };
    const graphQuery = data.tools?.graphQuery ?? {
      maxQueryLength: 2000,
      maxMatchClauses: 4,
      maxRows: 200
    };
    const sessions = data.sessions ?? { maxSessions: 1000, maxTurns: 40 };
    const discovery = { servers: data.discovery?.servers ?? [] };

    // Merge each named policy over the default policy
    const defaults: RetryPolicyConfig = data.resilience?.default ?? { ...DEFAULT_RETRY_POLICY };
    const overrides: Partial<Record<PolicyName, Partial<RetryPolicyConfig>>> =
      data.resilience?.policies ?? {};
    const merge = (name: PolicyName): RetryPolicyConfig => ({ ...defaults, ...overrides[name] });
    const policies = {
      graph: merge('graph'),
      records: merge('records'),
      prediction: merge('prediction'),
      tools: merge('tools'),
      planner: merge('planner'),
      discovery: merge('discovery')
    } satisfies Record<PolicyName, RetryPolicyConfig>;

    for (const name of policyNames) {
      const merged = policies[name];
      if (merged.maxDelayMs < merged.baseDelayMs) {
        ctx.addIssue({
          code: 'custom',
          path: ['resilience', 'policies', name, 'maxDelayMs'],
          message: 'maxDelayMs must be greater than or equal to baseDelayMs'
        });
      }
    }

    return {
      ...data,
      server,
      agent,
      tools: { graphQuery },
      sessions,
      discovery,
      resilience: { default: defaults, policies, jitterSeed: data.resilience?.jitterSeed }
    };
  });

export type Config = z.infer<typeof configSchema>;
export type ConfigInput = z.input<typeof configSchema>;
