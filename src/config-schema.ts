import { z } from 'zod';

const AuthConfigSchema = z.discriminatedUnion('method', [
  z.object({ method: z.literal('api_key'), apiKey: z.string().min(1) }),
  z.object({ method: z.literal('env'), envVar: z.string().min(1) }),
  z.object({ method: z.literal('none') }),
]);

const ProviderConfigSchema = z.object({
  name: z.string().min(1),
  provider: z.enum([
    'openai',
    'anthropic',
    'google',
    'openrouter',
    'mistral',
    'deepseek',
    'groq',
    'xai',
    'ollama',
    'custom',
  ]),
  model: z.string().min(1),
  auth: AuthConfigSchema.optional(),
  baseUrl: z.string().url().optional(),
  maxTokens: z.number().int().positive().optional(),
});

export const ConfigSchema = z
  .object({
    providers: z.array(ProviderConfigSchema).default([]),
    roster: z.array(z.string().min(1)).min(1).optional(),
    critic: z.string().min(1).optional(),
    synthesizer: z.string().min(1).optional(),
    agreementModel: z.string().min(1).optional(),
    /** Per-call deadline in seconds */
    timeout: z.number().positive().default(30),
    onCriticFailure: z.enum(['abort', 'empty']).default('abort'),
    sessionDir: z.string().min(1).optional(),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.providers.forEach((p, i) => {
      if (seen.has(p.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['providers', i, 'name'],
          message: `Duplicate provider name "${p.name}"`,
        });
      }
      seen.add(p.name);
    });
  });

export type ConfigInput = z.input<typeof ConfigSchema>;
