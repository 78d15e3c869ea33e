import { z } from 'zod';

export interface ChimeinConfigFileParsed {
  schema_version?: number | undefined;
  model?:
    | {
        provider?: string | undefined;
        base_url?: string | undefined;
        default?: string | undefined;
        fast?: string | undefined;
      }
    | undefined;
  attention?:
    | {
        enabled?: boolean | undefined;
        command_prefixes?: string[] | undefined;
        decision_model?: 'default' | 'fast' | undefined;
        immersive?:
          | {
              enabled?: boolean | undefined;
              ttl_ms?: number | undefined;
            }
          | undefined;
        proactive?:
          | {
              enabled?: boolean | undefined;
              delay_ms?: number | undefined;
              buffer_max_lines?: number | undefined;
              rearm_after_interjection?: boolean | undefined;
            }
          | undefined;
      }
    | undefined;
  persona?:
    | {
        name?: string | undefined;
        prompt?: string | undefined;
      }
    | undefined;
}

export const ChimeinConfigFileSchema: z.ZodType<ChimeinConfigFileParsed> = z
  .object({
    schema_version: z.number().int().positive().optional(),

    model: z
      .object({
        provider: z.string().min(1).optional(),
        base_url: z.string().url().optional(),
        default: z.string().min(1).optional(),
        fast: z.string().min(1).optional(),
      })
      .strict()
      .optional(),

    attention: z
      .object({
        enabled: z.boolean().optional(),
        command_prefixes: z.array(z.string()).optional(),
        decision_model: z.enum(['default', 'fast']).optional(),
        immersive: z
          .object({
            enabled: z.boolean().optional(),
            ttl_ms: z.number().int().optional(),
          })
          .strict()
          .optional(),
        proactive: z
          .object({
            enabled: z.boolean().optional(),
            delay_ms: z.number().int().optional(),
            buffer_max_lines: z.number().int().optional(),
            rearm_after_interjection: z.boolean().optional(),
          })
          .strict()
          .optional(),
      })
      .strict()
      .optional(),

    persona: z
      .object({
        name: z.string().min(1).optional(),
        prompt: z.string().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();
