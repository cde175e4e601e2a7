import { z } from 'zod';
import { currencySchema } from '../../src/domain/validation.js';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8787),
  UPLOAD_LIMIT: z.string().default('10mb'),
  DEFAULT_CURRENCY: currencySchema.default('$'),
});

export interface ServerConfig {
  port: number;
  uploadLimit: string;
  defaultCurrency: z.infer<typeof currencySchema>;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid environment: ${detail}`);
  }
  return {
    port: parsed.data.PORT,
    uploadLimit: parsed.data.UPLOAD_LIMIT,
    defaultCurrency: parsed.data.DEFAULT_CURRENCY,
  };
}
