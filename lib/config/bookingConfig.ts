// /lib/config/bookingConfig.ts
import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const flag = z
  .string()
  .optional()
  .transform((v) => v === "true");

export const bookingEnvSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  LLM_BOOKING_MODEL: z.string().default("gpt-4o-mini"),
  LLM_ANALYZER_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  LLM_MAX_RETRIES: z.coerce.number().int().nonnegative().default(2),

  CRM_ENDPOINT: z.string().url().default("http://localhost:8080/api/crm"),
  CRM_API_KEY: z.string().optional(),
  CRM_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  CRM_MAX_RETRIES: z.coerce.number().int().positive().default(3),
  CRM_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(1_000),

  BOOKING_MAX_HOPS: z.coerce.number().int().positive().default(3),
  BOOKING_HISTORY_LIMIT: z.coerce.number().int().positive().default(10),
  SALON_NAME: z.string().optional(),

  REDIS_URL: z.string().default("redis://localhost:6379"),
  CONV_STATE_TTL_SECONDS: z.coerce.number().int().positive().default(86_400),

  DEBUG: flag,
  LOG_TO_FILE: flag,
  LOG_FILE: z.string().default("log.txt"),
});

export type BookingEnv = z.infer<typeof bookingEnvSchema>;

export type LlmConfig = {
  apiKey?: string;
  model: string;
  analyzerTemperature: number;
  timeoutMs: number;
  maxRetries: number;
};

export type CrmConfig = {
  endpoint: string;
  apiKey?: string;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
};

export type BookingConfig = {
  llm: LlmConfig;
  crm: CrmConfig;
  maxHops: number;
  historyLimit: number;
  salonName?: string;
  redisUrl: string;
  convStateTtlSeconds: number;
};

/** Lee y valida la configuración. Lanza con la lista de variables inválidas. */
export function loadBookingConfig(env: NodeJS.ProcessEnv = process.env): BookingConfig {
  const parsed = bookingEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Configuración inválida: ${issues}`);
  }
  const e = parsed.data;
  return {
    llm: {
      apiKey: e.OPENAI_API_KEY,
      model: e.LLM_BOOKING_MODEL,
      analyzerTemperature: e.LLM_ANALYZER_TEMPERATURE,
      timeoutMs: e.LLM_TIMEOUT_MS,
      maxRetries: e.LLM_MAX_RETRIES,
    },
    crm: {
      endpoint: e.CRM_ENDPOINT,
      apiKey: e.CRM_API_KEY,
      timeoutMs: e.CRM_TIMEOUT_MS,
      maxRetries: e.CRM_MAX_RETRIES,
      retryDelayMs: e.CRM_RETRY_DELAY_MS,
    },
    maxHops: e.BOOKING_MAX_HOPS,
    historyLimit: e.BOOKING_HISTORY_LIMIT,
    salonName: e.SALON_NAME,
    redisUrl: e.REDIS_URL,
    convStateTtlSeconds: e.CONV_STATE_TTL_SECONDS,
  };
}
