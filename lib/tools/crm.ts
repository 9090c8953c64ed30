import { z } from "zod";
import type { CrmConfig } from "@/lib/config/bookingConfig";
import { SLOT_TIME_RE } from "@/lib/schemas/booking";
import { CrmError, ManagerEscalationError, errorMessage } from "@/lib/agents/booking/errors";
import { debugLog } from "@/lib/utils/debugLog";
import { retryWithBackoff } from "./retry";

/**
 * 🧰 Contratos del CRM del salón con schemas Zod.
 * El formato de cada proveedor queda detrás del endpoint; acá solo viaja este contrato.
 */

// ===== Schemas de I/O =====
export const CrmCategorySchema = z.object({
  id: z.coerce.number().int(),
  title: z.string(),
});
export type CrmCategory = z.infer<typeof CrmCategorySchema>;

export const CrmServiceSchema = z.object({
  id: z.coerce.number().int(),
  title: z.string(),
  price: z.union([z.number(), z.string()]).nullable().optional(),
});
export type CrmService = z.infer<typeof CrmServiceSchema>;

export const SlotOptionSchema = z.object({
  master: z.string(),
  masterId: z.number().int().optional(),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  /** "HH:MM-HH:MM" (inicios consecutivos fusionados) o "HH:MM" */
  timeRanges: z.array(z.string()),
});
export type SlotOption = z.infer<typeof SlotOptionSchema>;

export const FindSlotsInput = z.object({
  serviceId: z.number().int(),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional(),
  timePeriod: z.string().optional(),
  masterId: z.number().int().optional(),
  masterName: z.string().optional(),
});
export type FindSlotsInput = z.infer<typeof FindSlotsInput>;

export const CreateBookingInput = z.object({
  serviceId: z.number().int(),
  clientName: z.string().min(1),
  clientPhone: z.string().min(1),
  datetime: z.string().regex(SLOT_TIME_RE, "datetime debe ser YYYY-MM-DD HH:MM"),
  masterName: z.string().optional(),
});
export type CreateBookingInput = z.infer<typeof CreateBookingInput>;

export const CreateBookingOutput = z.object({
  success: z.boolean(),
  message: z.string().optional(),
  error: z.string().optional(),
});
export type CreateBookingOutput = z.infer<typeof CreateBookingOutput>;

/** Marca de escalamiento que el CRM puede devolver en cualquier respuesta. */
const EscalationMarker = z.object({
  escalation: z.object({
    userMessage: z.string(),
    alert: z.string(),
  }),
});

const CategoriesResponse = z.object({ categories: z.array(CrmCategorySchema) });
const ServicesResponse = z.object({ services: z.array(CrmServiceSchema) });
const SlotsResponse = z.object({ slots: z.array(SlotOptionSchema) });

export interface CrmClient {
  getCategories(signal?: AbortSignal): Promise<CrmCategory[]>;
  searchServices(query: string, masterName?: string, signal?: AbortSignal): Promise<CrmService[]>;
  findSlots(input: FindSlotsInput, signal?: AbortSignal): Promise<SlotOption[]>;
  createBooking(input: CreateBookingInput, signal?: AbortSignal): Promise<CreateBookingOutput>;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/** Qué errores admiten otro intento en una llamada. */
export type RetryPolicy = (err: CrmError) => boolean;

const retryTransient: RetryPolicy = (err) => err.retryable;
// crear una reserva no es idempotente: tras un timeout o un 5xx pudo haber quedado guardada
const retryRateLimitOnly: RetryPolicy = (err) => err.status === 429;

function timeoutSignal(ms: number, outer?: AbortSignal): { signal: AbortSignal; done: () => void } {
  const ctrl = new AbortController();
  const timer = setTimeout(() => ctrl.abort(new CrmError(`timeout después de ${ms}ms`, { retryable: true })), ms);
  const onAbort = () => ctrl.abort(outer?.reason);
  if (outer?.aborted) ctrl.abort(outer.reason);
  else outer?.addEventListener("abort", onAbort, { once: true });
  return {
    signal: ctrl.signal,
    done: () => {
      clearTimeout(timer);
      outer?.removeEventListener("abort", onAbort);
    },
  };
}

export class HttpCrmClient implements CrmClient {
  constructor(
    private readonly cfg: CrmConfig,
    private readonly fetchImpl: FetchLike = (url, init) => fetch(url, init),
    private readonly sleep?: (ms: number) => Promise<void>
  ) {}

  // ===== Helpers HTTP =====
  private async postJSON<S extends z.ZodTypeAny>(
    path: string,
    body: unknown,
    schema: S,
    signal?: AbortSignal,
    retryOn: RetryPolicy = retryTransient
  ): Promise<z.infer<S>> {
    const url = this.cfg.endpoint.replace(/\/+$/, "") + path;
    debugLog("[crm] POST", url, body);

    const json = await retryWithBackoff(
      async () => {
        const t = timeoutSignal(this.cfg.timeoutMs, signal);
        let res: Response;
        let txt: string;
        try {
          res = await this.fetchImpl(url, {
            method: "POST",
            headers: {
              "Content-Type": "application/json",
              ...(this.cfg.apiKey ? { "x-api-key": this.cfg.apiKey } : {}),
            },
            body: JSON.stringify(body),
            signal: t.signal,
          });
          txt = await res.text();
        } catch (err) {
          if (signal?.aborted) throw err;
          throw new CrmError(`CRM ${path}: ${errorMessage(err)}`, { retryable: true, cause: err });
        } finally {
          t.done();
        }
        if (!res.ok) {
          throw new CrmError(`CRM ${path} ${res.status}: ${txt || "error HTTP"}`, {
            status: res.status,
            retryable: res.status === 429 || res.status >= 500,
          });
        }
        try {
          const parsed: unknown = txt ? JSON.parse(txt) : {};
          return parsed;
        } catch (err) {
          throw new CrmError(`CRM ${path}: respuesta no es JSON`, { cause: err });
        }
      },
      {
        maxAttempts: this.cfg.maxRetries,
        initialDelayMs: this.cfg.retryDelayMs,
        shouldRetry: (err) => err instanceof CrmError && retryOn(err),
        signal,
        sleep: this.sleep,
      }
    );

    const escalation = EscalationMarker.safeParse(json);
    if (escalation.success) {
      throw new ManagerEscalationError(escalation.data.escalation.userMessage, escalation.data.escalation.alert);
    }
    const out = schema.safeParse(json);
    if (!out.success) {
      throw new CrmError(`CRM ${path}: respuesta inválida (${out.error.issues.map((i) => i.path.join(".")).join(", ")})`);
    }
    return out.data;
  }

  // ===== Tools =====
  async getCategories(signal?: AbortSignal): Promise<CrmCategory[]> {
    const out = await this.postJSON("/categories", {}, CategoriesResponse, signal);
    return out.categories;
  }

  async searchServices(query: string, masterName?: string, signal?: AbortSignal): Promise<CrmService[]> {
    const out = await this.postJSON("/services/search", { query, ...(masterName ? { masterName } : {}) }, ServicesResponse, signal);
    return out.services;
  }

  async findSlots(input: FindSlotsInput, signal?: AbortSignal): Promise<SlotOption[]> {
    const parsed = FindSlotsInput.parse(input);
    const out = await this.postJSON("/slots", parsed, SlotsResponse, signal);
    return out.slots;
  }

  async createBooking(input: CreateBookingInput, signal?: AbortSignal): Promise<CreateBookingOutput> {
    const parsed = CreateBookingInput.parse(input);
    return this.postJSON("/bookings/create", parsed, CreateBookingOutput, signal, retryRateLimitOnly);
  }
}
