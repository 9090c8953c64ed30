// =============================
// Analyzer: extrae entidades de reserva del último mensaje y las mergea al estado
// =============================
import { HumanMessage, type BaseMessage } from "@langchain/core/messages";
import { createEmptyBookingState, type BookingState } from "@/lib/schemas/booking";
import type { LlmClient } from "@/lib/llm/chatModel";
import { DEFAULT_HISTORY_LIMIT, flattenHistory } from "@/lib/llm/history";
import { createLogger, debugLog } from "@/lib/utils/debugLog";
import { errorMessage } from "./errors";
import { formatSlotTime } from "./format";
import { toYmd } from "./timePreference";
import { mergeBookingState, parseJsonFromResponse } from "./stateUpdater";

const log = createLogger("booking-analyzer");

export const ANALYZER_TEMPERATURE = 0.1;

export type AnalyzerDeps = {
  llm: LlmClient;
  now?: () => Date;
  temperature?: number;
  historyLimit?: number;
  signal?: AbortSignal;
};

const WEEKDAYS = ["воскресенье", "понедельник", "вторник", "среда", "четверг", "пятница", "суббота"];

export function formatCurrentState(state: BookingState): string {
  const parts: string[] = [];
  if (state.service_id !== null || state.service_name) {
    parts.push(`услуга: ${state.service_name ?? "без названия"}${state.service_id !== null ? ` (ID ${state.service_id})` : ""}`);
  }
  if (state.master_id !== null || state.master_name) {
    parts.push(`мастер: ${state.master_name ?? "без имени"}${state.master_id !== null ? ` (ID ${state.master_id})` : ""}`);
  }
  if (state.slot_time) {
    parts.push(`время: ${formatSlotTime(state.slot_time)}${state.slot_time_verified ? " (подтверждено)" : ""}`);
  }
  if (state.client_name) parts.push(`имя клиента: ${state.client_name}`);
  if (state.client_phone) parts.push(`телефон клиента: ${state.client_phone}`);
  return parts.length ? parts.join("; ") : "данных пока нет";
}

export function buildAnalyzerPrompt(current: BookingState, lastMessage: string, now: Date): string {
  return `You are an analytical module. Your task is to return JSON with updated booking data based on the dialogue.

TODAY: ${toYmd(now)} (${WEEKDAYS[now.getDay()]})
CURRENT DATA: ${formatCurrentState(current)}
CLIENT MESSAGE: ${lastMessage}

EXTRACTION RULES (return JSON):
1. service_id: take it from tool results ONLY when the client chose that service for booking. NEVER make up IDs.
2. service_name: if the client names a service ("хочу стрижку"), return it.
3. TOPIC CHANGE: if the client switches to another service, return the new service_name and set service_id, master_id, slot_time to null.
4. slot_time: "YYYY-MM-DD HH:MM", only when the client named an exact time. A date without a time is NOT a slot.
5. client_name and client_phone (digits and + only).
6. master_id (from tools) or master_name, only if the client wants a specific master.

IMPORTANT:
- Return ONLY fields you are confident about and that changed. Return {} if nothing changed.
- Answer with JSON only, no text.

Examples:
- "Хочу педикюр" (current: маникюр) -> {"service_name": "педикюр", "service_id": null, "slot_time": null}
- "Меня зовут Аня" -> {"client_name": "Аня"}
- "Запиши на завтра в 10" -> {"slot_time": "<tomorrow> 10:00"}`;
}

/**
 * Pide al LLM las actualizaciones. Cualquier fallo (API, JSON, vacío) devuelve {}:
 * el analyzer nunca corta el turno.
 */
export async function extractBookingUpdates(
  lastMessage: string,
  history: BaseMessage[],
  current: BookingState,
  deps: AnalyzerDeps
): Promise<Record<string, unknown>> {
  const now = (deps.now ?? (() => new Date()))();
  const messages = [...flattenHistory(history, deps.historyLimit ?? DEFAULT_HISTORY_LIMIT), new HumanMessage(lastMessage)];

  let raw: string;
  try {
    raw = await deps.llm.complete(buildAnalyzerPrompt(current, lastMessage, now), messages, {
      temperature: deps.temperature ?? ANALYZER_TEMPERATURE,
      signal: deps.signal,
    });
  } catch (err) {
    if (deps.signal?.aborted) throw err;
    log.error("fallo del LLM en el analyzer:", errorMessage(err));
    return {};
  }

  if (!raw.trim()) {
    log.warn("respuesta vacía del analyzer");
    return {};
  }
  const parsed = parseJsonFromResponse(raw);
  if (!parsed) {
    log.warn("no se pudo parsear JSON del analyzer:", raw);
    return {};
  }
  debugLog("[booking-analyzer] extraído:", parsed);
  return parsed;
}

/** Un intento finalizado solo se reabre si el cliente pide un servicio nuevo. */
export function applyAnalyzerUpdates(current: BookingState, updates: Record<string, unknown>): BookingState {
  if (current.is_finalized) {
    const wantsNewService =
      (updates.service_id !== undefined && updates.service_id !== null) ||
      (typeof updates.service_name === "string" && updates.service_name.trim() !== "");
    if (!wantsNewService) return current;
    log.info("nuevo pedido tras reserva finalizada: se inicia un intento nuevo");
    return mergeBookingState(createEmptyBookingState(), updates);
  }
  return mergeBookingState(current, updates);
}

export async function runAnalyzer(
  lastMessage: string,
  history: BaseMessage[],
  current: BookingState,
  deps: AnalyzerDeps
): Promise<BookingState> {
  const updates = await extractBookingUpdates(lastMessage, history, current, deps);
  return applyAnalyzerUpdates(current, updates);
}
