// =============================
// Merge de actualizaciones del extractor sobre BookingState
// =============================
import {
  EXTRACTABLE_KEYS,
  isResettableKey,
  type BookingState,
  type BookingStateDelta,
  type DialogStep,
  type ExtractableKey,
} from "@/lib/schemas/booking";
import { createLogger, debugLog } from "@/lib/utils/debugLog";

const log = createLogger("booking-state");

type CleanUpdates = {
  service_id?: number | null;
  service_name?: string;
  master_id?: number | null;
  master_name?: string | null;
  slot_time?: string | null;
  client_name?: string;
  client_phone?: string;
};

export function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isExtractableKey(k: string): k is ExtractableKey {
  return EXTRACTABLE_KEYS.some((x) => x === k);
}

/**
 * Extrae un objeto JSON de la respuesta de un LLM.
 * Acepta fences de Markdown y texto alrededor del objeto. Devuelve null si no hay objeto.
 */
export function parseJsonFromResponse(text: string): Record<string, unknown> | null {
  if (!text) return null;
  let body = text.trim();
  const fenced = body.match(/```(?:json)?\s*([\s\S]*?)```/i);
  if (fenced) body = fenced[1].trim();

  const tryParse = (s: string): Record<string, unknown> | null => {
    try {
      const parsed: unknown = JSON.parse(s);
      return isPlainObject(parsed) ? parsed : null;
    } catch {
      return null;
    }
  };

  const direct = tryParse(body);
  if (direct) return direct;

  const start = body.indexOf("{");
  const end = body.lastIndexOf("}");
  if (start === -1 || end <= start) return null;
  return tryParse(body.slice(start, end + 1));
}

export function coerceInt(value: unknown): number | null {
  if (typeof value === "number") return Number.isInteger(value) ? value : null;
  if (typeof value === "string") {
    const s = value.trim();
    return /^[+-]?\d+$/.test(s) ? parseInt(s, 10) : null;
  }
  return null;
}

/** "YYYY-MM-DD HH:MM", "YYYY-MM-DDTHH:MM" o con segundos → "YYYY-MM-DD HH:MM". */
export function normalizeSlotTime(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const m = value.trim().match(/^(\d{4}-\d{2}-\d{2})[ T](\d{2}):(\d{2})(?::\d{2}(?:\.\d+)?)?$/);
  if (!m) return null;
  const [, ymd, hh, mm] = m;
  if (Number(hh) > 23 || Number(mm) > 59) return null;
  return `${ymd} ${hh}:${mm}`;
}

/** 00:00 significa "solo fecha" y nunca se acepta como horario. */
export function isMidnightSlot(value: string): boolean {
  const normalized = normalizeSlotTime(value);
  return normalized !== null && normalized.endsWith(" 00:00");
}

export function normalizePhone(value: unknown): string | null {
  if (typeof value !== "string" && typeof value !== "number") return null;
  const raw = String(value).trim();
  const digits = raw.replace(/\D/g, "");
  if (!digits) return null;
  return (raw.startsWith("+") ? "+" : "") + digits;
}

function cleanText(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const s = value.trim();
  return s ? s : null;
}

/** Compara nombres sin distinguir mayúsculas ni espacios extra. */
export function sameName(a: string, b: string): boolean {
  const norm = (s: string) => s.trim().replace(/\s+/g, " ").toLocaleLowerCase("ru");
  return norm(a) === norm(b);
}

function sanitizeUpdates(updates: Record<string, unknown>): CleanUpdates {
  const clean: CleanUpdates = {};

  for (const [key, value] of Object.entries(updates)) {
    if (!isExtractableKey(key)) {
      debugLog("[booking-state] clave ignorada:", key);
      continue;
    }
    if (value === undefined) continue;
    if (value === null) {
      if (isResettableKey(key)) clean[key] = null;
      continue;
    }

    switch (key) {
      case "service_id":
      case "master_id": {
        const n = coerceInt(value);
        if (n === null) {
          log.warn(`${key} no convertible a entero, se omite:`, value);
          continue;
        }
        clean[key] = n;
        break;
      }
      case "slot_time": {
        const slot = normalizeSlotTime(value);
        if (slot === null) {
          log.warn("slot_time con formato inválido, se omite:", value);
          continue;
        }
        if (slot.endsWith(" 00:00")) {
          debugLog("[booking-state] slot_time a medianoche (solo fecha), se omite:", slot);
          continue;
        }
        clean.slot_time = slot;
        break;
      }
      case "client_phone": {
        const phone = normalizePhone(value);
        if (phone) clean.client_phone = phone;
        break;
      }
      case "service_name":
      case "master_name":
      case "client_name": {
        const text = cleanText(value);
        if (text) clean[key] = text;
        break;
      }
    }
  }
  return clean;
}

export function computeDialogStep(state: Omit<BookingState, "dialog_step">): DialogStep {
  if (state.service_id === null) return "service";
  if (state.slot_time === null) return "slot";
  if (!state.client_name || !state.client_phone) return "contacts";
  return "confirmation";
}

function finalizeInvariants(state: BookingState): BookingState {
  const next = { ...state };
  if (next.slot_time === null) next.slot_time_verified = null;
  next.dialog_step = computeDialogStep(next);
  return next;
}

/**
 * Aplica las actualizaciones del extractor respetando las cascadas:
 * servicio > master > horario > contacto. Solo dispara la de mayor prioridad
 * y nunca borra un campo que vino en la misma actualización.
 */
export function mergeBookingState(current: BookingState, updates: Record<string, unknown>): BookingState {
  if (current.is_finalized) return current;

  const clean = sanitizeUpdates(updates);
  const has = (k: keyof CleanUpdates) => Object.prototype.hasOwnProperty.call(clean, k);
  const next: BookingState = { ...current, ...clean };

  // --- Servicio ---
  let serviceChanged = false;
  let serviceNameOnly = false;
  if (has("service_id")) {
    serviceChanged =
      clean.service_id === null
        ? current.service_id !== null || current.service_name !== null
        : current.service_id !== null && current.service_id !== clean.service_id;
  } else if (has("service_name")) {
    if (current.service_id !== null) {
      // con id resuelto, el nombre suelto es solo una mención; el cambio exige service_id: null
      next.service_name = current.service_name;
    } else {
      serviceChanged = current.service_name !== null && !sameName(current.service_name, clean.service_name ?? "");
      serviceNameOnly = serviceChanged;
    }
  }
  if (!serviceChanged && current.service_name && clean.service_name && sameName(current.service_name, clean.service_name)) {
    next.service_name = current.service_name;
  }

  // --- Master ---
  let masterChanged = false;
  let masterNameOnly = false;
  if (has("master_id")) {
    masterChanged =
      clean.master_id === null
        ? current.master_id !== null || current.master_name !== null
        : current.master_id !== null && current.master_id !== clean.master_id;
  } else if (has("master_name")) {
    masterChanged =
      clean.master_name === null
        ? current.master_name !== null
        : current.master_name !== null && !sameName(current.master_name, clean.master_name ?? "");
    masterNameOnly = masterChanged;
    if (!masterChanged && clean.master_name && current.master_name) next.master_name = current.master_name;
  }

  // un master nuevo sobre un horario ya elegido: la disponibilidad es por master
  const masterAdded =
    current.master_id === null &&
    current.master_name === null &&
    current.slot_time !== null &&
    ((has("master_id") && clean.master_id !== null) || (has("master_name") && Boolean(clean.master_name)));
  if (masterAdded) masterChanged = true;

  // --- Horario ---
  const slotChanged =
    has("slot_time") &&
    (clean.slot_time === null ? current.slot_time !== null : current.slot_time !== null && current.slot_time !== clean.slot_time);

  // --- Contacto ---
  const nameChanged = has("client_name") && current.client_name !== null && current.client_name !== clean.client_name;
  const phoneChanged = has("client_phone") && current.client_phone !== null && current.client_phone !== clean.client_phone;

  const clearUnlessSupplied = (keys: ReadonlyArray<keyof CleanUpdates>) => {
    for (const k of keys) if (!has(k)) next[k] = null;
  };

  if (serviceChanged) {
    debugLog("[booking-state] cambio de servicio → reseteo de master, horario y contactos");
    clearUnlessSupplied(serviceNameOnly ? ["service_id"] : ["service_name"]);
    clearUnlessSupplied(["master_id", "master_name", "slot_time", "client_name", "client_phone"]);
    next.slot_time_verified = null;
  } else if (masterChanged) {
    debugLog("[booking-state] cambio de master → reseteo de horario y contactos");
    clearUnlessSupplied(masterNameOnly ? ["master_id"] : ["master_name"]);
    clearUnlessSupplied(["slot_time", "client_name", "client_phone"]);
    next.slot_time_verified = null;
  } else if (slotChanged) {
    debugLog("[booking-state] cambio de horario → reseteo de verificación y contactos");
    clearUnlessSupplied(["client_name", "client_phone"]);
    next.slot_time_verified = null;
  } else {
    if (nameChanged && !has("client_phone")) next.client_phone = null;
    if (phoneChanged && !has("client_name")) next.client_name = null;
  }

  return finalizeInvariants(next);
}

/** Deltas de los handlers: se aplican tal cual, luego se restablecen los invariantes. */
export function applyStateDelta(state: BookingState, delta: BookingStateDelta): BookingState {
  return finalizeInvariants({ ...state, ...delta });
}
