import { z } from "zod";

/**
 * 🎯 Estado del sub-diálogo de reserva (servicio → horario → contactos → confirmación).
 * - slot_time en hora local del salón: "YYYY-MM-DD HH:MM".
 * - dialog_step es informativo; el ruteo se decide por los campos.
 */
export const SLOT_TIME_RE = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}$/;

export const DIALOG_STEPS = ["service", "slot", "contacts", "confirmation"] as const;
export type DialogStep = (typeof DIALOG_STEPS)[number];

export const bookingStateSchema = z.object({
  service_id: z.number().int().nullable().default(null),
  service_name: z.string().nullable().default(null),
  master_id: z.number().int().nullable().default(null),
  master_name: z.string().nullable().default(null),
  slot_time: z.string().regex(SLOT_TIME_RE, "slot_time debe ser YYYY-MM-DD HH:MM").nullable().default(null),
  slot_time_verified: z.boolean().nullable().default(null),
  client_name: z.string().nullable().default(null),
  client_phone: z.string().nullable().default(null),
  is_finalized: z.boolean().default(false),
  dialog_step: z.enum(DIALOG_STEPS).default("service"),
});

export type BookingState = z.infer<typeof bookingStateSchema>;

/** Campos que el extractor puede proponer. El resto es del sistema. */
export const EXTRACTABLE_KEYS = [
  "service_id",
  "service_name",
  "master_id",
  "master_name",
  "slot_time",
  "client_name",
  "client_phone",
] as const;
export type ExtractableKey = (typeof EXTRACTABLE_KEYS)[number];

/** `null` en estas claves es una señal explícita de reseteo. */
export const RESETTABLE_KEYS = ["service_id", "slot_time", "master_id", "master_name"] as const;
export type ResettableKey = (typeof RESETTABLE_KEYS)[number];

export function isResettableKey(k: string): k is ResettableKey {
  return RESETTABLE_KEYS.some((x) => x === k);
}

/** Delta que escriben los handlers (pueden tocar campos del sistema). */
export type BookingStateDelta = Partial<Omit<BookingState, "dialog_step">>;

export function createEmptyBookingState(): BookingState {
  return {
    service_id: null,
    service_name: null,
    master_id: null,
    master_name: null,
    slot_time: null,
    slot_time_verified: null,
    client_name: null,
    client_phone: null,
    is_finalized: false,
    dialog_step: "service",
  };
}
