// =============================
// Ruteo del sub-diálogo de reserva: decide el próximo handler a partir de los campos
// =============================
import { END } from "@langchain/langgraph";
import type { BookingState } from "@/lib/schemas/booking";

export const BOOKING_NODES = {
  analyzer: "analyzer",
  serviceManager: "service_manager",
  slotManager: "slot_manager",
  contactCollector: "contact_collector",
  finalizer: "finalizer",
  hopLimit: "hop_limit",
} as const;

export type BookingHandlerNode =
  | typeof BOOKING_NODES.serviceManager
  | typeof BOOKING_NODES.slotManager
  | typeof BOOKING_NODES.contactCollector
  | typeof BOOKING_NODES.finalizer;

export type BookingRoute = BookingHandlerNode | typeof END;

type RoutableState = Pick<
  BookingState,
  "is_finalized" | "service_id" | "slot_time" | "slot_time_verified" | "client_name" | "client_phone"
>;

export function routeBooking(state: RoutableState): BookingRoute {
  if (state.is_finalized) return END;
  if (state.service_id === null) return BOOKING_NODES.serviceManager;
  if (state.slot_time === null) return BOOKING_NODES.slotManager;
  if (state.slot_time_verified !== true) return BOOKING_NODES.slotManager;
  if (!state.client_name || !state.client_phone) return BOOKING_NODES.contactCollector;
  return BOOKING_NODES.finalizer;
}

/** Después del slot manager solo se sigue si el horario quedó verificado. */
export function routeAfterSlotManager(state: RoutableState): BookingRoute {
  if (state.slot_time_verified !== true) return END;
  return routeBooking(state);
}
