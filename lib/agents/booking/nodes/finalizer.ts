import type { BookingState } from "@/lib/schemas/booking";
import type { CreateBookingOutput } from "@/lib/tools/crm";
import { createLogger } from "@/lib/utils/debugLog";
import { CrmError } from "../errors";
import { formatSlotTime } from "../format";
import { emptyResult, type BookingDeps, type BookingHandler } from "./types";

const log = createLogger("finalizer");

export const BOOKING_TECH_ERROR_REPLY =
  "Извините, не удалось создать запись из-за технической ошибки. Попробуйте, пожалуйста, ещё раз чуть позже.";

export function confirmationText(booking: BookingState, slotTime: string): string {
  const service = booking.service_name ?? "услугу";
  const master = booking.master_name ? ` к мастеру ${booking.master_name}` : "";
  return `Готово! Я записала вас на ${service} ${formatSlotTime(slotTime)}${master}. Будем вас ждать!`;
}

export function createFinalizer(deps: BookingDeps): BookingHandler {
  return async ({ booking, signal }) => {
    const { service_id, slot_time, client_name, client_phone } = booking;
    if (booking.is_finalized) return emptyResult();
    if (service_id === null || slot_time === null || !client_name || !client_phone) {
      log.warn("finalizer sin datos completos, se omite", booking);
      return emptyResult();
    }

    let result: CreateBookingOutput;
    try {
      result = await deps.crm.createBooking(
        {
          serviceId: service_id,
          clientName: client_name,
          clientPhone: client_phone,
          datetime: slot_time,
          ...(booking.master_name ? { masterName: booking.master_name } : {}),
        },
        signal
      );
    } catch (err) {
      if (!(err instanceof CrmError)) throw err;
      log.error("createBooking falló:", err.message);
      return { reply: BOOKING_TECH_ERROR_REPLY, stateDelta: {}, toolCallsUsed: ["create_booking"] };
    }

    if (!result.success) {
      const reason = result.error || result.message || "неизвестная ошибка";
      log.warn("CRM rechazó la reserva:", reason);
      return { reply: `Не удалось создать запись: ${reason}`, stateDelta: {}, toolCallsUsed: ["create_booking"] };
    }

    log.info(`reserva creada: servicio ${service_id} ${slot_time}`);
    return {
      reply: confirmationText(booking, slot_time),
      stateDelta: { is_finalized: true },
      toolCallsUsed: ["create_booking"],
    };
  };
}
