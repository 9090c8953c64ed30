import { createLogger } from "@/lib/utils/debugLog";
import { ManagerEscalationError } from "../errors";
import type { BookingHandler } from "./types";

const log = createLogger("booking-handler");

export const GENERIC_APOLOGY = "Извините, произошла ошибка. Пожалуйста, попробуйте ещё раз чуть позже.";

/**
 * Borde de cada handler: el escalamiento se convierte en respuesta + alerta,
 * cualquier otro error en una disculpa genérica sin tocar el estado.
 * Un turno cancelado se propaga para que no se persista nada.
 */
export function withHandlerBoundary(name: string, handler: BookingHandler): BookingHandler {
  return async (ctx) => {
    try {
      return await handler(ctx);
    } catch (err) {
      if (err instanceof ManagerEscalationError) {
        log.warn(`${name}: escalamiento a manager →`, err.alert);
        return { reply: err.userMessage, stateDelta: {}, toolCallsUsed: [], managerAlert: err.alert };
      }
      if (ctx.signal?.aborted) throw err;
      log.error(`${name} falló:`, err);
      return { reply: GENERIC_APOLOGY, stateDelta: {}, toolCallsUsed: [] };
    }
  };
}
