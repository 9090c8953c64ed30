import type { BookingState } from "@/lib/schemas/booking";
import type { CrmClient, FindSlotsInput, SlotOption } from "@/lib/tools/crm";
import { createLogger } from "@/lib/utils/debugLog";
import { ManagerEscalationError, errorMessage } from "../errors";
import { formatDate, formatSlotOptions, formatSlotTime } from "../format";
import { describeTimePeriod, isTimeInRanges, parseTimePreference } from "../timePreference";
import { emptyResult, type BookingDeps, type BookingHandler, type HandlerContext, type HandlerResult } from "./types";

const log = createLogger("slot_manager");

const FIND_SLOTS = "find_slots";

function masterFilter(booking: BookingState): Pick<FindSlotsInput, "masterId" | "masterName"> {
  if (booking.master_id !== null) return { masterId: booking.master_id };
  if (booking.master_name) return { masterName: booking.master_name };
  return {};
}

function serviceLabel(booking: BookingState): string {
  return booking.service_name ? ` для услуги «${booking.service_name}»` : "";
}

async function verifySlot(
  crm: CrmClient,
  booking: BookingState,
  serviceId: number,
  slotTime: string,
  signal?: AbortSignal
): Promise<HandlerResult> {
  const [date, time] = slotTime.split(" ");
  const reset = { slot_time: null, slot_time_verified: null };
  const toolCallsUsed = [FIND_SLOTS];

  try {
    const exact = await crm.findSlots({ serviceId, date, timePeriod: time, ...masterFilter(booking) }, signal);
    if (exact.some((o) => o.date === date && isTimeInRanges(time, o.timeRanges))) {
      return { reply: "", stateDelta: { slot_time_verified: true }, toolCallsUsed };
    }
  } catch (err) {
    if (err instanceof ManagerEscalationError) throw err;
    log.warn("no se pudo verificar el horario:", errorMessage(err));
    return {
      reply: `Извините, не получилось проверить время ${formatSlotTime(slotTime)}. Пожалуйста, выберите время ещё раз.`,
      stateDelta: reset,
      toolCallsUsed,
    };
  }

  let alternatives: SlotOption[] = [];
  try {
    alternatives = await crm.findSlots({ serviceId, date, ...masterFilter(booking) }, signal);
    toolCallsUsed.push(FIND_SLOTS);
  } catch (err) {
    if (err instanceof ManagerEscalationError) throw err;
    log.warn("no se pudieron obtener alternativas:", errorMessage(err));
  }

  const listed = formatSlotOptions(alternatives);
  const reply = listed
    ? `К сожалению, время ${formatSlotTime(slotTime)} уже занято. На ${formatDate(date)} свободно:\n${listed}\nВыберите, пожалуйста, удобное время.`
    : `К сожалению, время ${formatSlotTime(slotTime)} уже занято, и на ${formatDate(date)} свободных окон нет. Подскажите, пожалуйста, другой день или время.`;
  return { reply, stateDelta: reset, toolCallsUsed };
}

async function searchSlots(
  crm: CrmClient,
  ctx: HandlerContext,
  serviceId: number,
  now: Date
): Promise<HandlerResult> {
  const pref = parseTimePreference(ctx.message, now);
  const toolCallsUsed = [FIND_SLOTS];
  const when = [pref.date ? `на ${formatDate(pref.date)}` : "", pref.timePeriod ? describeTimePeriod(pref.timePeriod) : ""]
    .filter(Boolean)
    .join(" ");
  const whenText = when ? ` ${when}` : "";

  let options: SlotOption[];
  try {
    options = await crm.findSlots(
      {
        serviceId,
        ...(pref.date ? { date: pref.date } : {}),
        ...(pref.timePeriod ? { timePeriod: pref.timePeriod } : {}),
        ...masterFilter(ctx.booking),
      },
      ctx.signal
    );
  } catch (err) {
    if (err instanceof ManagerEscalationError) throw err;
    log.warn("búsqueda de horarios falló:", errorMessage(err));
    return {
      reply: "Извините, не получилось загрузить свободное время. Попробуйте, пожалуйста, чуть позже.",
      stateDelta: {},
      toolCallsUsed,
    };
  }

  const listed = formatSlotOptions(options);
  if (!listed) {
    return {
      reply: `К сожалению, свободных окон${whenText}${serviceLabel(ctx.booking)} нет. Подскажите, пожалуйста, другой день или время.`,
      stateDelta: {},
      toolCallsUsed,
    };
  }
  return {
    reply: `Свободное время${whenText}${serviceLabel(ctx.booking)}:\n${listed}\nНа какое время вас записать?`,
    stateDelta: {},
    toolCallsUsed,
  };
}

/**
 * Dos modos: con slot_time sin verificar, confirma ese horario exacto en el CRM;
 * sin slot_time, busca opciones según la preferencia del mensaje. Nunca marca
 * como verificado un horario que el CRM no devolvió.
 */
export function createSlotManager(deps: BookingDeps): BookingHandler {
  const now = deps.now ?? (() => new Date());
  return async (ctx) => {
    const { booking } = ctx;
    if (booking.service_id === null) return emptyResult();
    if (booking.slot_time !== null) {
      if (booking.slot_time_verified === true) return emptyResult();
      return verifySlot(deps.crm, booking, booking.service_id, booking.slot_time, ctx.signal);
    }
    return searchSlots(deps.crm, ctx, booking.service_id, now());
  };
}
