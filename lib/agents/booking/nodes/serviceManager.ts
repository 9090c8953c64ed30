import { HumanMessage } from "@langchain/core/messages";
import type { BookingState } from "@/lib/schemas/booking";
import { flattenHistory } from "@/lib/llm/history";
import { debugLog } from "@/lib/utils/debugLog";
import { mergeBookingState, parseJsonFromResponse } from "../stateUpdater";
import { createServiceTools } from "../tools";
import { emptyResult, type BookingDeps, type BookingHandler } from "./types";

export const SERVICE_CLARIFY_REPLY = "Уточните, пожалуйста, на какую услугу вы хотите записаться?";

export function buildServiceManagerPrompt(booking: BookingState, salonName?: string): string {
  const salon = salonName ? ` салона «${salonName}»` : " салона красоты";
  const known = booking.service_name ? `\nКлиент упоминал услугу: «${booking.service_name}».` : "";
  const master = booking.master_name ? `\nКлиент хочет к мастеру: ${booking.master_name}.` : "";
  return `Ты администратор${salon}. Твоя единственная задача сейчас: помочь клиенту выбрать услугу.${known}${master}

ПРАВИЛА:
- Ищи услуги только инструментом find_service, категории получай через get_categories.
- Никогда не придумывай услуги, ID и цены.
- Не спрашивай про дату, время и контакты: это следующие шаги.
- Если под запрос подходит несколько услуг, перечисли их и задай один уточняющий вопрос.
- Если клиент однозначно выбрал услугу, ответь ТОЛЬКО JSON без текста: {"service_id": ID, "service_name": "название"}
- Если клиент недоволен, просит человека или произошла системная ошибка, вызови call_manager.
- Отвечай на русском, коротко и дружелюбно.`;
}

export function createServiceManager(deps: BookingDeps): BookingHandler {
  return async (ctx) => {
    if (ctx.booking.service_id !== null) return emptyResult();

    const messages = [...flattenHistory(ctx.history, deps.historyLimit), new HumanMessage(ctx.message)];
    const out = await deps.toolAgent.decideAndAct(
      buildServiceManagerPrompt(ctx.booking, deps.salonName),
      messages,
      createServiceTools(deps.crm, ctx.chatId),
      { signal: ctx.signal }
    );

    const parsed = parseJsonFromResponse(out.reply);
    if (parsed && "service_id" in parsed) {
      const merged = mergeBookingState(ctx.booking, {
        service_id: parsed.service_id,
        ...("service_name" in parsed ? { service_name: parsed.service_name } : {}),
      });
      if (merged.service_id !== null) {
        debugLog("[service_manager] servicio elegido:", merged.service_id, merged.service_name);
        return {
          reply: "",
          stateDelta: { service_id: merged.service_id, service_name: merged.service_name },
          toolCallsUsed: out.toolCalls,
          newMessages: out.newMessages,
        };
      }
      return { reply: SERVICE_CLARIFY_REPLY, stateDelta: {}, toolCallsUsed: out.toolCalls, newMessages: out.newMessages };
    }

    return {
      reply: out.reply || SERVICE_CLARIFY_REPLY,
      stateDelta: {},
      toolCallsUsed: out.toolCalls,
      newMessages: out.newMessages,
    };
  };
}
