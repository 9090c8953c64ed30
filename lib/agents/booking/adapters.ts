// Traducción pura entre el contexto de conversación y el estado interno del grafo
import { AIMessage, HumanMessage } from "@langchain/core/messages";
import { bookingStateSchema, createEmptyBookingState, type BookingState } from "@/lib/schemas/booking";
import { createLogger } from "@/lib/utils/debugLog";
import type { HandlerContext, HandlerResult } from "./nodes/types";
import { applyStateDelta } from "./stateUpdater";
import type { BookingGraphStateType, BookingGraphUpdate, ConversationContext, TurnOutcome } from "./state";

const log = createLogger("booking-adapters");

export function bookingFromConversation(ctx: ConversationContext): BookingState {
  const raw = ctx.extractedInfo?.booking;
  if (raw === undefined || raw === null) return createEmptyBookingState();
  const parsed = bookingStateSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn("booking guardado inválido, se empieza de cero:", parsed.error.issues);
    return createEmptyBookingState();
  }
  return parsed.data;
}

export function graphInputFromConversation(ctx: ConversationContext): BookingGraphUpdate {
  return {
    booking: bookingFromConversation(ctx),
    message: ctx.message,
    history: ctx.messages,
    chatId: ctx.chatId,
  };
}

export function outcomeFromGraph(state: BookingGraphStateType): TurnOutcome {
  return {
    booking: state.booking,
    reply: state.reply,
    managerAlert: state.managerAlert,
    newMessages: state.newMessages,
    usedTools: state.usedTools,
  };
}

/** Nuevo contexto: mensaje del cliente, transcript de herramientas y respuesta, en ese orden. */
export function conversationWithBooking(ctx: ConversationContext, outcome: TurnOutcome): ConversationContext {
  return {
    ...ctx,
    messages: [
      ...ctx.messages,
      new HumanMessage(ctx.message),
      ...outcome.newMessages,
      ...(outcome.reply ? [new AIMessage(outcome.reply)] : []),
    ],
    extractedInfo: { ...ctx.extractedInfo, booking: outcome.booking },
    answer: outcome.reply,
    managerAlert: outcome.managerAlert,
    usedTools: outcome.usedTools,
  };
}

export function toHandlerContext(state: BookingGraphStateType, signal?: AbortSignal): HandlerContext {
  return {
    booking: state.booking,
    message: state.message,
    history: state.history,
    chatId: state.chatId,
    signal,
  };
}

export function applyHandlerResult(state: BookingGraphStateType, node: string, result: HandlerResult): BookingGraphUpdate {
  return {
    booking: applyStateDelta(state.booking, result.stateDelta),
    reply: result.reply,
    managerAlert: result.managerAlert ?? null,
    newMessages: result.newMessages ?? [],
    usedTools: result.toolCallsUsed,
    hops: state.hops + 1,
    lastNode: node,
  };
}
