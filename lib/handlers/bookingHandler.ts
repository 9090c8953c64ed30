import type { BookingEngine } from "@/lib/agents/booking/graph";
import type { ConversationContext } from "@/lib/agents/booking/state";
import type { ConvStateStore } from "@/lib/db/convState";
import { createLogger } from "@/lib/utils/debugLog";

const log = createLogger("bookingHandler");

export type IncomingTurn = {
  conversationId: string;
  chatId: string;
  message: string;
  stage?: string;
};

export type TurnReply = {
  reply: string;
  managerAlert: string | null;
  context: ConversationContext;
};

export interface BookingSession {
  handleTurn(turn: IncomingTurn, opts?: { signal?: AbortSignal }): Promise<TurnReply>;
}

/**
 * Un turno a la vez por conversación (cola de promesas por id).
 * El contexto nuevo se persiste solo si el motor terminó bien.
 */
export function createBookingSession(deps: { engine: BookingEngine; store: ConvStateStore }): BookingSession {
  const convQueues = new Map<string, Promise<unknown>>();

  function runQueued<T>(convId: string, fn: () => Promise<T>): Promise<T> {
    const prev = convQueues.get(convId) ?? Promise.resolve();
    const next = prev.then(fn, fn);
    // La promesa guardada nunca rechaza; el rechazo le llega al caller por `next`
    const handled = next.then(
      () => undefined,
      () => undefined
    );
    convQueues.set(convId, handled);
    void handled.then(() => {
      if (convQueues.get(convId) === handled) convQueues.delete(convId);
    });
    return next;
  }

  async function processTurn(turn: IncomingTurn, signal?: AbortSignal): Promise<TurnReply> {
    const stored = await deps.store.get(turn.conversationId);
    const ctx: ConversationContext = {
      conversationId: turn.conversationId,
      chatId: turn.chatId,
      messages: stored?.messages ?? [],
      extractedInfo: stored?.extractedInfo ?? {},
      stage: turn.stage ?? stored?.stage,
      message: turn.message,
    };

    const next = await deps.engine.runTurn(ctx, { signal });
    signal?.throwIfAborted();

    const { message: _current, ...toStore } = next;
    await deps.store.set(toStore);
    if (next.managerAlert) log.warn(`chat ${turn.chatId}: alerta para manager →`, next.managerAlert);

    return { reply: next.answer ?? "", managerAlert: next.managerAlert ?? null, context: next };
  }

  return {
    handleTurn(turn, opts = {}) {
      return runQueued(turn.conversationId, () => processTurn(turn, opts.signal));
    },
  };
}
