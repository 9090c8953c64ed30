// =============================
// Grafo del sub-diálogo de reserva: analyzer → router → handler → router …
// =============================
import { END, START, StateGraph, type LangGraphRunnableConfig } from "@langchain/langgraph";
import { createLogger, debugLog } from "@/lib/utils/debugLog";
import { conversationWithBooking, graphInputFromConversation, outcomeFromGraph, applyHandlerResult, toHandlerContext } from "./adapters";
import { runAnalyzer } from "./analyzer";
import { HopLimitError } from "./errors";
import { GENERIC_APOLOGY, withHandlerBoundary } from "./nodes/boundary";
import { contactCollector } from "./nodes/contactCollector";
import { createFinalizer } from "./nodes/finalizer";
import { createServiceManager } from "./nodes/serviceManager";
import { createSlotManager } from "./nodes/slotManager";
import type { BookingDeps, BookingHandler } from "./nodes/types";
import { BOOKING_NODES as N, routeAfterSlotManager, routeBooking, type BookingHandlerNode, type BookingRoute } from "./router";
import { BookingGraphState, type BookingGraphStateType, type BookingGraphUpdate, type ConversationContext } from "./state";

const log = createLogger("booking-graph");

export const DEFAULT_MAX_HOPS = 3;

export type RunTurnOptions = { signal?: AbortSignal };

export interface BookingEngine {
  /** Procesa un turno. Devuelve un contexto nuevo; el recibido no se modifica. */
  runTurn(ctx: ConversationContext, opts?: RunTurnOptions): Promise<ConversationContext>;
}

const HANDLER_TARGETS: (BookingRoute | typeof N.hopLimit)[] = [N.serviceManager, N.slotManager, N.contactCollector, N.finalizer, N.hopLimit, END];

export function createBookingGraph(deps: BookingDeps) {
  const maxHops = deps.maxHops ?? DEFAULT_MAX_HOPS;
  const handlers: Record<BookingHandlerNode, BookingHandler> = {
    [N.serviceManager]: withHandlerBoundary(N.serviceManager, createServiceManager(deps)),
    [N.slotManager]: withHandlerBoundary(N.slotManager, createSlotManager(deps)),
    [N.contactCollector]: withHandlerBoundary(N.contactCollector, contactCollector),
    [N.finalizer]: withHandlerBoundary(N.finalizer, createFinalizer(deps)),
  };

  async function analyzerNode(state: BookingGraphStateType, config?: LangGraphRunnableConfig): Promise<BookingGraphUpdate> {
    const booking = await runAnalyzer(state.message, state.history, state.booking, {
      llm: deps.llm,
      now: deps.now,
      temperature: deps.analyzerTemperature,
      historyLimit: deps.historyLimit,
      signal: config?.signal,
    });
    debugLog("[booking-graph] analyzer →", booking.dialog_step);
    return { booking, hops: 0, reply: "", managerAlert: null, lastNode: N.analyzer };
  }

  const handlerNode =
    (name: BookingHandlerNode) =>
    async (state: BookingGraphStateType, config?: LangGraphRunnableConfig): Promise<BookingGraphUpdate> => {
      const result = await handlers[name](toHandlerContext(state, config?.signal));
      debugLog(`[booking-graph] ${name} → reply=${result.reply ? "sí" : "no"}`, result.stateDelta);
      return applyHandlerResult(state, name, result);
    };

  async function hopLimitNode(state: BookingGraphStateType): Promise<BookingGraphUpdate> {
    log.error(new HopLimitError(state.hops).message, { lastNode: state.lastNode, booking: state.booking });
    return { reply: GENERIC_APOLOGY, lastNode: N.hopLimit };
  }

  function afterHandler(state: BookingGraphStateType): BookingRoute | typeof N.hopLimit {
    if (state.managerAlert || state.reply) return END;
    const next = state.lastNode === N.slotManager ? routeAfterSlotManager(state.booking) : routeBooking(state.booking);
    if (next === END) return END;
    if (state.hops >= maxHops) return N.hopLimit;
    return next;
  }

  return new StateGraph(BookingGraphState)
    .addNode(N.analyzer, analyzerNode)
    .addNode(N.serviceManager, handlerNode(N.serviceManager))
    .addNode(N.slotManager, handlerNode(N.slotManager))
    .addNode(N.contactCollector, handlerNode(N.contactCollector))
    .addNode(N.finalizer, handlerNode(N.finalizer))
    .addNode(N.hopLimit, hopLimitNode)
    .addEdge(START, N.analyzer)
    .addConditionalEdges(N.analyzer, (state) => routeBooking(state.booking), [
      N.serviceManager,
      N.slotManager,
      N.contactCollector,
      N.finalizer,
      END,
    ])
    // Un handler con respuesta vacía deja que el router siga en el mismo turno
    .addConditionalEdges(N.serviceManager, afterHandler, HANDLER_TARGETS)
    .addConditionalEdges(N.slotManager, afterHandler, HANDLER_TARGETS)
    .addConditionalEdges(N.contactCollector, afterHandler, HANDLER_TARGETS)
    .addConditionalEdges(N.finalizer, afterHandler, HANDLER_TARGETS)
    .addEdge(N.hopLimit, END)
    .compile();
}

export function createBookingEngine(deps: BookingDeps): BookingEngine {
  const graph = createBookingGraph(deps);

  return {
    async runTurn(ctx, opts = {}) {
      const input = graphInputFromConversation(ctx);
      const final = await graph.invoke(input, { signal: opts.signal });
      opts.signal?.throwIfAborted();
      const outcome = outcomeFromGraph(final);
      log.info(
        `chat ${ctx.chatId}: paso=${outcome.booking.dialog_step} herramientas=[${outcome.usedTools.join(", ")}]${
          outcome.managerAlert ? " alerta=manager" : ""
        }`
      );
      return conversationWithBooking(ctx, outcome);
    },
  };
}
