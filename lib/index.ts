import { loadBookingConfig, type BookingConfig } from "@/lib/config/bookingConfig";
import { createBookingEngine } from "@/lib/agents/booking/graph";
import { createChatModel, OpenAiLlmClient } from "@/lib/llm/chatModel";
import { LangChainToolAgent } from "@/lib/llm/toolAgent";
import { HttpCrmClient } from "@/lib/tools/crm";
import { InMemoryConvStateStore, RedisConvStateStore, type ConvStateStore } from "@/lib/db/convState";
import { createBookingSession, type BookingSession } from "@/lib/handlers/bookingHandler";
import { createRedis } from "@/lib/services/redis";
import { createLogger } from "@/lib/utils/debugLog";

export * from "@/lib/schemas/booking";
export { mergeBookingState, applyStateDelta, computeDialogStep, parseJsonFromResponse } from "@/lib/agents/booking/stateUpdater";
export { extractBookingUpdates, applyAnalyzerUpdates, runAnalyzer } from "@/lib/agents/booking/analyzer";
export { routeBooking, routeAfterSlotManager, BOOKING_NODES } from "@/lib/agents/booking/router";
export { createBookingEngine, createBookingGraph, type BookingEngine } from "@/lib/agents/booking/graph";
export { bookingFromConversation, conversationWithBooking } from "@/lib/agents/booking/adapters";
export type { ConversationContext, TurnOutcome } from "@/lib/agents/booking/state";
export type { BookingDeps, HandlerContext, HandlerResult } from "@/lib/agents/booking/nodes/types";
export { ManagerEscalationError, CrmError, HopLimitError } from "@/lib/agents/booking/errors";
export type { LlmClient } from "@/lib/llm/chatModel";
export type { ToolAgent, AgentTool } from "@/lib/llm/toolAgent";
export type { CrmClient } from "@/lib/tools/crm";
export { HttpCrmClient } from "@/lib/tools/crm";
export { InMemoryConvStateStore, RedisConvStateStore, type ConvStateStore } from "@/lib/db/convState";
export { createBookingSession, type BookingSession } from "@/lib/handlers/bookingHandler";
export { loadBookingConfig, type BookingConfig } from "@/lib/config/bookingConfig";

const log = createLogger("booking-assistant");

/** Arma la sesión completa desde la configuración: OpenAI, CRM HTTP y Redis (o memoria). */
export function createBookingAssistant(
  config: BookingConfig = loadBookingConfig(),
  opts: { store?: ConvStateStore; useRedis?: boolean } = {}
): BookingSession {
  const engine = createBookingEngine({
    llm: new OpenAiLlmClient(config.llm),
    toolAgent: new LangChainToolAgent(createChatModel(config.llm, 0)),
    crm: new HttpCrmClient(config.crm),
    analyzerTemperature: config.llm.analyzerTemperature,
    historyLimit: config.historyLimit,
    maxHops: config.maxHops,
    salonName: config.salonName,
  });

  let store = opts.store;
  if (!store) {
    store =
      opts.useRedis === false
        ? new InMemoryConvStateStore()
        : new RedisConvStateStore(createRedis(config.redisUrl), config.convStateTtlSeconds);
  }
  log.info(`listo (modelo ${config.llm.model}, saltos máx. ${config.maxHops})`);
  return createBookingSession({ engine, store });
}
