import type { BaseMessage } from "@langchain/core/messages";
import type { BookingState, BookingStateDelta } from "@/lib/schemas/booking";
import type { LlmClient } from "@/lib/llm/chatModel";
import type { ToolAgent } from "@/lib/llm/toolAgent";
import type { CrmClient } from "@/lib/tools/crm";

export type HandlerContext = {
  booking: BookingState;
  message: string;
  history: BaseMessage[];
  chatId: string;
  signal?: AbortSignal;
};

export type HandlerResult = {
  reply: string;
  stateDelta: BookingStateDelta;
  toolCallsUsed: string[];
  managerAlert?: string;
  /** Transcript de tool-calling a persistir en la conversación. */
  newMessages?: BaseMessage[];
};

export type BookingHandler = (ctx: HandlerContext) => Promise<HandlerResult>;

export type BookingDeps = {
  llm: LlmClient;
  toolAgent: ToolAgent;
  crm: CrmClient;
  now?: () => Date;
  analyzerTemperature?: number;
  historyLimit?: number;
  maxHops?: number;
  salonName?: string;
};

export function emptyResult(): HandlerResult {
  return { reply: "", stateDelta: {}, toolCallsUsed: [] };
}
