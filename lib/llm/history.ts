import { AIMessage, HumanMessage, SystemMessage, ToolMessage, type BaseMessage } from "@langchain/core/messages";
import { contentToText } from "./chatModel";

export const DEFAULT_HISTORY_LIMIT = 10;

/** Últimos `limit` mensajes que no son de sistema. */
export function recentMessages(messages: BaseMessage[], limit = DEFAULT_HISTORY_LIMIT): BaseMessage[] {
  const visible = messages.filter((m) => !(m instanceof SystemMessage));
  return limit > 0 ? visible.slice(-limit) : [];
}

/**
 * Aplana el historial a texto plano: los resultados de herramientas pasan a ser
 * mensajes del asistente, así un ToolMessage huérfano nunca llega a la API del modelo.
 * Los mensajes del asistente que solo llevan tool_calls se descartan.
 */
export function flattenHistory(messages: BaseMessage[], limit = DEFAULT_HISTORY_LIMIT): BaseMessage[] {
  const out: BaseMessage[] = [];
  for (const msg of recentMessages(messages, limit)) {
    const text = contentToText(msg.content).trim();
    if (msg instanceof ToolMessage) {
      out.push(new AIMessage(`Результат инструмента ${msg.name ?? "tool"}: ${text}`));
    } else if (msg instanceof AIMessage) {
      if (text) out.push(new AIMessage(text));
    } else if (msg instanceof HumanMessage) {
      if (text) out.push(new HumanMessage(text));
    }
  }
  return out;
}
