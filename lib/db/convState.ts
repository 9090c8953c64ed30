import {
  mapChatMessagesToStoredMessages,
  mapStoredMessagesToChatMessages,
  type StoredMessage,
} from "@langchain/core/messages";
import type { ConversationContext } from "@/lib/agents/booking/state";
import { isPlainObject } from "@/lib/agents/booking/stateUpdater";
import { createLogger } from "@/lib/utils/debugLog";

const log = createLogger("convState");

/* =========================
 *        Tipos
 * ========================= */

/** Lo que se persiste entre turnos: todo el contexto menos el mensaje en curso. */
export type StoredConversation = Omit<ConversationContext, "message">;

export interface ConvStateStore {
  get(conversationId: string): Promise<StoredConversation | null>;
  set(conversation: StoredConversation): Promise<void>;
  delete(conversationId: string): Promise<void>;
}

/** Subconjunto de ioredis que usa el store. */
export interface RedisLike {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: "EX", seconds: number): Promise<unknown>;
  del(key: string): Promise<number>;
}

type SerializedConversation = Omit<StoredConversation, "messages"> & { messages: StoredMessage[] };

/* =========================
 *      Memoria (tests / dev)
 * ========================= */

export class InMemoryConvStateStore implements ConvStateStore {
  private readonly data = new Map<string, StoredConversation>();

  async get(conversationId: string) {
    const found = this.data.get(conversationId);
    return found ? { ...found, messages: [...found.messages] } : null;
  }

  async set(conversation: StoredConversation) {
    this.data.set(conversation.conversationId, { ...conversation, messages: [...conversation.messages] });
  }

  async delete(conversationId: string) {
    this.data.delete(conversationId);
  }
}

/* =========================
 *         Redis
 * ========================= */

const key = (conversationId: string) => `conv_state:${conversationId}`;

export function serializeConversation(conv: StoredConversation): string {
  const out: SerializedConversation = { ...conv, messages: mapChatMessagesToStoredMessages(conv.messages) };
  return JSON.stringify(out);
}

function isStoredMessage(v: unknown): v is StoredMessage {
  return isPlainObject(v) && typeof v.type === "string" && isPlainObject(v.data);
}

export function deserializeConversation(raw: string): StoredConversation | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isPlainObject(parsed)) return null;
  const { conversationId, chatId, messages, extractedInfo } = parsed;
  if (typeof conversationId !== "string" || typeof chatId !== "string") return null;
  const stored = Array.isArray(messages) ? messages.filter(isStoredMessage) : [];
  return {
    conversationId,
    chatId,
    messages: mapStoredMessagesToChatMessages(stored),
    extractedInfo: isPlainObject(extractedInfo) ? extractedInfo : {},
    ...(typeof parsed.stage === "string" ? { stage: parsed.stage } : {}),
    ...(typeof parsed.answer === "string" ? { answer: parsed.answer } : {}),
    ...(typeof parsed.managerAlert === "string" ? { managerAlert: parsed.managerAlert } : {}),
  };
}

export class RedisConvStateStore implements ConvStateStore {
  constructor(
    private readonly redis: RedisLike,
    private readonly ttlSeconds = 60 * 60 * 24
  ) {}

  async get(conversationId: string) {
    const raw = await this.redis.get(key(conversationId));
    if (!raw) return null;
    const conv = deserializeConversation(raw);
    if (!conv) log.warn(`estado corrupto para ${conversationId}, se ignora`);
    return conv;
  }

  async set(conversation: StoredConversation) {
    await this.redis.set(key(conversation.conversationId), serializeConversation(conversation), "EX", this.ttlSeconds);
  }

  async delete(conversationId: string) {
    await this.redis.del(key(conversationId));
  }
}
