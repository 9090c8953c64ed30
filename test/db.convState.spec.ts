import { describe, it, expect } from "vitest";
import { AIMessage, HumanMessage, ToolMessage } from "@langchain/core/messages";
import {
  InMemoryConvStateStore,
  RedisConvStateStore,
  deserializeConversation,
  serializeConversation,
  type StoredConversation,
} from "@/lib/db/convState";
import { InMemoryRedis } from "./mocks/redis";
import { FULL_BOOKING } from "./mocks/booking";

const conversation = (): StoredConversation => ({
  conversationId: "conv-1",
  chatId: "chat-1",
  messages: [
    new HumanMessage("хочу маникюр"),
    new AIMessage({ content: "", tool_calls: [{ name: "find_service", args: { query: "маникюр" }, id: "c1" }] }),
    new ToolMessage({ content: "- Маникюр (ID: 101)", tool_call_id: "c1", name: "find_service" }),
    new AIMessage("Есть маникюр."),
  ],
  extractedInfo: { booking: FULL_BOOKING },
  stage: "booking",
  answer: "Есть маникюр.",
  managerAlert: null,
});

describe("conv_state en Redis", () => {
  it("guarda con TTL bajo conv_state:<id> y recupera mensajes tipados", async () => {
    const redis = new InMemoryRedis();
    const store = new RedisConvStateStore(redis, 3600);
    await store.set(conversation());

    expect(redis.ttls.get("conv_state:conv-1")).toBe(3_600_000);
    const loaded = await store.get("conv-1");
    expect(loaded?.chatId).toBe("chat-1");
    expect(loaded?.stage).toBe("booking");
    expect(loaded?.extractedInfo).toEqual({ booking: FULL_BOOKING });
    expect(loaded?.messages).toHaveLength(4);
    expect(loaded?.messages[0]).toBeInstanceOf(HumanMessage);
    expect(loaded?.messages[1]).toBeInstanceOf(AIMessage);
    expect(loaded?.messages[3]?.content).toBe("Есть маникюр.");
    const tool = loaded?.messages[2];
    expect(tool).toBeInstanceOf(ToolMessage);
    expect(tool instanceof ToolMessage ? tool.tool_call_id : undefined).toBe("c1");
  });

  it("sin estado o estado corrupto ⇒ null", async () => {
    const redis = new InMemoryRedis();
    const store = new RedisConvStateStore(redis);
    expect(await store.get("nada")).toBeNull();
    redis.setRaw("conv_state:roto", "{no es json");
    expect(await store.get("roto")).toBeNull();
  });

  it("delete borra la clave", async () => {
    const redis = new InMemoryRedis();
    const store = new RedisConvStateStore(redis);
    await store.set(conversation());
    await store.delete("conv-1");
    expect(redis.raw("conv_state:conv-1")).toBeUndefined();
  });

  it("serializeConversation guarda los mensajes en formato almacenable", () => {
    const parsed: unknown = JSON.parse(serializeConversation(conversation()));
    expect(parsed).toMatchObject({ conversationId: "conv-1", messages: [{ type: "human" }, { type: "ai" }, { type: "tool" }, { type: "ai" }] });
  });

  it("deserializeConversation descarta campos sin forma válida", () => {
    expect(deserializeConversation(JSON.stringify({ chatId: "x" }))).toBeNull();
    const raw = JSON.stringify({
      conversationId: "conv-1",
      chatId: "chat-1",
      messages: [{ foo: 1 }],
      extractedInfo: "x",
      stage: "booking",
      answer: "Есть маникюр.",
      managerAlert: null,
    });
    const out = deserializeConversation(raw);
    expect(out).toEqual({ conversationId: "conv-1", chatId: "chat-1", messages: [], extractedInfo: {}, stage: "booking", answer: "Есть маникюр." });
  });
});

describe("InMemoryConvStateStore", () => {
  it("devuelve copias: mutar lo leído no cambia lo guardado", async () => {
    const store = new InMemoryConvStateStore();
    await store.set(conversation());
    const first = await store.get("conv-1");
    first?.messages.push(new HumanMessage("extra"));
    expect((await store.get("conv-1"))?.messages).toHaveLength(4);
  });
});
