import { ChatOpenAI } from "@langchain/openai";
import { SystemMessage, type BaseMessage } from "@langchain/core/messages";
import type { LlmConfig } from "@/lib/config/bookingConfig";

export type CompletionOptions = {
  temperature?: number;
  signal?: AbortSignal;
};

/** Seam de completado: instrucciones de sistema + mensajes → texto. */
export interface LlmClient {
  complete(instructions: string, messages: BaseMessage[], opts?: CompletionOptions): Promise<string>;
}

export function contentToText(content: BaseMessage["content"]): string {
  if (typeof content === "string") return content;
  return content
    .map((part) => ("text" in part && typeof part.text === "string" ? part.text : ""))
    .join("");
}

export function createChatModel(cfg: LlmConfig, temperature = 0): ChatOpenAI {
  return new ChatOpenAI({
    model: cfg.model,
    temperature,
    timeout: cfg.timeoutMs,
    maxRetries: cfg.maxRetries,
    ...(cfg.apiKey ? { apiKey: cfg.apiKey } : {}),
  });
}

export class OpenAiLlmClient implements LlmClient {
  private readonly models = new Map<number, ChatOpenAI>();

  constructor(private readonly cfg: LlmConfig) {}

  private model(temperature: number): ChatOpenAI {
    let m = this.models.get(temperature);
    if (!m) {
      m = createChatModel(this.cfg, temperature);
      this.models.set(temperature, m);
    }
    return m;
  }

  async complete(instructions: string, messages: BaseMessage[], opts: CompletionOptions = {}): Promise<string> {
    const temperature = opts.temperature ?? 0;
    const out = await this.model(temperature).invoke([new SystemMessage(instructions), ...messages], {
      signal: opts.signal,
    });
    return contentToText(out.content).trim();
  }
}
