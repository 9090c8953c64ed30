import { z } from "zod";
import { AIMessage, SystemMessage, ToolMessage, type BaseMessage } from "@langchain/core/messages";
import type { ToolCall } from "@langchain/core/messages/tool";
import { ManagerEscalationError, errorMessage } from "@/lib/agents/booking/errors";
import { createLogger } from "@/lib/utils/debugLog";
import { contentToText } from "./chatModel";

const log = createLogger("tool-agent");

export const DEFAULT_MAX_TOOL_ITERATIONS = 6;

/** Herramienta expuesta al LLM: args validados con zod antes de ejecutar. */
export interface AgentTool {
  name: string;
  description: string;
  schema: z.AnyZodObject;
  invoke(rawArgs: unknown, signal?: AbortSignal): Promise<string>;
}

export function defineTool<S extends z.AnyZodObject>(def: {
  name: string;
  description: string;
  schema: S;
  run: (input: z.infer<S>, signal?: AbortSignal) => Promise<string>;
}): AgentTool {
  return {
    name: def.name,
    description: def.description,
    schema: def.schema,
    invoke: async (rawArgs, signal) => def.run(def.schema.parse(rawArgs), signal),
  };
}

export type ToolSpec = Pick<AgentTool, "name" | "description" | "schema">;

/** Lo que el loop necesita del chat model (ChatOpenAI lo cumple). */
export interface ToolCallingModel {
  bindTools(tools: ToolSpec[]): {
    invoke(
      input: BaseMessage[],
      options?: { signal?: AbortSignal }
    ): Promise<{ content: BaseMessage["content"]; tool_calls?: ToolCall[] }>;
  };
}

export type ToolAgentResult = {
  reply: string;
  toolCalls: string[];
  newMessages: BaseMessage[];
};

export interface ToolAgent {
  decideAndAct(
    prompt: string,
    messages: BaseMessage[],
    tools: AgentTool[],
    opts?: { signal?: AbortSignal }
  ): Promise<ToolAgentResult>;
}

export const TOOL_LOOP_EXHAUSTED_REPLY =
  "Извините, не получилось обработать запрос. Уточните, пожалуйста, что именно вас интересует.";

/**
 * Loop de tool-calling sobre `bindTools`. Las herramientas de una misma vuelta
 * corren en paralelo; ManagerEscalationError corta el loop y se propaga.
 */
export class LangChainToolAgent implements ToolAgent {
  constructor(
    private readonly model: ToolCallingModel,
    private readonly maxIterations = DEFAULT_MAX_TOOL_ITERATIONS
  ) {}

  async decideAndAct(
    prompt: string,
    messages: BaseMessage[],
    tools: AgentTool[],
    opts: { signal?: AbortSignal } = {}
  ): Promise<ToolAgentResult> {
    const bound = this.model.bindTools(
      tools.map((t) => ({ name: t.name, description: t.description, schema: t.schema }))
    );
    const byName = new Map(tools.map((t) => [t.name, t]));
    const transcript: BaseMessage[] = [];
    const toolCalls: string[] = [];

    for (let i = 0; i < this.maxIterations; i++) {
      const ai = await bound.invoke([new SystemMessage(prompt), ...messages, ...transcript], {
        signal: opts.signal,
      });
      const calls = ai.tool_calls ?? [];
      if (!calls.length) {
        return { reply: contentToText(ai.content).trim(), toolCalls, newMessages: transcript };
      }

      transcript.push(new AIMessage({ content: ai.content, tool_calls: calls }));
      const results = await Promise.all(
        calls.map(async (call) => {
          toolCalls.push(call.name);
          const tool = byName.get(call.name);
          let content: string;
          if (!tool) {
            content = `Инструмент ${call.name} недоступен.`;
          } else {
            try {
              content = await tool.invoke(call.args, opts.signal);
            } catch (err) {
              if (err instanceof ManagerEscalationError) throw err;
              log.warn(`tool ${call.name} falló:`, errorMessage(err));
              content = `Ошибка инструмента ${call.name}: ${errorMessage(err)}`;
            }
          }
          return new ToolMessage({ content, tool_call_id: call.id ?? call.name, name: call.name });
        })
      );
      transcript.push(...results);
    }

    log.warn(`se alcanzó el límite de ${this.maxIterations} iteraciones`);
    return { reply: TOOL_LOOP_EXHAUSTED_REPLY, toolCalls, newMessages: transcript };
  }
}
