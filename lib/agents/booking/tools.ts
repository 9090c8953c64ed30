// =============================
// Herramientas del service manager (get_categories, find_service, call_manager)
// =============================
import { z } from "zod";
import type { CrmClient } from "@/lib/tools/crm";
import { defineTool, type AgentTool } from "@/lib/llm/toolAgent";
import { ManagerEscalationError } from "./errors";
import { formatCategories, formatServices } from "./format";

export const CALL_MANAGER_REPLY = "Я передала ваш вопрос менеджеру, он свяжется с вами в ближайшее время.";

export function createServiceTools(crm: CrmClient, chatId: string): AgentTool[] {
  const getCategories = defineTool({
    name: "get_categories",
    description: "Список категорий услуг салона. Используй, когда клиент не знает, что выбрать.",
    schema: z.object({}),
    run: async (_input, signal) => formatCategories(await crm.getCategories(signal)),
  });

  const findService = defineTool({
    name: "find_service",
    description:
      "Поиск услуг по названию или описанию. Возвращает ID, название и цену. Никогда не придумывай услуги и цены сам.",
    schema: z.object({
      query: z.string().min(1).describe("Название услуги или запрос клиента, например 'маникюр с покрытием'"),
      master_name: z.string().optional().describe("Имя мастера, если клиент хочет к конкретному мастеру"),
    }),
    run: async ({ query, master_name }, signal) => {
      const services = await crm.searchServices(query, master_name, signal);
      if (!services.length) return `Услуги по запросу «${query}» не найдены.`;
      return `Найденные услуги:\n${formatServices(services)}`;
    },
  });

  const callManager = defineTool({
    name: "call_manager",
    description:
      "Позвать менеджера: системная ошибка, клиент недоволен или вопрос вне твоей компетенции.",
    schema: z.object({
      reason: z.string().describe("Кратко: почему нужен менеджер"),
    }),
    run: async ({ reason }) => {
      throw new ManagerEscalationError(CALL_MANAGER_REPLY, `Чат ${chatId}: нужен менеджер. Причина: ${reason}`);
    },
  });

  return [getCategories, findService, callManager];
}
