import { describe, it, expect, beforeEach } from "vitest";
import { contactCollector } from "@/lib/agents/booking/nodes/contactCollector";
import { BOOKING_TECH_ERROR_REPLY, confirmationText, createFinalizer } from "@/lib/agents/booking/nodes/finalizer";
import { GENERIC_APOLOGY, withHandlerBoundary } from "@/lib/agents/booking/nodes/boundary";
import type { BookingHandler, HandlerContext } from "@/lib/agents/booking/nodes/types";
import { CrmError, ManagerEscalationError } from "@/lib/agents/booking/errors";
import type { BookingState } from "@/lib/schemas/booking";
import { FakeCrm } from "./mocks/crm";
import { ScriptedLlm } from "./mocks/llm";
import { ScriptedToolAgent } from "./mocks/toolAgent";
import { FULL_BOOKING, bookingWith } from "./mocks/booking";

function ctx(booking: BookingState, signal?: AbortSignal): HandlerContext {
  return { booking, message: "", history: [], chatId: "chat-1", signal };
}

describe("contact_collector", () => {
  const verified = bookingWith({ service_id: 1, slot_time: "2025-12-25 14:00", slot_time_verified: true });

  it("pide lo que falta repitiendo el horario", async () => {
    expect((await contactCollector(ctx(verified))).reply).toBe(
      "Хорошо, время 25.12.2025 в 14:00 свободно. Пожалуйста, напишите ваше имя и номер телефона."
    );
    expect((await contactCollector(ctx(bookingWith({ ...verified, client_name: "Аня" })))).reply).toBe(
      "Аня, пожалуйста, напишите ваш номер телефона для записи на 25.12.2025 в 14:00."
    );
    expect((await contactCollector(ctx(bookingWith({ ...verified, client_phone: "+79990000000" })))).reply).toBe(
      "Пожалуйста, напишите ваше имя для записи на 25.12.2025 в 14:00."
    );
  });

  it("con ambos contactos no responde nada", async () => {
    expect(await contactCollector(ctx(FULL_BOOKING))).toEqual({ reply: "", stateDelta: {}, toolCallsUsed: [] });
  });
});

describe("finalizer", () => {
  let crm: FakeCrm;
  let finalizer: BookingHandler;

  beforeEach(() => {
    crm = new FakeCrm();
    finalizer = createFinalizer({ llm: new ScriptedLlm(), toolAgent: new ScriptedToolAgent(), crm });
  });

  it("crea la reserva y confirma", async () => {
    const out = await finalizer(ctx(FULL_BOOKING));
    expect(out).toEqual({
      reply: "Готово! Я записала вас на Маникюр 25.12.2025 в 14:00 к мастеру Ольга. Будем вас ждать!",
      stateDelta: { is_finalized: true },
      toolCallsUsed: ["create_booking"],
    });
    expect(crm.createBooking).toHaveBeenCalledWith(
      {
        serviceId: 1,
        clientName: "Аня",
        clientPhone: "+79990000000",
        datetime: "2025-12-25 14:00",
        masterName: "Ольга",
      },
      undefined
    );
  });

  it("rechazo del CRM ⇒ motivo al cliente y el intento sigue abierto", async () => {
    crm.bookingResult = { success: false, error: "время уже занято" };
    const out = await finalizer(ctx(FULL_BOOKING));
    expect(out.reply).toBe("Не удалось создать запись: время уже занято");
    expect(out.stateDelta).toEqual({});

    crm.bookingResult = { success: false };
    expect((await finalizer(ctx(FULL_BOOKING))).reply).toBe("Не удалось создать запись: неизвестная ошибка");
  });

  it("error de transporte ⇒ respuesta técnica", async () => {
    crm.failWith.createBooking = new CrmError("CRM /bookings/create 500: oops", { status: 500, retryable: true });
    const out = await finalizer(ctx(FULL_BOOKING));
    expect(out).toEqual({ reply: BOOKING_TECH_ERROR_REPLY, stateDelta: {}, toolCallsUsed: ["create_booking"] });
  });

  it("datos incompletos o intento ya cerrado ⇒ no llama al CRM", async () => {
    await finalizer(ctx(bookingWith({ ...FULL_BOOKING, client_phone: null })));
    await finalizer(ctx(bookingWith({ ...FULL_BOOKING, is_finalized: true })));
    expect(crm.createBooking).not.toHaveBeenCalled();
  });

  it("confirmationText sin nombre de servicio ni master", () => {
    expect(confirmationText(bookingWith({ service_id: 1 }), "2025-12-25 14:00")).toBe(
      "Готово! Я записала вас на услугу 25.12.2025 в 14:00. Будем вас ждать!"
    );
  });
});

describe("withHandlerBoundary", () => {
  it("error inesperado ⇒ disculpa genérica sin delta", async () => {
    const handler = withHandlerBoundary("x", async () => {
      throw new Error("boom");
    });
    expect(await handler(ctx(FULL_BOOKING))).toEqual({ reply: GENERIC_APOLOGY, stateDelta: {}, toolCallsUsed: [] });
  });

  it("escalamiento ⇒ mensaje del cliente + alerta", async () => {
    const handler = withHandlerBoundary("x", async () => {
      throw new ManagerEscalationError("Сейчас подключу менеджера.", "Чат chat-1: CRM недоступен");
    });
    expect(await handler(ctx(FULL_BOOKING))).toEqual({
      reply: "Сейчас подключу менеджера.",
      stateDelta: {},
      toolCallsUsed: [],
      managerAlert: "Чат chat-1: CRM недоступен",
    });
  });

  it("turno cancelado ⇒ el error se propaga", async () => {
    const controller = new AbortController();
    controller.abort();
    const handler = withHandlerBoundary("x", async () => {
      throw new Error("aborted");
    });
    await expect(handler(ctx(FULL_BOOKING, controller.signal))).rejects.toThrow("aborted");
  });
});
