import { describe, it, expect } from "vitest";
import { createEmptyBookingState } from "@/lib/schemas/booking";
import {
  applyStateDelta,
  coerceInt,
  computeDialogStep,
  isMidnightSlot,
  mergeBookingState,
  normalizePhone,
  normalizeSlotTime,
  parseJsonFromResponse,
  sameName,
} from "@/lib/agents/booking/stateUpdater";
import { routeBooking } from "@/lib/agents/booking/router";
import { FULL_BOOKING, bookingWith } from "./mocks/booking";

describe("mergeBookingState", () => {
  it("primer llenado: convierte ids numéricos y no dispara cascadas", () => {
    const out = mergeBookingState(createEmptyBookingState(), { service_id: "123", service_name: "Маникюр" });
    expect(out.service_id).toBe(123);
    expect(out.service_name).toBe("Маникюр");
    expect(out.dialog_step).toBe("slot");
  });

  it("id no convertible se omite sin lanzar", () => {
    const out = mergeBookingState(createEmptyBookingState(), { service_id: "abc", master_id: 1.5 });
    expect(out.service_id).toBeNull();
    expect(out.master_id).toBeNull();
    expect(out.dialog_step).toBe("service");
  });

  it("null en una clave no reseteable se ignora", () => {
    const out = mergeBookingState(FULL_BOOKING, { client_name: null, client_phone: null });
    expect(out.client_name).toBe("Аня");
    expect(out.client_phone).toBe("+79990000000");
  });

  it("campos del sistema y claves desconocidas se ignoran", () => {
    const out = mergeBookingState(createEmptyBookingState(), {
      is_finalized: true,
      slot_time_verified: true,
      dialog_step: "confirmation",
      foo: 1,
    });
    expect(out).toEqual(createEmptyBookingState());
  });

  it("cambio de servicio limpia master, horario, verificación y contactos", () => {
    const out = mergeBookingState(FULL_BOOKING, { service_id: 2, service_name: "Педикюр" });
    expect(out).toEqual({
      service_id: 2,
      service_name: "Педикюр",
      master_id: null,
      master_name: null,
      slot_time: null,
      slot_time_verified: null,
      client_name: null,
      client_phone: null,
      is_finalized: false,
      dialog_step: "slot",
    });
  });

  it("cambio de servicio conserva lo que vino en la misma actualización", () => {
    const out = mergeBookingState(FULL_BOOKING, {
      service_name: "педикюр",
      service_id: null,
      slot_time: "2025-12-26 15:00",
    });
    expect(out.service_id).toBeNull();
    expect(out.service_name).toBe("педикюр");
    expect(out.slot_time).toBe("2025-12-26 15:00");
    expect(out.slot_time_verified).toBeNull();
    expect(out.master_id).toBeNull();
    expect(out.client_name).toBeNull();
    expect(out.dialog_step).toBe("service");
  });

  it("sin id, un nombre de servicio distinto es un cambio", () => {
    const draft = bookingWith({ service_name: "Маникюр", master_name: "Ольга", client_name: "Аня" });
    const out = mergeBookingState(draft, { service_name: "Педикюр" });
    expect(out.service_id).toBeNull();
    expect(out.service_name).toBe("Педикюр");
    expect(out.master_name).toBeNull();
    expect(out.client_name).toBeNull();
  });

  it("el servicio repetido con otras mayúsculas no resetea la reserva", () => {
    const out = mergeBookingState(FULL_BOOKING, { service_name: "маникюр", client_name: "Аня" });
    expect(out).toEqual(FULL_BOOKING);
    expect(routeBooking(out)).toBe("finalizer");

    const draft = bookingWith({ service_name: "Маникюр", client_name: "Аня" });
    expect(mergeBookingState(draft, { service_name: "  МАНИКЮР " })).toEqual(draft);
  });

  it("con id resuelto, un nombre suelto no cambia el servicio", () => {
    expect(mergeBookingState(FULL_BOOKING, { service_name: "Педикюр" })).toEqual(FULL_BOOKING);
  });

  it("mismo servicio repetido no es un cambio", () => {
    const out = mergeBookingState(FULL_BOOKING, { service_id: 1 });
    expect(out).toEqual(FULL_BOOKING);
  });

  it("cambio de master limpia horario y contactos pero conserva el servicio", () => {
    const out = mergeBookingState(FULL_BOOKING, { master_name: "Ирина" });
    expect(out.service_id).toBe(1);
    expect(out.master_id).toBeNull();
    expect(out.master_name).toBe("Ирина");
    expect(out.slot_time).toBeNull();
    expect(out.slot_time_verified).toBeNull();
    expect(out.client_name).toBeNull();
    expect(out.client_phone).toBeNull();
  });

  it("master nuevo sobre un horario ya verificado obliga a verificar de nuevo", () => {
    const noMaster = bookingWith({ ...FULL_BOOKING, master_id: null, master_name: null });
    expect(routeBooking(noMaster)).toBe("finalizer");

    const out = mergeBookingState(noMaster, { master_name: "Ирина" });
    expect(out).toEqual({
      ...noMaster,
      master_name: "Ирина",
      slot_time: null,
      slot_time_verified: null,
      client_name: null,
      client_phone: null,
      dialog_step: "slot",
    });
    expect(routeBooking(out)).toBe("slot_manager");
  });

  it("master nuevo con horario en la misma actualización conserva el horario sin verificar", () => {
    const noMaster = bookingWith({ ...FULL_BOOKING, master_id: null, master_name: null });
    const out = mergeBookingState(noMaster, { master_id: "7", slot_time: "2025-12-25 14:00" });
    expect(out.master_id).toBe(7);
    expect(out.slot_time).toBe("2025-12-25 14:00");
    expect(out.slot_time_verified).toBeNull();
    expect(out.client_name).toBeNull();
  });

  it("master sin horario elegido es un primer llenado", () => {
    const draft = bookingWith({ service_id: 1, client_name: "Аня" });
    expect(mergeBookingState(draft, { master_name: "Ирина" })).toEqual({ ...draft, master_name: "Ирина" });
  });

  it("el mismo master con otras mayúsculas no es un cambio", () => {
    expect(mergeBookingState(FULL_BOOKING, { master_name: "ольга" })).toEqual(FULL_BOOKING);
  });

  it("cambio de horario normaliza el formato y limpia verificación y contactos", () => {
    const out = mergeBookingState(FULL_BOOKING, { slot_time: "2025-12-25T16:30:00" });
    expect(out.slot_time).toBe("2025-12-25 16:30");
    expect(out.slot_time_verified).toBeNull();
    expect(out.master_id).toBe(5);
    expect(out.client_name).toBeNull();
    expect(out.dialog_step).toBe("contacts");
  });

  it("reset explícito del horario fuerza verificación en null", () => {
    const out = mergeBookingState(FULL_BOOKING, { slot_time: null });
    expect(out.slot_time).toBeNull();
    expect(out.slot_time_verified).toBeNull();
    expect(out.dialog_step).toBe("slot");
  });

  it("rechaza horarios a medianoche (solo fecha)", () => {
    const out = mergeBookingState(FULL_BOOKING, { slot_time: "2025-12-26 00:00" });
    expect(out.slot_time).toBe("2025-12-25 14:00");
    expect(out.slot_time_verified).toBe(true);
  });

  it("horario con formato inválido se omite", () => {
    const out = mergeBookingState(bookingWith({ service_id: 1 }), { slot_time: "завтра в 10" });
    expect(out.slot_time).toBeNull();
  });

  it("nuevo nombre limpia el teléfono si no vino en la misma actualización", () => {
    const out = mergeBookingState(FULL_BOOKING, { client_name: "Мария" });
    expect(out.client_name).toBe("Мария");
    expect(out.client_phone).toBeNull();
    expect(out.slot_time_verified).toBe(true);
  });

  it("nuevo teléfono limpia el nombre; ambos juntos se conservan", () => {
    expect(mergeBookingState(FULL_BOOKING, { client_phone: "+7 999 000-00-01" })).toMatchObject({
      client_name: null,
      client_phone: "+79990000001",
    });
    expect(
      mergeBookingState(FULL_BOOKING, { client_name: "Мария", client_phone: "8 (999) 111-22-33" })
    ).toMatchObject({ client_name: "Мария", client_phone: "89991112233" });
  });

  it("un intento finalizado no se modifica", () => {
    const finalized = bookingWith({ ...FULL_BOOKING, is_finalized: true });
    expect(mergeBookingState(finalized, { service_id: 7, client_name: "Мария" })).toBe(finalized);
  });
});

describe("helpers del merge", () => {
  it("parseJsonFromResponse tolera fences y texto alrededor", () => {
    expect(parseJsonFromResponse('```json\n{"client_name": "Аня"}\n```')).toEqual({ client_name: "Аня" });
    expect(parseJsonFromResponse('Вот: {"service_id": 5} готово')).toEqual({ service_id: 5 });
    expect(parseJsonFromResponse("нет json")).toBeNull();
    expect(parseJsonFromResponse("[1, 2]")).toBeNull();
    expect(parseJsonFromResponse("")).toBeNull();
  });

  it("sameName ignora mayúsculas y espacios", () => {
    expect(sameName("Маникюр  гель", " маникюр гель")).toBe(true);
    expect(sameName("Маникюр", "Педикюр")).toBe(false);
  });

  it("coerceInt, normalizeSlotTime, normalizePhone, isMidnightSlot", () => {
    expect(coerceInt(" 42 ")).toBe(42);
    expect(coerceInt("4.2")).toBeNull();
    expect(coerceInt(true)).toBeNull();
    expect(normalizeSlotTime("2025-12-25T09:05")).toBe("2025-12-25 09:05");
    expect(normalizeSlotTime("2025-12-25 25:00")).toBeNull();
    expect(normalizePhone("+7 (999) 000-00-00")).toBe("+79990000000");
    expect(normalizePhone("нет")).toBeNull();
    expect(isMidnightSlot("2025-12-25T00:00:00")).toBe(true);
    expect(isMidnightSlot("2025-12-25 00:30")).toBe(false);
  });

  it("applyStateDelta aplica campos del sistema y restablece invariantes", () => {
    const unverified = bookingWith({ service_id: 1, slot_time: "2025-12-25 14:00" });
    expect(applyStateDelta(unverified, { slot_time_verified: true }).slot_time_verified).toBe(true);
    const reset = applyStateDelta(FULL_BOOKING, { slot_time: null });
    expect(reset.slot_time_verified).toBeNull();
    expect(reset.dialog_step).toBe("slot");
    expect(applyStateDelta(FULL_BOOKING, { is_finalized: true }).is_finalized).toBe(true);
  });

  it("computeDialogStep sigue servicio → horario → contactos → confirmación", () => {
    expect(computeDialogStep(createEmptyBookingState())).toBe("service");
    expect(computeDialogStep(bookingWith({ service_id: 1 }))).toBe("slot");
    expect(computeDialogStep(bookingWith({ service_id: 1, slot_time: "2025-12-25 14:00", client_name: "Аня" }))).toBe(
      "contacts"
    );
    expect(computeDialogStep(FULL_BOOKING)).toBe("confirmation");
  });
});
