import { describe, it, expect } from "vitest";
import { loadBookingConfig } from "@/lib/config/bookingConfig";

describe("loadBookingConfig", () => {
  it("valores por defecto", () => {
    const cfg = loadBookingConfig({});
    expect(cfg).toEqual({
      llm: { apiKey: undefined, model: "gpt-4o-mini", analyzerTemperature: 0.1, timeoutMs: 30_000, maxRetries: 2 },
      crm: {
        endpoint: "http://localhost:8080/api/crm",
        apiKey: undefined,
        timeoutMs: 15_000,
        maxRetries: 3,
        retryDelayMs: 1_000,
      },
      maxHops: 3,
      historyLimit: 10,
      salonName: undefined,
      redisUrl: "redis://localhost:6379",
      convStateTtlSeconds: 86_400,
    });
  });

  it("convierte las variables de entorno", () => {
    const cfg = loadBookingConfig({
      CRM_ENDPOINT: "http://crm.test/api",
      CRM_API_KEY: "test-secret",
      BOOKING_MAX_HOPS: "5",
      LLM_ANALYZER_TEMPERATURE: "0.2",
      SALON_NAME: "Лотос",
    });
    expect(cfg.crm).toMatchObject({ endpoint: "http://crm.test/api", apiKey: "test-secret" });
    expect(cfg.maxHops).toBe(5);
    expect(cfg.llm.analyzerTemperature).toBe(0.2);
    expect(cfg.salonName).toBe("Лотос");
  });

  it("lanza con la variable inválida en el mensaje", () => {
    expect(() => loadBookingConfig({ BOOKING_MAX_HOPS: "0" })).toThrow(/^Configuración inválida: BOOKING_MAX_HOPS/);
    expect(() => loadBookingConfig({ CRM_ENDPOINT: "no es url" })).toThrow(/CRM_ENDPOINT/);
  });
});
