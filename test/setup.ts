import { beforeAll, afterAll, afterEach, vi } from "vitest";

// ✅ setea envs sin escribir propiedades readonly
beforeAll(() => {
  vi.stubEnv("NODE_ENV", "test");
  vi.stubEnv("VITEST", "1");
  vi.stubEnv("DEBUG", "false");
  vi.stubEnv("LOG_TO_FILE", "false");
});

afterAll(() => {
  vi.unstubAllEnvs();
});

afterEach(() => {
  vi.restoreAllMocks();
});
