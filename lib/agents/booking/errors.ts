// =============================
// Errores del flujo de reserva
// =============================

/**
 * Cualquier herramienta puede pedir la intervención de un manager.
 * Viaja sin cambios hasta el borde del handler.
 */
export class ManagerEscalationError extends Error {
  readonly userMessage: string;
  readonly alert: string;

  constructor(userMessage: string, alert: string) {
    super(alert);
    this.name = "ManagerEscalationError";
    this.userMessage = userMessage;
    this.alert = alert;
  }
}

export class CrmError extends Error {
  readonly status?: number;
  readonly retryable: boolean;

  constructor(message: string, opts: { status?: number; retryable?: boolean; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = "CrmError";
    this.status = opts.status;
    this.retryable = opts.retryable ?? false;
  }
}

export class HopLimitError extends Error {
  readonly hops: number;

  constructor(hops: number) {
    super(`booking graph exceeded ${hops} handler hops in one turn`);
    this.name = "HopLimitError";
    this.hops = hops;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
