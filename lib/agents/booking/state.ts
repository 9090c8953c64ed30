// =============================
// Estado del grafo de reserva + contexto de conversación externo
// =============================
import { Annotation } from "@langchain/langgraph";
import type { BaseMessage } from "@langchain/core/messages";
import { createEmptyBookingState, type BookingState } from "@/lib/schemas/booking";

/** Contexto que llega desde el orquestador de la conversación. */
export type ConversationContext = {
  message: string;
  chatId: string;
  conversationId: string;
  messages: BaseMessage[];
  stage?: string;
  extractedInfo: { booking?: unknown; [key: string]: unknown };
  answer?: string;
  managerAlert?: string | null;
  usedTools?: string[];
};

export const BookingGraphState = Annotation.Root({
    // Entrada del turno
    booking: Annotation<BookingState>({
        reducer: (_x, y) => y,
        default: createEmptyBookingState,
    }),
    message: Annotation<string>({
        reducer: (_x, y) => y,
        default: () => "",
    }),
    history: Annotation<BaseMessage[]>({
        reducer: (_x, y) => y,
        default: () => [],
    }),
    chatId: Annotation<string>({
        reducer: (_x, y) => y,
        default: () => "",
    }),

    // Transcript de herramientas generado en este turno
    newMessages: Annotation<BaseMessage[]>({
        reducer: (x, y) => x.concat(y),
        default: () => [],
    }),
    usedTools: Annotation<string[]>({
        reducer: (x, y) => x.concat(y),
        default: () => [],
    }),

    // Salida
    reply: Annotation<string>({
        reducer: (_x, y) => y,
        default: () => "",
    }),
    managerAlert: Annotation<string | null>({
        reducer: (_x, y) => y,
        default: () => null,
    }),

    // Control de saltos dentro del turno
    hops: Annotation<number>({
        reducer: (_x, y) => y,
        default: () => 0,
    }),
    lastNode: Annotation<string | null>({
        reducer: (_x, y) => y,
        default: () => null,
    }),
});

export type BookingGraphStateType = typeof BookingGraphState.State;
export type BookingGraphUpdate = typeof BookingGraphState.Update;

export type TurnOutcome = {
  booking: BookingState;
  reply: string;
  managerAlert: string | null;
  newMessages: BaseMessage[];
  usedTools: string[];
};
