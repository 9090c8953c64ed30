import { formatSlotTime } from "../format";
import { emptyResult, type BookingHandler } from "./types";

// Sin LLM ni herramientas: plantilla fija que repite el horario elegido.
export const contactCollector: BookingHandler = async ({ booking }) => {
  if (booking.service_id === null || booking.slot_time === null) return emptyResult();
  const { client_name: name, client_phone: phone } = booking;
  if (name && phone) return emptyResult();

  const when = formatSlotTime(booking.slot_time);
  let reply: string;
  if (!name && !phone) {
    reply = `Хорошо, время ${when} свободно. Пожалуйста, напишите ваше имя и номер телефона.`;
  } else if (name) {
    reply = `${name}, пожалуйста, напишите ваш номер телефона для записи на ${when}.`;
  } else {
    reply = `Пожалуйста, напишите ваше имя для записи на ${when}.`;
  }
  return { reply, stateDelta: {}, toolCallsUsed: [] };
};
