// Textos en ruso para el cliente: fechas, listas de servicios y horarios
import type { CrmCategory, CrmService, SlotOption } from "@/lib/tools/crm";

/** "2025-12-25" → "25.12.2025" */
export function formatDate(ymd: string): string {
  const m = ymd.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  return m ? `${m[3]}.${m[2]}.${m[1]}` : ymd;
}

/** "2025-12-25 14:00" → "25.12.2025 в 14:00" */
export function formatSlotTime(slotTime: string): string {
  const [date, time] = slotTime.split(" ");
  if (!time) return formatDate(date);
  return `${formatDate(date)} в ${time}`;
}

export function formatCategories(categories: CrmCategory[]): string {
  if (!categories.length) return "Категории услуг не найдены.";
  return ["Категории услуг:", ...categories.map((c) => `- ${c.title}`)].join("\n");
}

function formatPrice(price: CrmService["price"]): string {
  if (price === null || price === undefined || price === "") return "";
  return typeof price === "number" ? `, ${price} ₽` : `, ${price}`;
}

export function formatServices(services: CrmService[]): string {
  return services.map((s) => `- ${s.title} (ID: ${s.id}${formatPrice(s.price)})`).join("\n");
}

export function formatSlotOptions(options: SlotOption[]): string {
  return options
    .filter((o) => o.timeRanges.length > 0)
    .map((o) => `${formatDate(o.date)}, мастер ${o.master}: ${o.timeRanges.join(", ")}`)
    .join("\n");
}
