// =============================
// Preferencias de fecha/horario a partir del texto del cliente
// =============================

/**
 * Periodo como lo entiende el CRM: "morning" | "day" | "evening",
 * "after HH:MM", "before HH:MM", "HH:MM" (ventana de 30 min) o "HH:MM-HH:MM".
 */
export type TimePeriod = string;

export type TimePreference = {
  timePeriod?: TimePeriod;
  date?: string; // YYYY-MM-DD
};

const PERIOD_BOUNDS: Record<string, [number, number]> = {
  morning: [9 * 60, 11 * 60],
  day: [11 * 60, 17 * 60],
  evening: [17 * 60, 22 * 60],
};

const MONTHS: Array<[RegExp, number]> = [
  [/^январ/, 1],
  [/^феврал/, 2],
  [/^март/, 3],
  [/^апрел/, 4],
  [/^ма[яй]$/, 5],
  [/^июн/, 6],
  [/^июл/, 7],
  [/^август/, 8],
  [/^сентябр/, 9],
  [/^октябр/, 10],
  [/^ноябр/, 11],
  [/^декабр/, 12],
];

const pad = (n: number) => String(n).padStart(2, "0");

export function toYmd(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

function addDays(d: Date, days: number): Date {
  const out = new Date(d.getFullYear(), d.getMonth(), d.getDate());
  out.setDate(out.getDate() + days);
  return out;
}

export function timeToMinutes(hhmm: string): number | null {
  const m = hhmm.trim().match(/^(\d{1,2})[:.](\d{2})$/);
  if (!m) return null;
  const h = Number(m[1]);
  const min = Number(m[2]);
  if (h > 23 || min > 59) return null;
  return h * 60 + min;
}

/** Límites [inicio, fin] en minutos desde el inicio del día. null si el formato no se reconoce. */
export function getTimePeriodBounds(period: TimePeriod): [number, number] | null {
  const p = period.trim().toLowerCase();
  if (PERIOD_BOUNDS[p]) return PERIOD_BOUNDS[p];
  if (p.startsWith("before ")) {
    const end = timeToMinutes(p.slice(7));
    return end === null ? null : [0, end];
  }
  if (p.startsWith("after ")) {
    const start = timeToMinutes(p.slice(6));
    return start === null ? null : [start, 24 * 60];
  }
  if (p.includes("-")) {
    const [a, b] = p.split("-", 2);
    const start = timeToMinutes(a);
    const end = timeToMinutes(b);
    return start === null || end === null ? null : [start, end];
  }
  const exact = timeToMinutes(p);
  return exact === null ? null : [exact, exact + 30];
}

/** ¿"HH:MM" cae dentro de alguno de los rangos ("HH:MM-HH:MM" o "HH:MM")? */
export function isTimeInRanges(time: string, ranges: string[]): boolean {
  const t = timeToMinutes(time);
  if (t === null) return false;
  return ranges.some((range) => {
    const [a, b] = range.split("-", 2);
    const start = timeToMinutes(a);
    if (start === null) return false;
    if (b === undefined) return start === t;
    const end = timeToMinutes(b);
    return end !== null && start <= t && t <= end;
  });
}

function clockFrom(h: string, m: string | undefined): string | null {
  const hh = Number(h);
  const mm = m ? Number(m) : 0;
  if (hh > 23 || mm > 59) return null;
  return `${pad(hh)}:${pad(mm)}`;
}

/** Hora tras un disparador; "с 10 декабря" o "до 5 января" son fechas, no horas. */
function clockAfter(text: string, re: RegExp): string | null {
  const m = re.exec(text);
  if (!m) return null;
  const word = text.slice(m.index + m[0].length).match(/^\s*([а-яё]+)/);
  if (word && MONTHS.some(([month]) => month.test(word[1]))) return null;
  return clockFrom(m[1], m[2]);
}

function parsePeriod(text: string): TimePeriod | undefined {
  const after =
    clockAfter(text, /(?:^|\s)(?:после|after)\s+(\d{1,2})(?:[:.](\d{2}))?(?!\d)/) ??
    clockAfter(text, /(?:^|\s)с\s+(\d{1,2})(?::(\d{2})|(?=\s*(?:час|утра)))(?!\d)/);
  if (after) return `after ${after}`;
  const before = clockAfter(text, /(?:^|\s)(?:до|before)\s+(\d{1,2})(?:[:.](\d{2}))?(?!\d)/);
  if (before) return `before ${before}`;
  if (/утр|morning/.test(text)) return "morning";
  if (/вечер|evening/.test(text)) return "evening";
  if (/дн[её]м|днев|обед|afternoon/.test(text)) return "day";
  return undefined;
}

function buildDate(year: number, month: number, day: number): Date | null {
  const d = new Date(year, month - 1, day);
  return d.getMonth() === month - 1 && d.getDate() === day ? d : null;
}

/** Sin año explícito: si la fecha ya pasó este año, se toma la del año siguiente. */
function resolveDayMonth(day: number, month: number, now: Date): string | undefined {
  const today = addDays(now, 0);
  const candidate = buildDate(now.getFullYear(), month, day);
  if (!candidate) return undefined;
  if (candidate < today) {
    const next = buildDate(now.getFullYear() + 1, month, day);
    return next ? toYmd(next) : undefined;
  }
  return toYmd(candidate);
}

function parseDate(text: string, now: Date): string | undefined {
  const iso = text.match(/(\d{4})-(\d{2})-(\d{2})/);
  if (iso) {
    const d = buildDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
    if (d) return toYmd(d);
  }

  const dotted = text.match(/(?<![\d:])(\d{1,2})\.(\d{1,2})(?:\.(\d{4}))?(?![\d:])/);
  if (dotted) {
    const day = Number(dotted[1]);
    const month = Number(dotted[2]);
    if (dotted[3]) {
      const d = buildDate(Number(dotted[3]), month, day);
      if (d) return toYmd(d);
    } else {
      const ymd = resolveDayMonth(day, month, now);
      if (ymd) return ymd;
    }
  }

  const named = text.match(/(\d{1,2})\s+([а-яё]+)/);
  if (named) {
    const month = MONTHS.find(([re]) => re.test(named[2]));
    if (month) {
      const ymd = resolveDayMonth(Number(named[1]), month[1], now);
      if (ymd) return ymd;
    }
  }

  if (/послезавтра/.test(text)) return toYmd(addDays(now, 2));
  if (/завтра|tomorrow/.test(text)) return toYmd(addDays(now, 1));
  if (/сегодня|today/.test(text)) return toYmd(addDays(now, 0));
  return undefined;
}

export function parseTimePreference(message: string, now: Date): TimePreference {
  const text = (message || "").toLowerCase();
  const pref: TimePreference = {};
  const timePeriod = parsePeriod(text);
  const date = parseDate(text, now);
  if (timePeriod) pref.timePeriod = timePeriod;
  if (date) pref.date = date;
  return pref;
}

export function describeTimePeriod(period: TimePeriod): string {
  const p = period.trim().toLowerCase();
  if (p === "morning") return "утром";
  if (p === "day") return "днём";
  if (p === "evening") return "вечером";
  if (p.startsWith("after ")) return `после ${p.slice(6)}`;
  if (p.startsWith("before ")) return `до ${p.slice(7)}`;
  return `в ${p}`;
}
