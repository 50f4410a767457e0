// src/utils/timeParsing.ts
//
// Células de horário chegam em vários formatos: "15:15", "15:15:00",
// "2026-10-18 15:15:00", número serial do Excel ou Date. Tudo vira epoch ms
// no fuso local.

const DAY_SECONDS = 24 * 3600;

const TIME_RE = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;
const DATE_RE = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})$/;
const DATE_TIME_RE = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})[ T](\d{1,2}):(\d{2})(?::(\d{2}))?$/;

export function isBlank(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  const str = String(value).trim();
  return str === '' || str.toLowerCase() === 'nan';
}

function checkClock(h: number, m: number, s: number, raw: string) {
  if (h > 23 || m > 59 || s > 59) {
    throw new Error(`horário fora do intervalo: ${raw}`);
  }
}

/** Serial do Excel (dias desde 1899-12-30) para Date local. */
export function excelSerialToDate(serial: number): Date {
  const days = Math.floor(serial);
  const seconds = Math.round((serial - days) * DAY_SECONDS);
  return new Date(1899, 11, 30 + days, 0, 0, seconds);
}

export function startOfDay(ts: number): Date {
  const d = new Date(ts);
  return new Date(d.getFullYear(), d.getMonth(), d.getDate());
}

/**
 * Converte uma célula de data ("2026-10-18", "2026/10/18", serial, Date)
 * para a meia-noite local daquele dia.
 */
export function parseDate(value: unknown): Date | null {
  if (isBlank(value)) return null;

  if (value instanceof Date) {
    return startOfDay(value.getTime());
  }
  if (typeof value === 'number') {
    return startOfDay(excelSerialToDate(value).getTime());
  }

  const raw = String(value).trim();
  const match = DATE_RE.exec(raw);
  if (!match) {
    throw new Error(`formato de data inválido: ${raw}`);
  }
  const [, y, mo, d] = match;
  const date = new Date(Number(y), Number(mo) - 1, Number(d));
  if (date.getMonth() !== Number(mo) - 1) {
    throw new Error(`data inexistente: ${raw}`);
  }
  return date;
}

/**
 * Converte uma célula de horário para epoch ms. Horário sem data usa `day`.
 * Retorna null para célula vazia.
 */
export function parseTimestamp(value: unknown, day: Date): number | null {
  if (isBlank(value)) return null;

  if (value instanceof Date) {
    return value.getTime();
  }

  if (typeof value === 'number') {
    if (value < 0) {
      throw new Error(`horário negativo: ${value}`);
    }
    if (value < 1) {
      // fração do dia (célula formatada só como hora)
      const seconds = Math.round(value * DAY_SECONDS);
      return new Date(day.getFullYear(), day.getMonth(), day.getDate(), 0, 0, seconds).getTime();
    }
    return excelSerialToDate(value).getTime();
  }

  const raw = String(value).trim();

  const full = DATE_TIME_RE.exec(raw);
  if (full) {
    const [, y, mo, d, h, m, s] = full;
    checkClock(Number(h), Number(m), Number(s ?? 0), raw);
    return new Date(Number(y), Number(mo) - 1, Number(d), Number(h), Number(m), Number(s ?? 0)).getTime();
  }

  const time = TIME_RE.exec(raw);
  if (time) {
    const [, h, m, s] = time;
    checkClock(Number(h), Number(m), Number(s ?? 0), raw);
    return new Date(day.getFullYear(), day.getMonth(), day.getDate(), Number(h), Number(m), Number(s ?? 0)).getTime();
  }

  throw new Error(`formato de horário inválido: ${raw}`);
}

/**
 * Duração de holding em ms. Aceita segundos ("60", 60), "mm:ss",
 * "hh:mm:ss" ou fração do dia vinda do Excel.
 */
export function parseDuration(value: unknown): number | null {
  if (isBlank(value)) return null;

  // número puro (célula numérica ou texto numérico): < 1 é fração do dia, senão segundos
  const fromNumber = (n: number) => (n > 0 && n < 1 ? Math.round(n * DAY_SECONDS) : n);

  let seconds: number;
  if (typeof value === 'number') {
    seconds = fromNumber(value);
  } else {
    const raw = String(value).trim();
    if (/^\d+(\.\d+)?$/.test(raw)) {
      seconds = fromNumber(Number(raw));
    } else {
      const parts = raw.split(':');
      if (parts.length < 2 || parts.length > 3 || parts.some((p) => !/^\d+$/.test(p))) {
        throw new Error(`duração inválida: ${raw}`);
      }
      seconds = parts.map(Number).reduce((acc, part) => acc * 60 + part, 0);
    }
  }

  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new Error(`duração precisa ser positiva: ${String(value)}`);
  }
  return Math.round(seconds * 1000);
}

export function formatTime(ts: number): string {
  const d = new Date(ts);
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}
