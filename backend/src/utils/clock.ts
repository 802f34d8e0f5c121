export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date()
};

export type WallClock = {
  day: string; // YYYY-MM-DD
  time: string; // HH:MM, 24h
};

export function wallClock(date: Date, timeZone: string): WallClock {
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23"
  }).formatToParts(date);

  const pick = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? "00";

  return {
    day: `${pick("year")}-${pick("month")}-${pick("day")}`,
    time: `${pick("hour")}:${pick("minute")}`
  };
}

/** Calendar day of `date` in `timeZone`, as YYYY-MM-DD. */
export function calendarDay(date: Date, timeZone: string): string {
  return wallClock(date, timeZone).day;
}
