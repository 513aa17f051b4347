// pattern: Functional Core

export type CurrentDate = {
  readonly current_date: string;
  readonly current_datetime: string;
  readonly day_of_week: string;
  readonly formatted_date: string;
  readonly year: number;
  readonly month: number;
  readonly day: number;
};

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local calendar date as YYYY-MM-DD. */
export function isoDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * What "today" means on this host, so an agent can phrase time-bounded queries.
 * Local time throughout; no network call.
 */
export function getCurrentDate(now: Date = new Date()): CurrentDate {
  const time = `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`;

  return {
    current_date: isoDate(now),
    current_datetime: `${isoDate(now)}T${time}`,
    day_of_week: now.toLocaleDateString("en-US", { weekday: "long" }),
    formatted_date: now.toLocaleDateString("en-US", { month: "long", day: "2-digit", year: "numeric" }),
    year: now.getFullYear(),
    month: now.getMonth() + 1,
    day: now.getDate(),
  };
}
