const MONTHS = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

function pad(n: number) {
  return String(n).padStart(2, "0");
}

function canonical(year: number, month: number, day: number): string | undefined {
  const d = new Date(Date.UTC(year, month - 1, day));
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    return;
  }
  return `${String(year).padStart(4, "0")}-${pad(month)}-${pad(day)}`;
}

/** `2024-01-05` or `2024-1-5` -> `2024-01-05`, anything that is not a real calendar day -> undefined. */
export function parseCanonicalDate(text: string): string | undefined {
  const m = /^(\d{4})-(\d{1,2})-(\d{1,2})$/.exec(text.trim());
  if (m) return canonical(+m[1], +m[2], +m[3]);
}

/** Local calendar day of `date` as `YYYY-MM-DD`. */
export function isoDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** `2024-01-05` -> `January 05, 2024`. Strings that are not canonical dates are returned as is. */
export function formatDisplayDate(date: string): string {
  const value = parseCanonicalDate(date);
  if (value === undefined) return date;
  const [y, m, d] = value.split("-");
  return `${MONTHS[+m - 1]} ${d}, ${y}`;
}

/**
 * Reverse of {@link formatDisplayDate}. Accepts `January 5, 2024`,
 * `January 05, 2024` and `2024-01-05`; returns `YYYY-MM-DD` or undefined.
 */
export function parseDisplayDate(text: string): string | undefined {
  const m = /^([A-Za-z]+)\s+(\d{1,2}),\s*(\d{4})$/.exec(text.trim());
  if (m) {
    const month = MONTHS.findIndex((name) => name.toLowerCase() === m[1].toLowerCase());
    if (month === -1) return;
    return canonical(+m[3], month + 1, +m[2]);
  }
  return parseCanonicalDate(text);
}
