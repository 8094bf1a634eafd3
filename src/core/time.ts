const DAY_MS = 86400000;

export const formatISODate = (date: Date): string => date.toISOString().slice(0, 10);

export const parseISODate = (value: string): Date => {
  const parsed = new Date(`${value.slice(0, 10)}T00:00:00Z`);
  if (Number.isNaN(parsed.getTime())) {
    throw new Error(`Invalid date: ${value}`);
  }
  return parsed;
};

export const normalizeDate = (value: string): string => formatISODate(parseISODate(value));

export const addDays = (isoDate: string, days: number): string => {
  const d = parseISODate(isoDate);
  return formatISODate(new Date(d.getTime() + days * DAY_MS));
};

export const monthKey = (isoDate: string): string => isoDate.slice(0, 7);

export const monthIndex = (key: string): number => {
  const [year, month] = key.split('-').map(Number);
  return year * 12 + (month - 1);
};

export const monthsBetween = (fromKey: string, toKey: string): string[] => {
  const out: string[] = [];
  for (let idx = monthIndex(fromKey); idx <= monthIndex(toKey); idx++) {
    const year = Math.floor(idx / 12);
    const month = (idx % 12) + 1;
    out.push(`${year}-${String(month).padStart(2, '0')}`);
  }
  return out;
};

// Monday of the ISO week the date falls in.
export const weekKey = (isoDate: string): string => {
  const d = parseISODate(isoDate);
  const diffToMonday = (d.getUTCDay() + 6) % 7;
  return formatISODate(new Date(d.getTime() - diffToMonday * DAY_MS));
};

export const isBusinessDay = (isoDate: string): boolean => {
  const day = parseISODate(isoDate).getUTCDay();
  return day !== 0 && day !== 6;
};

export const businessDaysBetween = (from: string, to: string): string[] => {
  const out: string[] = [];
  const end = parseISODate(to).getTime();
  for (let t = parseISODate(from).getTime(); t <= end; t += DAY_MS) {
    const iso = formatISODate(new Date(t));
    if (isBusinessDay(iso)) out.push(iso);
  }
  return out;
};

// Consecutive business days starting at `from` (inclusive when it is one).
export const businessDaysFrom = (from: string, count: number): string[] => {
  const out: string[] = [];
  let t = parseISODate(from).getTime();
  while (out.length < count) {
    const iso = formatISODate(new Date(t));
    if (isBusinessDay(iso)) out.push(iso);
    t += DAY_MS;
  }
  return out;
};
