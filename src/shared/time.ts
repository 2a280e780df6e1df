function pad(n: number): string {
  return n < 10 ? `0${n}` : String(n);
}

/** Local calendar day as YYYY-MM-DD. */
export function localDay(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function inWindow(time: number, since: Date, until: Date): boolean {
  return time >= since.getTime() && time < until.getTime();
}

/** Every local day touched by [since, until], oldest first. */
export function daysBetween(since: Date, until: Date): string[] {
  const days: string[] = [];
  const cursor = new Date(since.getFullYear(), since.getMonth(), since.getDate());
  const last = localDay(until);
  for (;;) {
    const day = localDay(cursor);
    days.push(day);
    if (day >= last) break;
    cursor.setDate(cursor.getDate() + 1);
  }
  return days;
}

export function hoursBefore(until: Date, hours: number): Date {
  return new Date(until.getTime() - hours * 3600_000);
}
