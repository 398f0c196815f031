function parts(date: Date, timeZone: string): Map<string, string> {
  const fmt = new Intl.DateTimeFormat("en-GB", {
    timeZone,
    day: "2-digit",
    month: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23"
  });
  return new Map(fmt.formatToParts(date).map((p) => [p.type, p.value]));
}

export function hourIn(date: Date, timeZone: string): number {
  return parseInt(parts(date, timeZone).get("hour") ?? "0", 10);
}

export function inWorkWindow(date: Date, timeZone: string, startHour: number, endHour: number): boolean {
  const h = hourIn(date, timeZone);
  return startHour <= h && h < endHour;
}

/** "dd.mm HH:MM" in the given zone. */
export function formatStamp(date: Date, timeZone: string): string {
  const p = parts(date, timeZone);
  return `${p.get("day")}.${p.get("month")} ${p.get("hour")}:${p.get("minute")}`;
}
