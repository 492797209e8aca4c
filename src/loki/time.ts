/** Order two nanosecond timestamp strings numerically. */
export function compareNanos(a: string, b: string): number {
  const x = BigInt(a);
  const y = BigInt(b);
  return x < y ? -1 : x > y ? 1 : 0;
}

/** Nanosecond timestamp string to a Date (millisecond precision, truncated). */
export function nanosToDate(ns: string): Date {
  return new Date(Number(BigInt(ns) / 1_000_000n));
}

/** `yyyy-MM-dd HH:mm:ss.fff` in UTC. */
export function formatLogTimestamp(d: Date): string {
  const iso = d.toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 23)}`;
}

/** `yyyyMMdd_HH` of the UTC hour containing `d`. */
export function formatHourBucket(d: Date): string {
  const iso = d.toISOString();
  return `${iso.slice(0, 4)}${iso.slice(5, 7)}${iso.slice(8, 10)}_${iso.slice(11, 13)}`;
}
