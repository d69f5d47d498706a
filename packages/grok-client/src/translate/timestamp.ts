import type { WireTimestamp } from "../wire/types.js";

export function toTimestamp(date: Date): WireTimestamp {
  const ms = date.getTime();
  const seconds = Math.floor(ms / 1000);
  return { seconds, nanos: (ms - seconds * 1000) * 1_000_000 };
}

/** Unix seconds, or undefined for an unset timestamp. */
export function fromTimestamp(ts: WireTimestamp | null | undefined): number | undefined {
  return ts ? ts.seconds : undefined;
}
