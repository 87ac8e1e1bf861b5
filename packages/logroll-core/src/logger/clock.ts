/**
 * 纳秒精度时间戳
 *
 * 墙钟取自 Date.now()（毫秒），亚毫秒部分由 process.hrtime 补足，统一以 bigint 纳秒表示。
 * 估算值与墙钟不在同一毫秒时重新锚定，NTP 校时后也能跟上系统时间。
 */

const NANOS_PER_MILLI = 1_000_000n;
const NANOS_PER_SECOND = 1_000_000_000n;

export type Clock = () => bigint;

export function createSystemClock(
  wallMillis: () => number = () => Date.now(),
  monotonicNanos: () => bigint = () => process.hrtime.bigint(),
): Clock {
  let anchor: { wall: bigint; mono: bigint } | undefined;

  return () => {
    const wall = BigInt(wallMillis()) * NANOS_PER_MILLI;
    const mono = monotonicNanos();
    if (anchor) {
      const estimate = anchor.wall + (mono - anchor.mono);
      if (estimate / NANOS_PER_MILLI === wall / NANOS_PER_MILLI) return estimate;
    }
    anchor = { wall, mono };
    return wall;
  };
}

export const systemClock: Clock = createSystemClock();

export function nanosFromDate(date: Date): bigint {
  return BigInt(date.getTime()) * NANOS_PER_MILLI;
}

/** RFC 3339，固定 9 位小数，UTC，例如 2025-01-22T12:00:00.000000000Z */
export function formatRfc3339Nano(nanos: bigint): string {
  let seconds = nanos / NANOS_PER_SECOND;
  let fraction = nanos % NANOS_PER_SECOND;
  if (fraction < 0n) {
    fraction += NANOS_PER_SECOND;
    seconds -= 1n;
  }
  const whole = new Date(Number(seconds) * 1000).toISOString().slice(0, 19);
  return `${whole}.${fraction.toString().padStart(9, "0")}Z`;
}
