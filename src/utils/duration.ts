/**
 * Duration parsing for configuration values.
 *
 * Accepts a signed sequence of decimal numbers with units, e.g. "300ms",
 * "1.5s", "1h30m". Valid units are "ns", "us" (or "µs"), "ms", "s", "m", "h".
 * "0" needs no unit. Results are in milliseconds.
 */

const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  µs: 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

const SEGMENT = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|ms|s|m|h)/y;

export function parseDuration(input: string): number {
  const trimmed = input.trim();
  if (trimmed === "") {
    throw new Error("empty duration");
  }

  let sign = 1;
  let rest = trimmed;
  if (rest.startsWith("-") || rest.startsWith("+")) {
    sign = rest.startsWith("-") ? -1 : 1;
    rest = rest.slice(1);
  }
  if (rest === "0") return 0;
  if (rest === "") {
    throw new Error(`invalid duration "${input}"`);
  }

  let total = 0;
  SEGMENT.lastIndex = 0;
  while (SEGMENT.lastIndex < rest.length) {
    const start = SEGMENT.lastIndex;
    const match = SEGMENT.exec(rest);
    if (!match) {
      const tail = rest.slice(start);
      throw new Error(
        /^[\d.]+$/.test(tail)
          ? `missing unit in duration "${input}"`
          : `invalid duration "${input}"`,
      );
    }
    const [, amount, unit] = match;
    total += Number(amount) * (UNIT_MS[unit ?? ""] ?? Number.NaN);
  }

  if (!Number.isFinite(total)) {
    throw new Error(`invalid duration "${input}"`);
  }
  return sign * total;
}

/**
 * Numbers are taken as milliseconds, strings are parsed.
 */
export function toMilliseconds(value: string | number): number {
  return typeof value === "number" ? value : parseDuration(value);
}

export function formatDuration(ms: number): string {
  if (ms === 0) return "0s";
  if (ms % 1000 === 0) return `${ms / 1000}s`;
  return `${ms}ms`;
}
