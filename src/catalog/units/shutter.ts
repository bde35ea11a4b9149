/** Standard full, half and third stop shutter speeds, in seconds. */
export const STANDARD_SHUTTER_SPEEDS: readonly number[] = Object.freeze([
  1 / 8000, 1 / 6400, 1 / 5000, 1 / 4000, 1 / 3200, 1 / 2500, 1 / 2000, 1 / 1600, 1 / 1250, 1 / 1000,
  1 / 800, 1 / 640, 1 / 500, 1 / 400, 1 / 320, 1 / 250, 1 / 200, 1 / 160, 1 / 125, 1 / 100,
  1 / 80, 1 / 60, 1 / 50, 1 / 40, 1 / 30, 1 / 25, 1 / 20, 1 / 15, 1 / 13, 1 / 10,
  1 / 8, 1 / 6, 1 / 5, 1 / 4, 1 / 3, 0.4, 0.5, 0.6, 0.8, 1,
  1.3, 1.6, 2, 2.5, 3.2, 4, 5, 6, 8, 10,
  13, 15, 20, 25, 30,
]);

export const SHUTTER_NOT_AVAILABLE = "N/A";

/** Maximum relative error for snapping to a standard speed. */
const SNAP_TOLERANCE = 0.1;
const FRACTION_PRECISION = 1_000_000;

function gcd(a: number, b: number): number {
  let x = Math.abs(a);
  let y = Math.abs(b);
  while (y) {
    [x, y] = [y, x % y];
  }
  return x;
}

function toSeconds(value: number | string): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }
  if (trimmed.includes("/")) {
    const parts = trimmed.split("/");
    if (parts.length !== 2 || !parts[0].trim() || !parts[1].trim()) {
      return null;
    }
    const numerator = Number(parts[0]);
    const denominator = Number(parts[1]);
    if (!Number.isFinite(numerator) || !Number.isFinite(denominator) || denominator === 0) {
      return null;
    }
    return numerator / denominator;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

function formatStandard(speed: number): string {
  if (speed < 1) {
    const denominator = Math.round(1 / speed);
    // 0.4, 0.6 and 0.8 are not unit fractions; photographers write them as decimals.
    if (Math.abs(1 / denominator - speed) > 1e-9) {
      return speed.toFixed(1);
    }
    return `1/${denominator}`;
  }
  return Number.isInteger(speed) ? String(speed) : speed.toFixed(1);
}

/**
 * Normalize an exposure time to the conventional shutter-speed notation.
 *
 * Accepts seconds as a number, a numeric string or a `num/den` string.
 * Values within 10% of a standard speed snap to it (`0.0005` → `"1/2000"`,
 * `2` → `"2"`); others fall back to a reduced fraction below one second and a
 * one-decimal string above. Missing or non-numeric input gives `"N/A"`.
 */
export function normalizeShutterSpeed(value: number | string | null | undefined): string {
  if (value === null || value === undefined) {
    return SHUTTER_NOT_AVAILABLE;
  }
  const seconds = toSeconds(value);
  if (seconds === null || seconds <= 0) {
    return SHUTTER_NOT_AVAILABLE;
  }

  let closest = STANDARD_SHUTTER_SPEEDS[0];
  for (const speed of STANDARD_SHUTTER_SPEEDS) {
    if (Math.abs(speed - seconds) < Math.abs(closest - seconds)) {
      closest = speed;
    }
  }
  if (Math.abs(closest - seconds) / seconds < SNAP_TOLERANCE) {
    return formatStandard(closest);
  }

  if (seconds >= 1) {
    return Number.isInteger(seconds) ? String(seconds) : seconds.toFixed(1);
  }
  const numerator = Math.trunc(seconds * FRACTION_PRECISION);
  const divisor = gcd(numerator, FRACTION_PRECISION);
  return `${numerator / divisor}/${FRACTION_PRECISION / divisor}`;
}
