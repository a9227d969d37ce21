import { InvalidArgumentError } from "commander";

/** Commander parser for a positive integer option */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

/** Commander parser for a non-negative number option */
export function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Must be a non-negative number of seconds.");
  }
  return parsed;
}

/** Commander parser for a dB level, e.g. -30 */
export function parseDecibels(value: string): number {
  const parsed = Number(value.replace(/dB$/i, ""));
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Must be a number of dB, e.g. -30.");
  }
  return parsed;
}
