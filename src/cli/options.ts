import { InvalidArgumentError } from "commander";

/** Option parser for counts such as `--limit`; rejects fractions and trailing text. */
export function parsePositiveInt(raw: string): number {
  const value = raw.trim() === "" ? Number.NaN : Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return value;
}
