import { InvalidArgumentError } from "commander";

function toInteger(value: string): number {
  return value.trim() === "" ? Number.NaN : Number(value);
}

export function parsePositiveInteger(value: string): number {
  const parsed = toInteger(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

export function parseNonNegativeInteger(value: string): number {
  const parsed = toInteger(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Must be zero or a positive integer.");
  }
  return parsed;
}
