import { InvalidArgumentError } from "commander";
import type { SourceName } from "../env";

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError("Not a positive integer.");
  return n;
}

export function parseSourceName(value: string): SourceName {
  if (value === "demo" || value === "cryptocompare") return value;
  throw new InvalidArgumentError("Expected demo or cryptocompare.");
}
