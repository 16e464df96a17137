import * as grpc from "@grpc/grpc-js";

const NAME_TO_CODE = new Map<string, number>();
const CODE_TO_NAME = new Map<number, string>();
for (const [name, code] of Object.entries(grpc.status)) {
  if (typeof code !== "number") continue;
  NAME_TO_CODE.set(name, code);
  CODE_TO_NAME.set(code, name);
}

function toUpperSnake(name: string): string {
  return name.trim().replace(/([a-z0-9])([A-Z])/g, "$1_$2").replace(/[\s-]+/g, "_").toUpperCase();
}

/**
 * Accepts a numeric code, a numeric string, or a status name in either
 * `NOT_FOUND` or `NotFound` spelling. Returns undefined when unrecognized.
 */
export function parseStatusCode(value: string | number): number | undefined {
  if (typeof value === "number") return Number.isInteger(value) ? value : undefined;
  const s = value.trim();
  if (/^\d+$/.test(s)) return Number(s);
  return NAME_TO_CODE.get(toUpperSnake(s));
}

export function statusName(code: number): string {
  return CODE_TO_NAME.get(code) ?? `CODE_${code}`;
}

// Statuses a server or proxy returns while it cannot serve yet
export const TRANSIENT_STATUS_CODES: readonly number[] = [grpc.status.UNAVAILABLE, grpc.status.DEADLINE_EXCEEDED];
