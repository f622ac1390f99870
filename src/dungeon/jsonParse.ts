// Small validators shared by the JSON readers. Each throws on the first bad
// value with a message naming the offending path.

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function expectObject(v: unknown, name: string): Record<string, unknown> {
  if (!isRecord(v)) throw new Error(`Invalid ${name}: expected object`);
  return v;
}

export function expectArray(v: unknown, name: string): unknown[] {
  if (!Array.isArray(v)) throw new Error(`Invalid ${name}: expected array`);
  return v;
}

export function expectInt(v: unknown, name: string, min: number, max: number): number {
  if (typeof v !== "number" || !Number.isInteger(v) || v < min || v > max) {
    throw new Error(`Invalid ${name}: expected integer in [${min}, ${max}]`);
  }
  return v;
}

export function expectString(v: unknown, name: string): string {
  if (typeof v !== "string") throw new Error(`Invalid ${name}: expected string`);
  return v;
}

export function expectBoolean(v: unknown, name: string): boolean {
  if (typeof v !== "boolean") throw new Error(`Invalid ${name}: expected boolean`);
  return v;
}

export function expectOneOf<T extends string>(
  v: unknown,
  name: string,
  allowed: ReadonlyArray<T>,
): T {
  const hit = allowed.find((a) => a === v);
  if (hit === undefined) {
    throw new Error(`Invalid ${name}: expected one of ${allowed.join("|")}`);
  }
  return hit;
}
