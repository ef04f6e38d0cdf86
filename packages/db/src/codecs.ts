import { z } from "zod";

const FLOAT32_BYTES = 4;

/** Encodes a vector as a headerless little-endian float32 array. */
export function encodeVector(vector: ArrayLike<number>): Buffer {
  const buffer = Buffer.alloc(vector.length * FLOAT32_BYTES);
  for (let i = 0; i < vector.length; i++) {
    buffer.writeFloatLE(vector[i] ?? 0, i * FLOAT32_BYTES);
  }
  return buffer;
}

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

export function decodeVector(blob: unknown, dim: unknown): DecodeResult<number[]> {
  if (!Buffer.isBuffer(blob)) {
    return { ok: false, reason: "vector is not a blob" };
  }
  if (typeof dim !== "number" || !Number.isInteger(dim) || dim <= 0) {
    return { ok: false, reason: `invalid dimension ${String(dim)}` };
  }
  if (blob.length !== dim * FLOAT32_BYTES) {
    return {
      ok: false,
      reason: `expected ${dim * FLOAT32_BYTES} bytes for dim ${dim}, got ${blob.length}`
    };
  }
  const vector = new Array<number>(dim);
  for (let i = 0; i < dim; i++) {
    vector[i] = blob.readFloatLE(i * FLOAT32_BYTES);
  }
  return { ok: true, value: vector };
}

const stringListSchema = z.array(z.string());
const idListSchema = z.array(z.number().int());
const numberListSchema = z.array(z.number().finite());

export function encodeList(values: readonly (string | number)[]): string {
  return JSON.stringify(values);
}

function decodeJsonList<T>(text: unknown, schema: z.ZodType<T>): DecodeResult<T> {
  if (typeof text !== "string") {
    return { ok: false, reason: "list column is not text" };
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { ok: false, reason: "list column is not valid JSON" };
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    return { ok: false, reason: result.error.issues[0]?.message ?? "invalid list" };
  }
  return { ok: true, value: result.data };
}

export function decodeStringList(text: unknown): DecodeResult<string[]> {
  return decodeJsonList(text, stringListSchema);
}

export function decodeIdList(text: unknown): DecodeResult<number[]> {
  return decodeJsonList(text, idListSchema);
}

export function decodeNumberList(text: unknown): DecodeResult<number[]> {
  return decodeJsonList(text, numberListSchema);
}
