import { z } from "zod";
import { ConversionError, describeValue } from "./errors";
import {
  typeTagName,
  type AnyTypeTagValue,
  type RecordTag,
  type RgbaColor,
  type TypeTag,
  type Vector3,
} from "./type-tags";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type DecodeResult<T> = { ok: true; value: T } | { ok: false; error: ConversionError };

export type EncodeResult = { ok: true; value: JsonValue } | { ok: false; error: ConversionError };

/** How String and record commands treat an envelope without `parameters`. */
export type AbsentParameters = "null" | "reject";

export type DecodeOptions = {
  absentParameters?: AbsentParameters;
};

const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;
const FLOAT32_MAX = 3.4028234663852886e38;

const Int32Schema = z.number().int().min(INT32_MIN).max(INT32_MAX);
const Float32Schema = z
  .number()
  .finite()
  .refine((value) => Math.abs(value) <= FLOAT32_MAX, {
    message: "Number exceeds single-precision range",
  });

// Scalar wrappers accept exactly their own fields; records are the only open shape.
const IntParameterSchema = z.object({ value: Int32Schema }).strict();
const FloatParameterSchema = z.object({ value: Float32Schema }).strict();
const StringParameterSchema = z.object({ value: z.string() }).strict();
const Vector3ParameterSchema = z
  .object({ x: Float32Schema, y: Float32Schema, z: Float32Schema })
  .strict();
const ColorParameterSchema = z
  .object({
    r: Float32Schema,
    g: Float32Schema,
    b: Float32Schema,
    a: Float32Schema.default(1),
  })
  .strict();

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isObjectRef(value: unknown): value is object {
  return typeof value === "object" && value !== null;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    )
    .join("; ");
}

function conversionFailure(tag: TypeTag, value: unknown, error: z.ZodError): ConversionError {
  const typeName = typeTagName(tag);
  return new ConversionError(
    typeName,
    value,
    `Invalid ${typeName} parameters ${describeValue(value)}: ${formatIssues(error)}`,
  );
}

function fail<T>(error: ConversionError): DecodeResult<T> {
  return { ok: false, error };
}

function parseWith<T, R>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  tag: TypeTag,
  value: unknown,
  map: (parsed: T) => R,
): DecodeResult<R> {
  const result = schema.safeParse(value);
  if (!result.success) {
    return fail(conversionFailure(tag, value, result.error));
  }
  return { ok: true, value: map(result.data) };
}

/** Strip wrappers that do not change the structural shape of a field. */
function unwrapSchema(schema: z.ZodTypeAny): z.ZodTypeAny {
  let current = schema;
  for (;;) {
    if (current instanceof z.ZodOptional || current instanceof z.ZodNullable) {
      current = current.unwrap();
    } else if (current instanceof z.ZodDefault) {
      current = current.removeDefault();
    } else if (current instanceof z.ZodLazy) {
      current = current.schema;
    } else if (current instanceof z.ZodEffects) {
      current = current.innerType();
    } else {
      return current;
    }
  }
}

/**
 * Zero value used for a record field missing from the payload.
 * `objectsInProgress` stops required self-references from expanding forever.
 */
function zeroValue(schema: z.ZodTypeAny, objectsInProgress: Set<z.ZodTypeAny>): unknown {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodDefault) {
    return undefined;
  }
  if (schema instanceof z.ZodNullable) {
    return null;
  }
  if (schema instanceof z.ZodLazy) {
    return zeroValue(schema.schema, objectsInProgress);
  }
  if (schema instanceof z.ZodEffects) {
    return zeroValue(schema.innerType(), objectsInProgress);
  }
  if (schema instanceof z.ZodNumber) {
    return 0;
  }
  if (schema instanceof z.ZodString) {
    return "";
  }
  if (schema instanceof z.ZodBoolean) {
    return false;
  }
  if (schema instanceof z.ZodArray) {
    return [];
  }
  if (schema instanceof z.ZodRecord) {
    return {};
  }
  if (schema instanceof z.ZodEnum) {
    return schema.options[0];
  }
  if (schema instanceof z.ZodLiteral) {
    return schema.value;
  }
  if (schema instanceof z.ZodObject) {
    if (objectsInProgress.has(schema)) {
      return undefined;
    }
    objectsInProgress.add(schema);
    const zero: Record<string, unknown> = {};
    for (const [key, fieldSchema] of Object.entries<z.ZodTypeAny>(schema.shape)) {
      zero[key] = zeroValue(fieldSchema, objectsInProgress);
    }
    objectsInProgress.delete(schema);
    return zero;
  }
  return undefined;
}

/**
 * Reshape a payload field by field against the schema before validation:
 * unknown fields are dropped, missing fields get zero values, and any object
 * already on the current path is treated as visited and truncated.
 */
function prepareField(value: unknown, schema: z.ZodTypeAny, ancestors: Set<object>): unknown {
  if (value === undefined || (isObjectRef(value) && ancestors.has(value))) {
    return zeroValue(schema, new Set());
  }
  const inner = unwrapSchema(schema);
  if (inner instanceof z.ZodObject && isRecord(value)) {
    return prepareObject(value, inner, ancestors);
  }
  if (inner instanceof z.ZodArray && Array.isArray(value)) {
    ancestors.add(value);
    const items: unknown[] = [];
    for (const item of value) {
      if (isObjectRef(item) && ancestors.has(item)) {
        continue;
      }
      items.push(prepareField(item, inner.element, ancestors));
    }
    ancestors.delete(value);
    return items;
  }
  return value;
}

function prepareObject(
  value: Record<string, unknown>,
  schema: z.AnyZodObject,
  ancestors: Set<object>,
): Record<string, unknown> {
  ancestors.add(value);
  const prepared: Record<string, unknown> = {};
  for (const [key, fieldSchema] of Object.entries<z.ZodTypeAny>(schema.shape)) {
    prepared[key] = prepareField(value[key], fieldSchema, ancestors);
  }
  ancestors.delete(value);
  return prepared;
}

function decodeRecord(value: unknown, tag: RecordTag): DecodeResult<AnyTypeTagValue> {
  if (!isRecord(value)) {
    return fail(
      new ConversionError(
        tag.name,
        value,
        `Invalid ${tag.name} parameters ${describeValue(value)}: Expected object`,
      ),
    );
  }
  const result = tag.schema.safeParse(prepareObject(value, tag.schema, new Set()));
  if (!result.success) {
    return fail(conversionFailure(tag, value, result.error));
  }
  return { ok: true, value: result.data };
}

/**
 * Convert a JSON `parameters` payload into the value a handler declared.
 * Never coerces across JSON kinds; every failure carries the target type name
 * and the offending payload.
 */
export function decodeParameters(
  parameters: unknown,
  tag: TypeTag,
  options: DecodeOptions = {},
): DecodeResult<AnyTypeTagValue> {
  const typeName = typeTagName(tag);
  if (parameters === undefined || parameters === null) {
    const nullable = tag.kind === "string" || tag.kind === "record";
    if (nullable && (options.absentParameters ?? "null") === "null") {
      return { ok: true, value: null };
    }
    return fail(
      new ConversionError(typeName, parameters, `Parameters required for type ${typeName}`),
    );
  }

  switch (tag.kind) {
    case "int32":
      return parseWith(IntParameterSchema, tag, parameters, (parsed) => parsed.value);
    case "float32":
      return parseWith(FloatParameterSchema, tag, parameters, (parsed) => parsed.value);
    case "string":
      return parseWith(StringParameterSchema, tag, parameters, (parsed) => parsed.value);
    case "vector3":
      return parseWith(
        Vector3ParameterSchema,
        tag,
        parameters,
        (parsed): Vector3 => ({ x: parsed.x, y: parsed.y, z: parsed.z }),
      );
    case "rgba":
      return parseWith(
        ColorParameterSchema,
        tag,
        parameters,
        (parsed): RgbaColor => ({ r: parsed.r, g: parsed.g, b: parsed.b, a: parsed.a }),
      );
    case "record":
      return decodeRecord(parameters, tag);
  }
}

function toJson(
  value: unknown,
  schema: z.ZodTypeAny | undefined,
  ancestors: Set<object>,
): JsonValue | undefined {
  if (value === null) {
    return null;
  }
  if (typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (!isObjectRef(value) || ancestors.has(value)) {
    // Functions, symbols, undefined and reference loops are left out, as JSON.stringify does
    return undefined;
  }
  const inner = schema ? unwrapSchema(schema) : undefined;
  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      const element = inner instanceof z.ZodArray ? inner.element : undefined;
      const items: JsonValue[] = [];
      for (const item of value) {
        if (isObjectRef(item) && ancestors.has(item)) {
          continue;
        }
        items.push(toJson(item, element, ancestors) ?? null);
      }
      return items;
    }
    const source: Record<string, unknown> = { ...value };
    const result: { [key: string]: JsonValue } = {};
    if (inner instanceof z.ZodObject) {
      for (const [key, fieldSchema] of Object.entries<z.ZodTypeAny>(inner.shape)) {
        const encoded = toJson(source[key], fieldSchema, ancestors);
        if (encoded !== undefined) {
          result[key] = encoded;
        }
      }
      return result;
    }
    const valueSchema = inner instanceof z.ZodRecord ? inner.element : undefined;
    for (const [key, fieldValue] of Object.entries(source)) {
      const encoded = toJson(fieldValue, valueSchema, ancestors);
      if (encoded !== undefined) {
        result[key] = encoded;
      }
    }
    return result;
  } finally {
    ancestors.delete(value);
  }
}

function encodeWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  tag: TypeTag,
  value: unknown,
  map: (parsed: T) => JsonValue,
): EncodeResult {
  const result = schema.safeParse(value);
  if (!result.success) {
    return { ok: false, error: conversionFailure(tag, value, result.error) };
  }
  return { ok: true, value: map(result.data) };
}

/**
 * Produce the wire shape for a typed value. Record properties that would
 * close a reference loop are omitted.
 */
export function encodeValue(value: unknown, tag: TypeTag): EncodeResult {
  switch (tag.kind) {
    case "int32":
      return encodeWith(Int32Schema, tag, value, (parsed) => ({ value: parsed }));
    case "float32":
      return encodeWith(Float32Schema, tag, value, (parsed) => ({ value: parsed }));
    case "string":
      return encodeWith(z.string(), tag, value, (parsed) => ({ value: parsed }));
    case "vector3":
      return encodeWith(Vector3ParameterSchema.strip(), tag, value, (parsed) => ({
        x: parsed.x,
        y: parsed.y,
        z: parsed.z,
      }));
    case "rgba":
      return encodeWith(ColorParameterSchema.strip(), tag, value, (parsed) => ({
        r: parsed.r,
        g: parsed.g,
        b: parsed.b,
        a: parsed.a,
      }));
    case "record": {
      if (!isRecord(value)) {
        return {
          ok: false,
          error: new ConversionError(
            tag.name,
            value,
            `Cannot encode ${describeValue(value)} as ${tag.name}: Expected object`,
          ),
        };
      }
      return { ok: true, value: toJson(value, tag.schema, new Set()) ?? null };
    }
  }
}
