import { z } from "zod";

export type Vector3 = {
  x: number;
  y: number;
  z: number;
};

export type RgbaColor = {
  r: number;
  g: number;
  b: number;
  a: number;
};

/** Zod object schema describing a structured record parameter. */
export type RecordSchema = z.AnyZodObject;

export type Int32Tag = { readonly kind: "int32" };
export type Float32Tag = { readonly kind: "float32" };
export type StringTag = { readonly kind: "string" };
export type Vector3Tag = { readonly kind: "vector3" };
export type RgbaColorTag = { readonly kind: "rgba" };
export type RecordTag<S extends RecordSchema = RecordSchema> = {
  readonly kind: "record";
  readonly name: string;
  readonly schema: S;
};

/**
 * Closed set of parameter shapes a command can declare. The tag is supplied
 * explicitly at registration time and drives decoding at dispatch time.
 */
export type TypeTag = Int32Tag | Float32Tag | StringTag | Vector3Tag | RgbaColorTag | RecordTag;

export type TypeTagKind = TypeTag["kind"];

/**
 * Value a handler receives for a given tag. String and record commands may be
 * dispatched without parameters, so their handlers also receive `null`.
 */
export type TypeTagValue<T extends TypeTag> = T extends Int32Tag | Float32Tag
  ? number
  : T extends StringTag
    ? string | null
    : T extends Vector3Tag
      ? Vector3
      : T extends RgbaColorTag
        ? RgbaColor
        : T extends RecordTag<infer S extends RecordSchema>
          ? z.infer<S> | null
          : never;

export type AnyTypeTagValue = TypeTagValue<TypeTag>;

export const TYPE_TAG_KINDS: readonly TypeTagKind[] = [
  "int32",
  "float32",
  "string",
  "vector3",
  "rgba",
  "record",
];

function record<S extends RecordSchema>(name: string, schema: S): RecordTag<S> {
  return { kind: "record", name, schema };
}

export const TypeTags = Object.freeze({
  int32: { kind: "int32" } as const satisfies Int32Tag,
  float32: { kind: "float32" } as const satisfies Float32Tag,
  string: { kind: "string" } as const satisfies StringTag,
  vector3: { kind: "vector3" } as const satisfies Vector3Tag,
  rgba: { kind: "rgba" } as const satisfies RgbaColorTag,
  record,
});

/** Human-readable type name used in diagnostics. */
export function typeTagName(tag: TypeTag): string {
  switch (tag.kind) {
    case "int32":
      return "Int32";
    case "float32":
      return "Float32";
    case "string":
      return "String";
    case "vector3":
      return "Vector3";
    case "rgba":
      return "RgbaColor";
    case "record":
      return tag.name;
  }
}

function isRecordLike(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Runtime check for tags arriving from untyped callers such as handler modules. */
export function isTypeTag(value: unknown): value is TypeTag {
  if (!isRecordLike(value) || typeof value.kind !== "string") {
    return false;
  }
  if (value.kind === "record") {
    return (
      typeof value.name === "string" &&
      value.name.trim().length > 0 &&
      value.schema instanceof z.ZodObject
    );
  }
  return (TYPE_TAG_KINDS as readonly string[]).includes(value.kind);
}
