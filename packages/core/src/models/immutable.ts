import { z } from "zod";
import { ValidationError } from "../errors.ts";
import { canonicalJson, sha256Hex, type PlainValue } from "./canonical.ts";

export type Primitive = null | string | number | boolean;

/** What an immutable value may hold in a field once validated. */
export type ImmutableValue = Primitive | Immutable | readonly ImmutableValue[];

/** Input accepted for freeform fields: plain objects become `Freeform` values. */
export type FreeformInput =
  | Primitive
  | Freeform
  | readonly FreeformInput[]
  | { readonly [field: string]: FreeformInput | undefined };

/**
 * Zod schema checking the known fields of a model. Closed models use
 * `.strict()`, open ones `.passthrough()`.
 */
export type FieldSchema = z.ZodType<Record<string, unknown>, z.ZodTypeDef, unknown>;

const NO_FIELDS: ReadonlySet<string> = new Set();
const MODEL_FIELD: ReadonlySet<string> = new Set(["imModel"]);

/**
 * A frozen record whose fields are restricted, recursively, to primitives,
 * arrays and other immutable values. Its identity is the SHA-256 of its
 * canonical encoding.
 *
 * Subclasses declare their fields with `declare readonly` and must not add
 * instance fields of their own: the instance is frozen at the end of this
 * constructor.
 */
export abstract class Immutable {
  readonly #fields: ReadonlyMap<string, ImmutableValue>;
  #hashKey: string | undefined;
  #asDict: Readonly<Record<string, PlainValue>> | undefined;

  protected constructor(fields: Readonly<Record<string, unknown>>) {
    const transient = this.excludeFromHash();
    const shadowable = this.fieldAccessors();
    const semantic = new Map<string, ImmutableValue>();
    const attached: Array<[string, unknown]> = [];

    for (const [field, value] of Object.entries(fields)) {
      if (value === undefined) {
        continue;
      }
      if (field in this && !shadowable.has(field)) {
        throw new ValidationError(
          `\`${field}\` is reserved and cannot be used as a field of ${this.modelName}`,
          this.modelName,
          field
        );
      }
      if (transient.has(field)) {
        attached.push([field, value]);
        continue;
      }
      semantic.set(field, this.#validateValue(field, value));
    }

    const parsed = this.fieldSchema().safeParse(Object.fromEntries(semantic));
    if (!parsed.success) {
      throw ValidationError.fromZodError(this.modelName, parsed.error);
    }

    this.#fields = semantic;
    for (const [field, value] of semantic) {
      Object.defineProperty(this, field, { value, enumerable: true });
    }
    for (const [field, value] of attached) {
      Object.defineProperty(this, field, { value, enumerable: false });
    }
    Object.freeze(this);
  }

  get modelName(): string {
    return this.constructor.name;
  }

  /** Computed on first access. */
  get hashKey(): string {
    if (this.#hashKey === undefined) {
      this.#hashKey = sha256Hex(canonicalJson(this.hashPayload()));
    }
    return this.#hashKey;
  }

  /**
   * Presentation projection: semantic fields without the model
   * discriminator and without the fields excluded from hashing.
   */
  get asDict(): Readonly<Record<string, PlainValue>> {
    if (this.#asDict === undefined) {
      const excluded = this.excludeFromDict();
      const dict: Record<string, PlainValue> = {};
      for (const [field, value] of this.#fields) {
        if (!excluded.has(field)) {
          dict[field] = toPlain(value, (nested) => nested.asDict);
        }
      }
      this.#asDict = Object.freeze(dict);
    }
    return this.#asDict;
  }

  /** The data the hash key is computed from. */
  hashPayload(): Record<string, PlainValue> {
    const payload: Record<string, PlainValue> = {};
    for (const [field, value] of this.#fields) {
      payload[field] = toPlain(value, (nested) => nested.hashPayload());
    }
    return payload;
  }

  protected field(name: string): ImmutableValue | undefined {
    return this.#fields.get(name);
  }

  protected fieldEntries(): Array<[string, ImmutableValue]> {
    return [...this.#fields];
  }

  protected abstract fieldSchema(): FieldSchema;

  /**
   * Transient fields: attached to the instance but left out of validation,
   * hashing and presentation.
   */
  protected excludeFromHash(): ReadonlySet<string> {
    return NO_FIELDS;
  }

  /**
   * Getters that read a field of the same name. Such a field may be set and
   * then shadows the getter.
   */
  protected fieldAccessors(): ReadonlySet<string> {
    return NO_FIELDS;
  }

  protected excludeFromDict(): ReadonlySet<string> {
    return MODEL_FIELD;
  }

  protected acceptsNested(_value: Immutable): boolean {
    return true;
  }

  protected nestedTypeName(): string {
    return "Immutable";
  }

  #validateValue(field: string, value: unknown): ImmutableValue {
    if (value === null || typeof value === "string" || typeof value === "boolean") {
      return value;
    }
    if (typeof value === "number" && Number.isFinite(value)) {
      return value;
    }
    if (Array.isArray(value)) {
      return Object.freeze(value.map((item: unknown) => this.#validateValue(field, item)));
    }
    if (value instanceof Immutable && this.acceptsNested(value)) {
      return value;
    }
    if (isPlainObject(value)) {
      return new Freeform(value);
    }
    throw new ValidationError(
      `only {null, string, number, boolean, array, ${this.nestedTypeName()}} are allowed as field values in ${this.modelName}, got ${describeType(value)} in \`${field}\``,
      this.modelName,
      field
    );
  }
}

const FreeformSchema: FieldSchema = z.object({ imModel: z.string() }).passthrough();

/**
 * Open immutable value: accepts arbitrary extra fields, whose nested
 * immutable values must themselves be `Freeform`.
 */
export class Freeform extends Immutable {
  declare readonly imModel: string;

  constructor(fields: Readonly<Record<string, unknown>> = {}) {
    super({ imModel: "freeform", ...fields });
  }

  get(field: string): ImmutableValue | undefined {
    return this.field(field);
  }

  entries(): Array<[string, ImmutableValue]> {
    return this.fieldEntries();
  }

  protected override fieldSchema(): FieldSchema {
    return FreeformSchema;
  }

  protected override acceptsNested(value: Immutable): boolean {
    return value instanceof Freeform;
  }

  protected override nestedTypeName(): string {
    return "Freeform";
  }
}

function toPlain(value: ImmutableValue, project: (nested: Immutable) => PlainValue): PlainValue {
  if (value instanceof Immutable) {
    return project(value);
  }
  if (isValueList(value)) {
    return value.map((item) => toPlain(item, project));
  }
  return value;
}

function isValueList(value: ImmutableValue): value is readonly ImmutableValue[] {
  return Array.isArray(value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object") {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function describeType(value: unknown): string {
  if (typeof value === "number") {
    return String(value);
  }
  if (typeof value === "object" && value !== null) {
    return value.constructor?.name ?? "Object";
  }
  return typeof value;
}
