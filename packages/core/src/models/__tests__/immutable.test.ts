import { createHash } from "node:crypto";
import { describe, expect, it } from "vitest";
import { z } from "zod";
import { ValidationError } from "../../errors.ts";
import { createForumTrees } from "../../storage/trees.ts";
import { Freeform, Immutable, type FieldSchema } from "../immutable.ts";
import { Message } from "../message.ts";

interface SampleFields {
  readonly someReqField: string;
  readonly someOptField?: number;
  readonly subImmutable?: SampleImmutable;
}

class SampleImmutable extends Immutable {
  declare readonly someReqField: string;
  declare readonly someOptField: number;
  declare readonly subImmutable: SampleImmutable | undefined;

  constructor(fields: SampleFields) {
    super({ someOptField: 2, ...fields });
  }

  protected fieldSchema(): FieldSchema {
    return SampleSchema;
  }
}

const SampleSchema: FieldSchema = z
  .object({
    someReqField: z.string(),
    someOptField: z.number(),
    subImmutable: z.instanceof(SampleImmutable).optional(),
  })
  .strict();

function sha256(text: string): string {
  return createHash("sha256").update(text, "utf8").digest("hex");
}

describe("Immutable", () => {
  it("hashes the sorted-key encoding of its fields", () => {
    const sample = new SampleImmutable({
      someReqField: "test",
      subImmutable: new SampleImmutable({ someReqField: "юнікод", someOptField: 3 }),
    });

    expect(sample.hashKey).toBe(
      sha256('{"someOptField":2,"someReqField":"test","subImmutable":{"someOptField":3,"someReqField":"юнікод"}}')
    );
  });

  it("gives equal values equal hash keys", () => {
    const first = new SampleImmutable({ someReqField: "same" });
    const second = new SampleImmutable({ someReqField: "same", someOptField: 2 });
    const third = new SampleImmutable({ someReqField: "same", someOptField: 7 });

    expect(second.hashKey).toBe(first.hashKey);
    expect(third.hashKey).not.toBe(first.hashKey);
  });

  it("cannot be changed after construction", () => {
    const sample = new SampleImmutable({ someReqField: "fixed" });

    expect(Object.isFrozen(sample)).toBe(true);
    expect(() => Object.assign(sample, { someReqField: "changed" })).toThrow(TypeError);
    expect(sample.someReqField).toBe("fixed");
  });

  it("keeps nested immutable values by reference", () => {
    const nested = new SampleImmutable({ someReqField: "inner" });
    const sample = new SampleImmutable({ someReqField: "outer", subImmutable: nested });

    expect(sample.subImmutable).toBe(nested);
    expect(sample.asDict).toEqual({
      someReqField: "outer",
      someOptField: 2,
      subImmutable: { someReqField: "inner", someOptField: 2 },
    });
  });

  it("reports schema violations as validation errors", () => {
    const trees = createForumTrees();
    let caught: unknown;
    try {
      new Message(trees, { content: "hi", senderAlias: "USER", imModel: "call" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ model: "Message", field: "imModel" });
  });

  it("rejects fields that clash with its own members", () => {
    expect(() => new Freeform({ hashKey: "forged" })).toThrow(
      "`hashKey` is reserved and cannot be used as a field of Freeform"
    );
  });
});

describe("Freeform", () => {
  it("turns plain objects into nested freeform values and freezes arrays", () => {
    const value = new Freeform({ nested: { a: 1 }, list: [1, { b: 2 }] });

    expect(value.get("nested")).toBeInstanceOf(Freeform);
    expect(Object.isFrozen(value.get("list"))).toBe(true);
    expect(value.asDict).toEqual({ nested: { a: 1 }, list: [1, { b: 2 }] });
  });

  it("hashes its model name but leaves it out of the presentation", () => {
    const value = new Freeform({ a: 1 });

    expect(value.hashPayload()).toEqual({ imModel: "freeform", a: 1 });
    expect(value.asDict).toEqual({ a: 1 });
    expect(value.hashKey).toBe(sha256('{"a":1,"imModel":"freeform"}'));
  });

  it("rejects values that are not plain data", () => {
    expect(() => new Freeform({ when: new Date(0) })).toThrow(
      "only {null, string, number, boolean, array, Freeform} are allowed as field values in Freeform, got Date in `when`"
    );
  });

  it("rejects immutable values of other models", () => {
    const sample = new SampleImmutable({ someReqField: "typed" });

    expect(() => new Freeform({ sample })).toThrow(
      "only {null, string, number, boolean, array, Freeform} are allowed as field values in Freeform, got SampleImmutable in `sample`"
    );
  });

  it("rejects numbers that have no JSON encoding", () => {
    expect(() => new Freeform({ ratio: Number.NaN })).toThrow(ValidationError);
  });

  it("skips undefined fields", () => {
    const value = new Freeform({ present: "yes", absent: undefined });

    expect(value.asDict).toEqual({ present: "yes" });
    expect(value.hashKey).toBe(new Freeform({ present: "yes" }).hashKey);
  });
});
