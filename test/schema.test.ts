import { describe, expect, test } from "vitest";
import { defineSchema, JsonName, schemaOf, STRUCT, Tag, Validate } from "../src/schema.js";
import { Account, Address, Employee, Order, Untagged } from "./fixtures/models.js";

describe("decorators", () => {
  test("record validators and alias", () => {
    expect(schemaOf(new Address())).toEqual([
      { key: "postalCode", alias: "postal_code", validators: ["required"] },
      { key: "city", validators: ["required"] },
    ]);
  });

  test("keep the source order of stacked @Validate", () => {
    class Stacked {
      @Validate("a")
      @Validate("b", "c")
      value = "";
    }
    expect(schemaOf(new Stacked())).toEqual([
      { key: "value", validators: ["a", "b", "c"] },
    ]);
  });

  test("@Tag reads validate and json", () => {
    expect(schemaOf(new Account())).toEqual([
      { key: "accountId", alias: "account_id", validators: ["required", "numeric"] },
    ]);
  });

  test("@Tag keeps empty names from the comma list", () => {
    class Sloppy {
      @Tag('validate:"required,"')
      value = "";
    }
    expect(schemaOf(new Sloppy())?.[0]?.validators).toEqual(["required", ""]);
  });

  test('a "-" alias declares none', () => {
    class Hidden {
      @Validate("required")
      @JsonName("-")
      secret = "";
    }
    expect(schemaOf(new Hidden())?.[0]?.alias).toBeUndefined();
  });

  test("keep STRUCT in place", () => {
    expect(schemaOf(new Order())?.map((f) => f.validators)).toEqual([
      ["required"],
      ["required", STRUCT],
      ["email"],
    ]);
  });

  test("reject static members", () => {
    expect(() => {
      class Counter {
        @Validate("required")
        static total = 0;
      }
      return Counter;
    }).toThrow(TypeError);
  });
});

describe("schemaOf", () => {
  test("lists base-class fields first", () => {
    expect(schemaOf(new Employee())?.map((f) => f.key)).toEqual(["id", "workEmail"]);
  });

  test("is undefined for values without declared fields", () => {
    expect(schemaOf(new Untagged())).toBeUndefined();
    expect(schemaOf({ name: "plain" })).toBeUndefined();
    expect(schemaOf([1, 2])).toBeUndefined();
    expect(schemaOf(Object.create(null))).toBeUndefined();
    expect(schemaOf(null)).toBeUndefined();
    expect(schemaOf("text")).toBeUndefined();
  });

  test("returns frozen fields", () => {
    const fields = schemaOf(new Address());
    expect(Object.isFrozen(fields)).toBe(true);
    expect(Object.isFrozen(fields?.[0])).toBe(true);
  });
});

describe("defineSchema", () => {
  test("declares fields without decorators", () => {
    class LineItem {
      constructor(
        public sku: string,
        public qty: number,
      ) {}
    }
    defineSchema(LineItem, [
      { key: "sku", validate: "required,sku" },
      { key: "qty", validate: ["positive"], json: "quantity" },
    ]);

    expect(schemaOf(new LineItem("A-1", 2))).toEqual([
      { key: "sku", validators: ["required", "sku"] },
      { key: "qty", alias: "quantity", validators: ["positive"] },
    ]);
  });

  test("accepts a struct tag", () => {
    class Coupon {
      code = "";
    }
    defineSchema(Coupon, [{ key: "code", tag: 'validate:"required" json:"coupon_code"' }]);
    expect(schemaOf(new Coupon())).toEqual([
      { key: "code", alias: "coupon_code", validators: ["required"] },
    ]);
  });

  test("extends a schema that was already resolved", () => {
    class Draft {
      title = "";
      body = "";
    }
    defineSchema(Draft, [{ key: "title", validate: "required" }]);
    expect(schemaOf(new Draft())?.length).toBe(1);

    defineSchema(Draft, [{ key: "body", validate: "required" }]);
    expect(schemaOf(new Draft())?.map((f) => f.key)).toEqual(["title", "body"]);
  });
});
