import { assert, describe, test } from "@sprig-ui/testkit";
import type { EventHandlerSpec } from "../../tree/items.js";
import { deepEqualUnknown, handlerSpecsEqual } from "../equality.js";

describe("deepEqualUnknown", () => {
  test("compares plain data structurally", () => {
    assert.equal(deepEqualUnknown({ a: [1, { b: "x" }] }, { a: [1, { b: "x" }] }), true);
    assert.equal(deepEqualUnknown({ a: 1 }, { a: 1, b: undefined }), false);
    assert.equal(deepEqualUnknown([1, 2], { 0: 1, 1: 2 }), false);
    assert.equal(deepEqualUnknown(null, {}), false);
    assert.equal(deepEqualUnknown("1", 1), false);
  });

  test("objects with different prototypes differ", () => {
    assert.equal(deepEqualUnknown(new Map(), {}), false);
  });
});

describe("handlerSpecsEqual", () => {
  const convert = (event: unknown): string | undefined => String(event);

  test("message handlers compare messages", () => {
    const a: EventHandlerSpec<{ id: number }> = { kind: "message", message: { id: 1 } };
    assert.equal(handlerSpecsEqual(a, { kind: "message", message: { id: 1 } }), true);
    assert.equal(handlerSpecsEqual(a, { kind: "message", message: { id: 2 } }), false);
  });

  test("conversion handlers compare function identity", () => {
    assert.equal(
      handlerSpecsEqual<string>({ kind: "event", convert }, { kind: "event", convert }),
      true,
    );
    assert.equal(
      handlerSpecsEqual<string>(
        { kind: "event", convert },
        { kind: "event", convert: (event) => String(event) },
      ),
      false,
    );
  });

  test("different kinds differ", () => {
    assert.equal(
      handlerSpecsEqual<string>(
        { kind: "inputValue", convert: (value) => value },
        { kind: "event", convert },
      ),
      false,
    );
  });
});
