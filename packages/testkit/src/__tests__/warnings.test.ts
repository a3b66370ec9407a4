import { assert, describe, test } from "../index.js";
import { captureWarnings } from "../warnings.js";

describe("captureWarnings", () => {
  test("collects warnings and restores console.warn", () => {
    const original = console.warn;
    const warnings = captureWarnings(() => {
      console.warn("first", 1);
      console.warn("second");
    });
    assert.deepEqual(warnings, ["first 1", "second"]);
    assert.equal(console.warn, original);
  });
});
