import test from "node:test";
import assert from "node:assert/strict";
import { coerce, coercePlaceholderDefault, isPlaceholderToken } from "./coercion.js";
import { ParseError } from "./errors.js";

test("passes text through unchanged", () => {
  assert.deepEqual(coerce("  hello ", "text"), { success: true, value: "  hello " });
  assert.deepEqual(coerce(12, "text"), { success: true, value: "12" });
});

test("parses integers", () => {
  assert.deepEqual(coerce(" 42 ", "integer"), { success: true, value: 42 });
  assert.deepEqual(coerce("-3", "integer"), { success: true, value: -3 });
  assert.deepEqual(coerce(7, "integer"), { success: true, value: 7 });
});

test("rejects non-integer text for integer fields", () => {
  for (const input of ["abc", "1.5", "", "1e3"]) {
    const result = coerce(input, "integer");
    assert.equal(result.success, false, input);
    if (!result.success) {
      assert.ok(result.error instanceof ParseError);
      assert.equal(result.error.message, "Enter a valid integer");
      assert.equal(result.error.details.valueType, "integer");
    }
  }
});

test("keeps integers beyond the safe range exact as bigint", () => {
  assert.deepEqual(coerce("123456789012345678901", "integer"), {
    success: true,
    value: 123456789012345678901n,
  });
  assert.deepEqual(coerce(" -18446744073709551615 ", "integer"), {
    success: true,
    value: -18446744073709551615n,
  });
  assert.deepEqual(coerce(18446744073709551615n, "integer"), {
    success: true,
    value: 18446744073709551615n,
  });
  assert.deepEqual(coerce(9007199254740993n, "float"), { success: true, value: 9007199254740992 });
});

test("reads integral decimal text as a float", () => {
  assert.deepEqual(coerce("3.0", "float"), { success: true, value: 3 });
});

test("parses floats including exponent forms", () => {
  assert.deepEqual(coerce("7.5", "float"), { success: true, value: 7.5 });
  assert.deepEqual(coerce(".5", "float"), { success: true, value: 0.5 });
  assert.deepEqual(coerce("1e2", "float"), { success: true, value: 100 });
  assert.deepEqual(coerce(3, "float"), { success: true, value: 3 });
});

test("rejects non-numeric text for float fields", () => {
  const result = coerce("seven", "float");
  assert.equal(result.success, false);
  if (!result.success) {
    assert.equal(result.error.message, "Enter a valid number");
  }
});

test("labels errors attached to a field", () => {
  const result = coerce("x", "integer");
  assert.equal(result.success, false);
  if (!result.success) {
    const labelled = result.error.forField("KSampler → steps");
    assert.equal(labelled.message, "KSampler → steps: Enter a valid integer");
    assert.equal(labelled.details.input, "x");
  }
});

test("clears empty numeric placeholder defaults", () => {
  assert.deepEqual(coercePlaceholderDefault("seed", "", "integer"), { success: true, value: null });
  assert.deepEqual(coercePlaceholderDefault("cfg", null, "float"), { success: true, value: null });
  assert.deepEqual(coercePlaceholderDefault("prompt", null, "text"), { success: true, value: "" });
});

test("names the placeholder in default coercion errors", () => {
  const result = coercePlaceholderDefault("steps", "many", "integer");
  assert.equal(result.success, false);
  if (!result.success) {
    assert.equal(result.error.message, "`steps`: Enter a valid integer");
  }
});

test("recognizes placeholder tokens", () => {
  assert.equal(isPlaceholderToken("%seed%"), true);
  assert.equal(isPlaceholderToken(" %seed% "), true);
  assert.equal(isPlaceholderToken("%"), false);
  assert.equal(isPlaceholderToken("50%"), false);
  assert.equal(isPlaceholderToken(42), false);
});
