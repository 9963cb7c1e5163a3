import test from "node:test";
import assert from "node:assert/strict";
import type { Field } from "@nodeplate/types";
import {
  unbindField,
  updateFieldOrder,
  updateFieldPlaceholder,
  updateFieldValue,
} from "./field-editing.js";

function field(overrides: Partial<Field>): Field {
  return {
    nodeId: "3",
    nodeTitle: "KSampler",
    inputName: "seed",
    classType: "KSampler",
    valueType: "integer",
    placeholder: "",
    storedValue: 42,
    textValue: "42",
    order: 1,
    isPrimary: true,
    displayTitle: "KSampler",
    ...overrides,
  };
}

const FIELDS: Field[] = [
  field({}),
  field({ inputName: "steps", storedValue: 20, textValue: "20", isPrimary: false, displayTitle: "" }),
  field({
    nodeId: "6",
    nodeTitle: "Positive",
    inputName: "text",
    valueType: "text",
    storedValue: "a cat",
    textValue: "a cat",
    order: 2,
    displayTitle: "Positive",
  }),
];

test("updates both the text and stored value", () => {
  const next = updateFieldValue(FIELDS, 2, "a dog");
  assert.equal(next[2]?.textValue, "a dog");
  assert.equal(next[2]?.storedValue, "a dog");
  assert.equal(FIELDS[2]?.textValue, "a cat");
});

test("editing a bound field changes only its remembered value", () => {
  const bound = [field({ placeholder: "seed", textValue: "%seed%", storedValue: 42 })];
  const [next] = updateFieldValue(bound, 0, "7");
  assert.equal(next?.placeholder, "seed");
  assert.equal(next?.textValue, "%seed%");
  assert.equal(next?.storedValue, "7");
});

test("binding remembers the literal and shows the token", () => {
  const [bound] = updateFieldPlaceholder(FIELDS, 0, "seed");
  assert.equal(bound?.placeholder, "seed");
  assert.equal(bound?.textValue, "%seed%");
  assert.equal(bound?.storedValue, "42");
});

test("rebinding keeps the remembered literal", () => {
  const bound = updateFieldPlaceholder(FIELDS, 0, "seed");
  const [rebound] = updateFieldPlaceholder(bound, 0, "steps");
  assert.equal(rebound?.placeholder, "steps");
  assert.equal(rebound?.textValue, "%steps%");
  assert.equal(rebound?.storedValue, "42");
});

test("unbinding restores the last literal", () => {
  const bound = updateFieldPlaceholder(FIELDS, 0, "seed");
  const [restored] = updateFieldPlaceholder(bound, 0, "");
  assert.equal(restored?.placeholder, "");
  assert.equal(restored?.textValue, "42");
});

test("unbindField renders numeric stored values as text", () => {
  const restored = unbindField(field({ placeholder: "seed", textValue: "%seed%", storedValue: 7 }));
  assert.equal(restored.textValue, "7");
});

test("moves every field of the node to the new order", () => {
  const next = updateFieldOrder(FIELDS, 1, "5");
  assert.deepEqual(
    next.map((entry) => entry.order),
    [5, 5, 2]
  );
});

test("falls back to the row position for unreadable orders", () => {
  const next = updateFieldOrder(FIELDS, 2, "first");
  assert.equal(next[2]?.order, 3);
});

test("ignores edits outside the list", () => {
  assert.deepEqual(updateFieldValue(FIELDS, 9, "x"), FIELDS);
  assert.deepEqual(updateFieldOrder(FIELDS, -1, 3), FIELDS);
});
