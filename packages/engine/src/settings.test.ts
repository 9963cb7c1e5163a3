import test from "node:test";
import assert from "node:assert/strict";
import { parseTemplateSettings, serializeTemplateSettings } from "./settings.js";

test("splits placeholder defaults from the reserved field map", () => {
  const settings = parseTemplateSettings({
    prompt: "a cat",
    seed: 42,
    broken: { nested: true },
    __fields: { "1!6|text": "a cat", "2!3|seed": null, "2!3|bad": [1] },
  });

  assert.deepEqual(settings, {
    placeholders: { prompt: "a cat", seed: 42 },
    fields: { "1!6|text": "a cat", "2!3|seed": null },
  });
});

test("reads unusable payloads as empty settings", () => {
  assert.deepEqual(parseTemplateSettings(null), { placeholders: {}, fields: {} });
  assert.deepEqual(parseTemplateSettings([1, 2]), { placeholders: {}, fields: {} });
  assert.deepEqual(parseTemplateSettings({ __fields: "nope" }), { placeholders: {}, fields: {} });
});

test("writes the field map under the reserved key", () => {
  assert.deepEqual(
    serializeTemplateSettings({ placeholders: { cfg: 7.5 }, fields: { "1!3|cfg": 7.5 } }),
    { cfg: 7.5, __fields: { "1!3|cfg": 7.5 } }
  );
});

test("writes integers beyond the safe range as decimal text", () => {
  assert.deepEqual(
    serializeTemplateSettings({
      placeholders: { seed: 18446744073709551615n },
      fields: { "1!3|seed": 18446744073709551615n, "1!3|steps": null },
    }),
    { seed: "18446744073709551615", __fields: { "1!3|seed": "18446744073709551615", "1!3|steps": null } }
  );
});

test("stores a placeholder named __proto__ as an own entry", () => {
  const settings = parseTemplateSettings(JSON.parse('{"__proto__":"x","__fields":{}}'));
  assert.equal(Object.getPrototypeOf(settings.placeholders), Object.prototype);
  assert.deepEqual(Object.entries(settings.placeholders), [["__proto__", "x"]]);
});
