import test from "node:test";
import assert from "node:assert/strict";
import { extractFields } from "./field-extractor.js";
import { applyPlaceholderDefaults, summarizePlaceholderUsage } from "./placeholder-defaults.js";

const DOCUMENT =
  '{"5":{"inputs":{"width":"%width%","height":"%height%","batch_size":1},"class_type":"EmptyLatentImage",' +
  '"_meta":{"title":"Latent"}},' +
  '"6":{"inputs":{"text":"%prompt%"},"class_type":"CLIPTextEncode","_meta":{"title":"Positive"}},' +
  '"7":{"inputs":{"text":"%prompt%, %mood%"},"class_type":"CLIPTextEncode","_meta":{"title":"Negative"}}}';

const CATALOG = ["prompt", "width", "height", "mood"];

test("summarizes every bound placeholder once in field order", () => {
  const settings = { placeholders: { width: 512, prompt: "a cat" }, fields: {} };
  const { fields } = extractFields(DOCUMENT, settings, CATALOG);

  assert.deepEqual(summarizePlaceholderUsage(fields, settings, CATALOG), [
    { name: "height", valueType: "integer", nodeTitles: ["Latent"], inputNames: ["height"], value: null, order: 1 },
    { name: "width", valueType: "integer", nodeTitles: ["Latent"], inputNames: ["width"], value: 512, order: 1 },
    { name: "prompt", valueType: "text", nodeTitles: ["Positive"], inputNames: ["text"], value: "a cat", order: 2 },
  ]);
});

test("does not bind tokens embedded in longer text", () => {
  const { fields } = extractFields(DOCUMENT, { placeholders: {}, fields: {} }, CATALOG);
  const negative = fields.find((field) => field.nodeId === "7");
  assert.equal(negative?.placeholder, "");
});

test("ignores bound names that are not in the catalog", () => {
  const settings = { placeholders: {}, fields: {} };
  const { fields } = extractFields(DOCUMENT, settings, CATALOG);
  assert.deepEqual(
    summarizePlaceholderUsage(fields, settings, ["prompt"]).map((usage) => usage.name),
    ["prompt"]
  );
});

test("applies edits and drops cleared numeric defaults", () => {
  const result = applyPlaceholderDefaults({ seed: 5, cfg: 7 }, [
    { name: "seed", valueType: "integer", value: "" },
    { name: "cfg", valueType: "float", value: "6.5" },
    { name: "prompt", valueType: "text", value: "a fox" },
  ]);

  assert.deepEqual(result.errors, []);
  assert.deepEqual(result.placeholders, { cfg: 6.5, prompt: "a fox" });
});

test("edits placeholders whose names shadow object members", () => {
  const result = applyPlaceholderDefaults({}, [
    { name: "__proto__", valueType: "text", value: "x" },
    { name: "toString", valueType: "integer", value: "3" },
  ]);

  assert.equal(Object.getPrototypeOf(result.placeholders), Object.prototype);
  assert.deepEqual(Object.entries(result.placeholders), [
    ["__proto__", "x"],
    ["toString", 3],
  ]);
});

test("collects errors for defaults of the wrong type", () => {
  const result = applyPlaceholderDefaults({}, [
    { name: "steps", valueType: "integer", value: "lots" },
    { name: "cfg", valueType: "float", value: 4 },
  ]);

  assert.deepEqual(
    result.errors.map((error) => error.message),
    ["`steps`: Enter a valid integer"]
  );
  assert.deepEqual(result.placeholders, { cfg: 4 });
});
