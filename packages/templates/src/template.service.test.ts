import test from "node:test";
import assert from "node:assert/strict";
import { NotFoundError, ValidationError, updateFieldOrder, updateFieldValue } from "@nodeplate/engine";
import { createCatalogService } from "./catalog.service.js";
import { createStyleService } from "./style.service.js";
import { createTemplateService } from "./template.service.js";
import { createMemoryStore } from "./stores/memory-store.js";

const SCENARIO =
  '{"N1":{"inputs":{"prompt":"%prompt%"},"class_type":"CLIPTextEncode"},' +
  '"N2":{"inputs":{"steps":20},"class_type":"KSampler"}}';

async function setup() {
  const store = createMemoryStore();
  const catalog = createCatalogService(store, { ttlMs: 30_000 });
  const styles = createStyleService(store, { ttlMs: 30_000 });
  const templates = createTemplateService(store, catalog, styles);
  await templates.importDocument("scenario", SCENARIO);
  return { store, catalog, styles, templates };
}

test("imports a document and keeps the first content as the original", async () => {
  const { templates } = await setup();

  const document = await templates.getDocument("scenario");
  assert.equal(document.content, SCENARIO);
  assert.equal(document.originalContent, SCENARIO);
  assert.deepEqual(
    (await templates.listDocuments()).map((summary) => summary.id),
    ["scenario"]
  );
});

test("rejects malformed documents and blank ids", async () => {
  const { templates } = await setup();

  await assert.rejects(templates.importDocument("broken", "{"), ValidationError);
  await assert.rejects(templates.importDocument("  ", SCENARIO), ValidationError);
  assert.equal((await templates.listDocuments()).length, 1);
});

test("reports missing documents", async () => {
  const { templates } = await setup();

  await assert.rejects(templates.getDocument("missing"), NotFoundError);
  await assert.rejects(templates.loadFields("missing"), NotFoundError);
  await assert.rejects(templates.render("missing"), NotFoundError);
});

test("loads the bound prompt and the literal step count", async () => {
  const { templates } = await setup();

  const { fields } = await templates.loadFields("scenario");

  assert.deepEqual(
    fields.map((field) => [field.nodeId, field.inputName, field.placeholder, field.storedValue]),
    [
      ["N1", "prompt", "prompt", ""],
      ["N2", "steps", "", 20],
    ]
  );
});

test("saves edited fields with their settings", async () => {
  const { templates } = await setup();
  const { fields } = await templates.loadFields("scenario");

  const result = await templates.saveFields("scenario", updateFieldValue(fields, 1, "30"));

  assert.deepEqual(result.settings, {
    placeholders: {},
    fields: { "1!N1|prompt": null, "2!N2|steps": 30 },
  });
  assert.deepEqual(await templates.getSettings("scenario"), result.settings);

  const reloaded = await templates.loadFields("scenario");
  assert.equal(reloaded.fields[1]?.storedValue, 30);
  assert.equal(reloaded.fields[1]?.textValue, "30");
});

test("writes nothing when a value does not parse", async () => {
  const { templates, store } = await setup();
  const { fields } = await templates.loadFields("scenario");

  await assert.rejects(
    templates.saveFields("scenario", updateFieldValue(fields, 1, "twenty")),
    (err: unknown) =>
      err instanceof ValidationError &&
      err.issues.length === 1 &&
      err.issues[0] === "N2 → steps: Enter a valid integer"
  );
  assert.equal((await templates.getDocument("scenario")).content, SCENARIO);
  assert.equal(await store.getSettings("scenario"), null);
});

test("writes nothing when two nodes share a row number", async () => {
  const { templates, store } = await setup();
  const { fields } = await templates.loadFields("scenario");

  const clashing = updateFieldOrder(updateFieldOrder(fields, 0, 3), 1, 3);

  await assert.rejects(templates.saveFields("scenario", clashing), ValidationError);
  assert.equal(await store.getSettings("scenario"), null);
});

test("renders with overrides, stored defaults and styles", async () => {
  const { templates, styles } = await setup();
  await templates.savePlaceholderDefaults("scenario", [
    { name: "prompt", valueType: "text", value: "a cat" },
  ]);
  await styles.save({ name: "photo", pre: "photo of", post: "4k" });

  const withDefault = await templates.render("scenario");
  assert.deepEqual(withDefault.graph.nodes[0]?.inputs[0]?.value, { kind: "text", value: "a cat" });

  const overridden = await templates.render("scenario", { prompt: "a dog" });
  assert.equal(
    overridden.text,
    '{"N1":{"inputs":{"prompt":"a dog"},"class_type":"CLIPTextEncode"},' +
      '"N2":{"inputs":{"steps":20},"class_type":"KSampler"}}'
  );

  const styled = await templates.render("scenario", { prompt: "a dog" }, { style: "photo" });
  assert.deepEqual(styled.graph.nodes[0]?.inputs[0]?.value, {
    kind: "text",
    value: "photo of a dog, 4k",
  });

  const unknownStyle = await templates.render("scenario", { prompt: "a dog" }, { style: "gone" });
  assert.deepEqual(unknownStyle.graph.nodes[0]?.inputs[0]?.value, { kind: "text", value: "a dog" });
});

test("summarizes and validates placeholder defaults", async () => {
  const { templates } = await setup();

  await templates.savePlaceholderDefaults("scenario", [
    { name: "prompt", valueType: "text", value: "a cat" },
  ]);
  assert.deepEqual(await templates.getPlaceholderDefaults("scenario"), [
    {
      name: "prompt",
      valueType: "text",
      nodeTitles: ["N1"],
      inputNames: ["prompt"],
      value: "a cat",
      order: 1,
    },
  ]);

  await assert.rejects(
    templates.savePlaceholderDefaults("scenario", [
      { name: "steps", valueType: "integer", value: "lots" },
    ]),
    (err: unknown) =>
      err instanceof ValidationError && err.issues[0] === "`steps`: Enter a valid integer"
  );
  assert.deepEqual((await templates.getSettings("scenario")).placeholders, { prompt: "a cat" });
});

test("detects which catalog placeholders a document uses", async () => {
  const { templates } = await setup();

  const usage = await templates.detectPlaceholders("scenario");
  assert.equal(usage["prompt"], true);
  assert.equal(usage["seed"], false);
});

test("restores the original content after saving", async () => {
  const { templates } = await setup();
  const { fields } = await templates.loadFields("scenario");
  await templates.saveFields("scenario", updateFieldValue(fields, 1, "30"));
  assert.notEqual((await templates.getDocument("scenario")).content, SCENARIO);

  const restored = await templates.restoreOriginal("scenario");

  assert.equal(restored.content, SCENARIO);
});

test("deletes documents with their settings", async () => {
  const { templates, store } = await setup();
  await templates.savePlaceholderDefaults("scenario", [
    { name: "prompt", valueType: "text", value: "a cat" },
  ]);

  await templates.deleteDocument("scenario");

  assert.deepEqual(await templates.listDocuments(), []);
  assert.equal(await store.getSettings("scenario"), null);
  await assert.rejects(templates.deleteDocument("scenario"), NotFoundError);
});
