import test from "node:test";
import assert from "node:assert/strict";
import { DEFAULT_PLACEHOLDERS, NotFoundError, ValidationError } from "@nodeplate/engine";
import type { Field } from "@nodeplate/types";
import { createCatalogService } from "./catalog.service.js";
import { createMemoryStore } from "./stores/memory-store.js";

function setup() {
  const clock = { now: 10_000 };
  const store = createMemoryStore({ now: () => new Date(clock.now) });
  const options = { ttlMs: 30_000, now: () => clock.now };
  return { clock, store, options, catalog: createCatalogService(store, options) };
}

test("starts from the built-in names", async () => {
  const { catalog } = setup();

  assert.deepEqual(await catalog.snapshot(), [...DEFAULT_PLACEHOLDERS]);
  const listed = await catalog.list();
  assert.equal(listed.length, DEFAULT_PLACEHOLDERS.length);
  assert.equal(listed[0], "cfg");
});

test("persists added names and serves them immediately", async () => {
  const { catalog, store } = setup();

  await catalog.add("mood");

  assert.ok((await catalog.snapshot()).includes("mood"));
  const stored = await store.getCatalog();
  assert.deepEqual(stored, { placeholders: await catalog.snapshot() });
});

test("rejects duplicates without writing", async () => {
  const { catalog, store } = setup();

  await assert.rejects(catalog.add("seed"), ValidationError);
  assert.equal(await store.getCatalog(), null);
});

test("removing a name unbinds the given fields", async () => {
  const { catalog } = setup();
  const field: Field = {
    nodeId: "6",
    nodeTitle: "Positive",
    inputName: "text",
    classType: "CLIPTextEncode",
    valueType: "text",
    placeholder: "prompt",
    storedValue: "a cat",
    textValue: "%prompt%",
    order: 1,
    isPrimary: true,
    displayTitle: "Positive",
  };

  const result = await catalog.remove("prompt", [field]);

  assert.equal(result.unbound, 1);
  assert.equal(result.fields[0]?.textValue, "a cat");
  assert.equal((await catalog.snapshot()).includes("prompt"), false);
  await assert.rejects(catalog.remove("prompt"), NotFoundError);
});

test("picks up writes made through another service", async () => {
  const { clock, store, options, catalog } = setup();
  const other = createCatalogService(store, options);

  await catalog.snapshot();
  clock.now += 1_000;
  await other.add("mood");

  assert.ok((await catalog.snapshot()).includes("mood"));
});
