// ──────────────────────────────────────────────
// Nodeplate - Engine Constants
// ──────────────────────────────────────────────

export const FIELD_KEY_SEPARATOR = "|";
export const FIELD_ORDER_SEPARATOR = "!";
export const FIELD_ORDER_MIN = 1;
export const FIELD_ORDER_MAX = 99;

/** Reserved key of the persisted settings object holding the field map. */
export const SETTINGS_FIELDS_KEY = "__fields";

export const PLACEHOLDER_TOKEN_DELIMITER = "%";

export const DEFAULT_STYLE_NAME = "none";

// Render override a prompt style decorates
export const STYLED_PLACEHOLDER = "prompt";

// Used only when no catalog has ever been persisted
export const DEFAULT_PLACEHOLDERS: readonly string[] = [
  "prompt",
  "negative_prompt",
  "model",
  "vae",
  "sampler",
  "scheduler",
  "steps",
  "cfg",
  "denoise",
  "clip_skip",
  "width",
  "height",
  "seed",
  "img_format",
  "lora",
  "lora_1",
  "lora_2",
];
