import raw from "./presets.json";
import { createLogger } from "../lib/logger";
import {
  presetSchema,
  sessionConfigSchema,
  type Preset,
  type SessionConfig,
  type SessionConfigInput,
} from "./schema";

const log = createLogger("presets loader");

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

// Arrays and scalars from `patch` replace the base value; objects merge key by key.
export function mergeConfig(base: unknown, patch: unknown): unknown {
  if (!isPlainObject(base) || !isPlainObject(patch)) {
    return patch === undefined ? base : patch;
  }
  const out: Record<string, unknown> = { ...base };
  for (const key of Object.keys(patch)) {
    out[key] = mergeConfig(base[key], patch[key]);
  }
  return out;
}

export function loadPresets(): Preset[] {
  return presetSchema.array().parse(raw);
}

const presets = loadPresets();

export default presets;

/**
 * Resolves a named preset into a validated session configuration.
 *
 * Caller overrides are merged over the preset, which is merged over the
 * schema defaults. An unknown id falls back to the first preset.
 */
export function resolvePreset(
  id: string,
  overrides: SessionConfigInput = {}
): SessionConfig {
  let preset = presets.find((p) => p.id === id);
  if (!preset) {
    log.warn(`unknown preset '${id}', using '${presets[0]?.id ?? "defaults"}'`);
    preset = presets[0];
  }
  const merged = mergeConfig(preset?.config ?? {}, overrides);
  return sessionConfigSchema.parse(merged);
}
