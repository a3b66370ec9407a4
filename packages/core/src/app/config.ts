/**
 * packages/core/src/app/config.ts — App configuration defaults and validation.
 */

import { SprigError } from "../errors.js";
import { DEFAULT_DEFERRED_ATTRIBUTES } from "../runtime/apply.js";
import { DEFAULT_VOLATILE_ATTRIBUTES } from "../runtime/diff.js";
import type { AppConfig, ResolvedAppConfig } from "./types.js";

const DEFAULT_CONFIG: ResolvedAppConfig = Object.freeze({
  volatileAttributes: new Set(DEFAULT_VOLATILE_ATTRIBUTES),
  deferredAttributes: new Set(DEFAULT_DEFERRED_ATTRIBUTES),
  skipNoopPatches: true,
  onFatal: null,
});

function invalidConfig(detail: string): never {
  throw new SprigError("SPRIG_INVALID_CONFIG", detail);
}

function requireNameList(name: string, v: unknown): ReadonlySet<string> {
  if (!Array.isArray(v)) invalidConfig(`${name} must be an array of attribute names`);
  const list: readonly unknown[] = v;
  const out = new Set<string>();
  for (const entry of list) {
    if (typeof entry !== "string" || entry.length === 0) {
      invalidConfig(`${name} must contain only non-empty strings`);
    }
    out.add(entry);
  }
  return out;
}

/** Apply defaults to user-provided config, validating all values. */
export function resolveAppConfig(config: AppConfig | undefined): ResolvedAppConfig {
  if (!config) return DEFAULT_CONFIG;
  const volatileAttributes =
    config.volatileAttributes === undefined
      ? DEFAULT_CONFIG.volatileAttributes
      : requireNameList("volatileAttributes", config.volatileAttributes);
  const deferredAttributes =
    config.deferredAttributes === undefined
      ? DEFAULT_CONFIG.deferredAttributes
      : requireNameList("deferredAttributes", config.deferredAttributes);
  if (config.skipNoopPatches !== undefined && typeof config.skipNoopPatches !== "boolean") {
    invalidConfig("skipNoopPatches must be a boolean");
  }
  const skipNoopPatches = config.skipNoopPatches ?? DEFAULT_CONFIG.skipNoopPatches;
  if (config.onFatal !== undefined && typeof config.onFatal !== "function") {
    invalidConfig("onFatal must be a function");
  }
  return {
    volatileAttributes,
    deferredAttributes,
    skipNoopPatches,
    onFatal: config.onFatal ?? null,
  };
}
