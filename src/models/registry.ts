import { ConfigError } from "../adapters/errors/client-errors";
import { BUILT_IN_FAMILIES } from "./families";
import { normalizeModelName, type ModelFamily, type ModelFamilyDefinition } from "./model-family";

type CompiledFamily = {
  family: ModelFamily;
  matches: (normalizedModel: string) => boolean;
};

function toFamily(def: ModelFamilyDefinition): ModelFamily {
  const { prefixes: _prefixes, pattern: _pattern, ...family } = def;
  return Object.freeze(family);
}

function compile(def: ModelFamilyDefinition): CompiledFamily {
  const prefixes = (def.prefixes ?? []).map((p) => p.toLowerCase());
  let regex: RegExp | undefined;
  if (def.pattern) {
    try {
      regex = new RegExp(def.pattern, "i");
    } catch (err) {
      throw new ConfigError(`Model family "${def.id}" has an invalid pattern: ${def.pattern}`, { cause: err });
    }
  }
  if (prefixes.length === 0 && !regex) {
    throw new ConfigError(`Model family "${def.id}" declares neither prefixes nor a pattern`);
  }
  return {
    family: toFamily(def),
    matches: (model) => prefixes.some((p) => model.startsWith(p)) || (regex?.test(model) ?? false),
  };
}

/**
 * Resolves model names to families. Custom definitions are consulted before
 * the built-in ones, so config can override a built-in line.
 */
export class ModelFamilyRegistry {
  private readonly families: CompiledFamily[];

  constructor(custom: readonly ModelFamilyDefinition[] = [], builtIn: readonly ModelFamilyDefinition[] = BUILT_IN_FAMILIES) {
    this.families = [...custom, ...builtIn].map(compile);
  }

  find(model: string): ModelFamily | undefined {
    const normalized = normalizeModelName(model);
    return this.families.find((f) => f.matches(normalized))?.family;
  }

  resolve(model: string): ModelFamily {
    const family = this.find(model);
    if (!family) {
      throw new ConfigError(`No model family matches model "${model}"; add one under "modelFamilies"`);
    }
    return family;
  }
}
