import fs from "fs/promises";
import path from "path";
import { pathToFileURL } from "url";
import { ValidationError, errorMessage } from "../domain/errors.js";
import type { JsonValue } from "../domain/types.js";
import type { VerbDefinition, VerbRegistry } from "../domain/usecases/verbs.js";
import type { Logger } from "./logger.js";
import { jsonValueSchema, verbPluginSchema } from "./schemas.js";

const PLUGIN_EXTENSIONS = new Set([".js", ".mjs"]);

function defaultExport(mod: unknown): unknown {
  if (typeof mod === "object" && mod !== null && "default" in mod) return mod.default;
  return undefined;
}

export function toVerbDefinition(candidate: unknown, source: string): VerbDefinition {
  const parsed = verbPluginSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ValidationError(`invalid verb plugin: ${issues}`, source);
  }
  const { name, description, requiresMetadata, evaluate } = parsed.data;
  return {
    name,
    description,
    requiresMetadata,
    evaluate: (context, ...args) => {
      const result = jsonValueSchema.safeParse(evaluate(context, ...args));
      if (!result.success) throw new ValidationError(`verb @${name} returned a value that is not JSON`, source);
      const value: JsonValue = result.data;
      return value;
    },
  };
}

/**
 * Imports every `.js`/`.mjs` file in `dir` and registers its default export
 * as a verb. Broken plugins are logged and skipped. Returns the names added.
 */
export async function loadVerbPlugins(dir: string, registry: VerbRegistry, logger: Logger): Promise<string[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (e) {
    logger.err(`cannot read plugin directory ${dir}: ${errorMessage(e)}`);
    return [];
  }

  const loaded: string[] = [];
  for (const entry of entries.filter((f) => PLUGIN_EXTENSIONS.has(path.extname(f))).sort()) {
    const abs = path.resolve(dir, entry);
    try {
      const mod: unknown = await import(pathToFileURL(abs).href);
      const verb = toVerbDefinition(defaultExport(mod), abs);
      registry.register(verb);
      loaded.push(verb.name);
      logger.debug(`loaded verb @${verb.name} from ${entry}`);
    } catch (e) {
      logger.err(`skipping plugin ${entry}: ${errorMessage(e)}`);
    }
  }
  return loaded;
}
