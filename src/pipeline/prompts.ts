import fs from "fs";
import path from "path";

export type PromptName =
  | "context_analysis"
  | "scene_analysis"
  | "persona_analysis"
  | "image_result"
  | "merged_analysis"
  | "reply";

// Resolves to <repo>/prompts from both src/pipeline and dist/pipeline.
export const DEFAULT_PROMPT_DIR = path.join(__dirname, "..", "..", "prompts");

export type PromptVars = Record<string, string | number>;

export type PromptLoader = (name: PromptName) => string;

export function createPromptLoader(dir: string = DEFAULT_PROMPT_DIR): PromptLoader {
  const cache = new Map<PromptName, string>();
  return (name) => {
    const hit = cache.get(name);
    if (hit !== undefined) return hit;
    const text = fs.readFileSync(path.join(dir, `${name}.txt`), "utf8");
    cache.set(name, text);
    return text;
  };
}

/** Fills `{{var}}` placeholders. A placeholder without a value is an error. */
export function renderPrompt(template: string, vars: PromptVars): string {
  return template.replace(/\{\{\s*([a-z0-9_]+)\s*\}\}/gi, (_m, key: string) => {
    const value = vars[key];
    if (value === undefined) throw new Error(`Missing prompt variable: ${key}`);
    return String(value);
  });
}
