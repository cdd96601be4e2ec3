/**
 * Template Engine
 *
 * `{key}` placeholders substituted in one pass; `{{` and `}}` produce
 * literal braces. Substituted values are never scanned again, so a value
 * containing `{other}` stays as written.
 */

import { readFileSync } from "fs";
import { join } from "path";
import { getConfigDir } from "../config/loader.js";
import { TemplateError } from "../types/errors.js";

export type TemplateValues = Readonly<Record<string, string | number | boolean>>;

const TOKEN = /\{\{|\}\}|\{(\w+)\}/g;

/**
 * Render a template string
 *
 * @param source - Where the template came from, for error messages
 * @throws TemplateError listing every placeholder without a value
 */
export const renderString = (
  template: string,
  values: TemplateValues,
  source?: string
): string => {
  const missing = new Set<string>();

  const rendered = template.replace(TOKEN, (token: string, key: string | undefined) => {
    if (token === "{{") return "{";
    if (token === "}}") return "}";
    if (key === undefined) return token;

    const value = values[key];
    if (value === undefined) {
      missing.add(key);
      return token;
    }
    return String(value);
  });

  if (missing.size > 0) {
    throw new TemplateError([...missing], source);
  }
  return rendered;
};

const templateCache = new Map<string, string>();

/**
 * Directory holding the bundled templates
 */
export const getTemplatesDir = (): string => join(getConfigDir(), "templates");

/**
 * Read a template by file name (cached)
 */
export const loadTemplate = (name: string, templatesDir = getTemplatesDir()): string => {
  const path = join(templatesDir, name);
  const cached = templateCache.get(path);
  if (cached !== undefined) return cached;

  const content = readFileSync(path, "utf-8");
  templateCache.set(path, content);
  return content;
};

/**
 * Render a bundled template
 */
export const renderTemplateFile = (
  name: string,
  values: TemplateValues,
  templatesDir?: string
): string => renderString(loadTemplate(name, templatesDir), values, name);
