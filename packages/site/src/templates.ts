/**
 * HTML and markdown templates shipped in packages/site/templates
 */

import * as fs from 'fs';
import { fileURLToPath } from 'url';

export type TemplateName = 'page' | 'index' | 'sample';

const TEMPLATE_FILES: Record<TemplateName, string> = {
  page: 'page.html',
  index: 'index.html',
  sample: 'sample.md',
};

const PLACEHOLDER = /\{\{(\w+)\}\}/g;

const cache = new Map<TemplateName, string>();

/**
 * Read a template once; later calls are served from memory
 */
export function loadTemplate(name: TemplateName): string {
  const cached = cache.get(name);
  if (cached !== undefined) {
    return cached;
  }

  const url = new URL(`../templates/${TEMPLATE_FILES[name]}`, import.meta.url);
  const text = fs.readFileSync(fileURLToPath(url), 'utf-8');
  cache.set(name, text);
  return text;
}

/**
 * Substitute {{key}} placeholders in a single pass.
 * Inserted values are not rescanned; unknown keys are left as-is.
 */
export function fillTemplate(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(PLACEHOLDER, (match: string, key: string) =>
    Object.hasOwn(values, key) ? values[key] : match,
  );
}
