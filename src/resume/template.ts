import { readFileSync } from 'node:fs';

export const PLACEHOLDERS = [
  'TITLE',
  'NAME_ROW',
  'CONTACT_ROW',
  'EDUCATION_ROW',
  'EXPERIENCE_HEADER_ROW',
  'EXPERIENCE_ROWS',
  'TECHNICAL_ROW',
] as const;

export type Placeholder = (typeof PLACEHOLDERS)[number];
export type TemplateBindings = Record<Placeholder, string>;

const TOKEN_RE = /\{\{([A-Z_]+)\}\}/g;

function isPlaceholder(key: string): key is Placeholder {
  return (PLACEHOLDERS as readonly string[]).includes(key);
}

/** Reads a page template and checks that every placeholder is present. */
export function loadTemplate(path: string): string {
  const template = readFileSync(path, 'utf-8');
  const missing = PLACEHOLDERS.filter((key) => !template.includes(`{{${key}}}`));
  if (missing.length > 0) {
    throw new Error(`Template ${path} is missing placeholders: ${missing.map((k) => `{{${k}}}`).join(', ')}`);
  }
  return template;
}

/**
 * Replaces `{{KEY}}` tokens in one pass. Bound values are inserted verbatim
 * and never rescanned; tokens with no binding are left as written.
 */
export function fillTemplate(template: string, bindings: TemplateBindings): string {
  return template.replace(TOKEN_RE, (token: string, key: string) => (isPlaceholder(key) ? bindings[key] : token));
}
