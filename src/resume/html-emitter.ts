import { renderText, stripInvalidXmlChars } from './text.js';
import type { RenderOptions, TextEmitter } from './text.js';

export const TAB_MARKER = '<span class="tab"></span>';
export const BREAK_MARKER = '<br/>';

export function escapeHtml(text: string): string {
  return stripInvalidXmlChars(text)
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Builds an HTML string. Bold/italic are applied once around the whole
 * fragment by `renderHtmlText`, so the per-piece format is ignored here.
 */
export class HtmlEmitter implements TextEmitter<string> {
  private readonly parts: string[] = [];

  literal(text: string): void {
    this.parts.push(escapeHtml(text));
  }

  ordinal(digits: string, suffix: string): void {
    this.parts.push(`${escapeHtml(digits)}<sup>${escapeHtml(suffix)}</sup>`);
  }

  link(text: string, href: string): void {
    this.parts.push(`<a href="${escapeHtml(href)}">${escapeHtml(text)}</a>`);
  }

  tab(): void {
    this.parts.push(TAB_MARKER);
  }

  lineBreak(): void {
    this.parts.push(BREAK_MARKER);
  }

  result(): string {
    return this.parts.join('');
  }
}

export function renderHtmlText(text: string, options: RenderOptions = {}): string {
  let html = renderText(text, new HtmlEmitter(), options);
  if (!html) return html;
  if (options.italic) html = `<em>${html}</em>`;
  if (options.bold) html = `<strong>${html}</strong>`;
  return html;
}
