export interface TextFormat {
  bold: boolean;
  italic: boolean;
}

export interface RenderOptions {
  /** Turn bare URLs into hyperlinks instead of scanning for ordinals. */
  linkify?: boolean;
  bold?: boolean;
  italic?: boolean;
}

/**
 * Target encoding for rendered text. `renderText` does all the scanning and
 * calls these in document order; an emitter only decides how each piece is
 * written.
 */
export interface TextEmitter<T> {
  literal(text: string, format: TextFormat): void;
  ordinal(digits: string, suffix: string, format: TextFormat): void;
  link(text: string, href: string, format: TextFormat): void;
  tab(): void;
  lineBreak(): void;
  result(): T;
}

const ORDINAL_RE = /(\p{Nd}+)(st|nd|rd|th)(?![\p{L}\p{N}_])/gu;
const URL_RE = /https?:\/\/\S+|www\.\S+/g;

// Characters XML 1.0 cannot carry at all; both encodings drop them
const XML_INVALID_RE = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]|[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

export function stripInvalidXmlChars(text: string): string {
  return text.replace(XML_INVALID_RE, '');
}

export function makeUrl(text: string): string {
  return text.startsWith('www.') ? `https://${text}` : text;
}

export function normalizeDate(date: string): string {
  return date.trim().replace(/\s-\s/g, ' – ');
}

export interface UrlMatch {
  index: number;
  text: string;
  href: string;
}

export function findUrls(text: string): UrlMatch[] {
  return Array.from(text.matchAll(URL_RE), (m) => ({
    index: m.index ?? 0,
    text: m[0],
    href: makeUrl(m[0]),
  }));
}

function emitOrdinals<T>(segment: string, emitter: TextEmitter<T>, format: TextFormat): void {
  let last = 0;
  for (const match of segment.matchAll(ORDINAL_RE)) {
    const start = match.index ?? 0;
    if (start > last) emitter.literal(segment.slice(last, start), format);
    emitter.ordinal(match[1], match[2], format);
    last = start + match[0].length;
  }
  if (last < segment.length) emitter.literal(segment.slice(last), format);
}

function emitLinks<T>(segment: string, emitter: TextEmitter<T>, format: TextFormat): void {
  let last = 0;
  for (const url of findUrls(segment)) {
    if (url.index > last) emitter.literal(segment.slice(last, url.index), format);
    emitter.link(url.text, url.href, format);
    last = url.index + url.text.length;
  }
  if (last < segment.length) emitter.literal(segment.slice(last), format);
}

export function renderText<T>(text: string, emitter: TextEmitter<T>, options: RenderOptions = {}): T {
  const format: TextFormat = { bold: options.bold ?? false, italic: options.italic ?? false };
  const scan = options.linkify ? emitLinks : emitOrdinals;

  text.split('\n').forEach((line, lineIdx) => {
    if (lineIdx > 0) emitter.lineBreak();
    line.split('\t').forEach((segment, segIdx) => {
      if (segIdx > 0) emitter.tab();
      scan(segment, emitter, format);
    });
  });

  return emitter.result();
}
