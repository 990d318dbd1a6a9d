import { describe, it, expect } from 'vitest';
import { findUrls, makeUrl, normalizeDate, renderText, stripInvalidXmlChars } from '../text.js';
import type { RenderOptions, TextEmitter, TextFormat } from '../text.js';

class RecordingEmitter implements TextEmitter<string[]> {
  private readonly events: string[] = [];

  literal(text: string, format: TextFormat): void {
    this.events.push(`literal:${text}${flags(format)}`);
  }
  ordinal(digits: string, suffix: string, format: TextFormat): void {
    this.events.push(`ordinal:${digits}|${suffix}${flags(format)}`);
  }
  link(text: string, href: string): void {
    this.events.push(`link:${text}|${href}`);
  }
  tab(): void {
    this.events.push('tab');
  }
  lineBreak(): void {
    this.events.push('break');
  }
  result(): string[] {
    return this.events;
  }
}

function flags(format: TextFormat): string {
  return `${format.bold ? ':b' : ''}${format.italic ? ':i' : ''}`;
}

function record(text: string, options?: RenderOptions): string[] {
  return renderText(text, new RecordingEmitter(), options);
}

describe('renderText', () => {
  describe('ordinals', () => {
    it('splits digits from the suffix', () => {
      expect(record('On the 21st and 3rd')).toEqual([
        'literal:On the ',
        'ordinal:21|st',
        'literal: and ',
        'ordinal:3|rd',
      ]);
    });

    it('requires a word boundary after the suffix', () => {
      expect(record('21stcentury')).toEqual(['literal:21stcentury']);
    });

    it('treats accented letters after the suffix as part of the word', () => {
      expect(record('5thé')).toEqual(['literal:5thé']);
      expect(record('5th_x')).toEqual(['literal:5th_x']);
    });

    it('accepts punctuation after the suffix', () => {
      expect(record('5th.')).toEqual(['ordinal:5|th', 'literal:.']);
    });

    it('accepts non-ASCII decimal digits', () => {
      expect(record('٣rd')).toEqual(['ordinal:٣|rd']);
    });

    it('is case-sensitive on the suffix', () => {
      expect(record('21ST')).toEqual(['literal:21ST']);
    });

    it('passes bold and italic to every piece', () => {
      expect(record('the 4th', { bold: true, italic: true })).toEqual([
        'literal:the :b:i',
        'ordinal:4|th:b:i',
      ]);
    });
  });

  describe('tabs and line breaks', () => {
    it('emits one tab per tab character, keeping empty segments', () => {
      expect(record('a\tb\t\tc')).toEqual(['literal:a', 'tab', 'literal:b', 'tab', 'tab', 'literal:c']);
    });

    it('emits one break per newline', () => {
      expect(record('x\ny\n')).toEqual(['literal:x', 'break', 'literal:y', 'break']);
    });

    it('emits nothing for an empty string', () => {
      expect(record('')).toEqual([]);
    });

    it('returns text without matches as a single literal', () => {
      expect(record('plain text')).toEqual(['literal:plain text']);
    });
  });

  describe('linkify', () => {
    it('links www. addresses with an https target', () => {
      expect(record('Site: www.example.com', { linkify: true })).toEqual([
        'literal:Site: ',
        'link:www.example.com|https://www.example.com',
      ]);
    });

    it('skips ordinal detection', () => {
      expect(record('1st http://a.io/x 2nd', { linkify: true })).toEqual([
        'literal:1st ',
        'link:http://a.io/x|http://a.io/x',
        'literal: 2nd',
      ]);
    });

    it('scans each tab segment separately', () => {
      expect(record('www.a.io\twww.b.io', { linkify: true })).toEqual([
        'link:www.a.io|https://www.a.io',
        'tab',
        'link:www.b.io|https://www.b.io',
      ]);
    });
  });
});

describe('normalizeDate', () => {
  it('replaces a spaced hyphen with an en dash', () => {
    expect(normalizeDate('2020 - 2021')).toBe('2020 – 2021');
  });

  it('trims before normalizing', () => {
    expect(normalizeDate('  Jan 2019 - Present ')).toBe('Jan 2019 – Present');
  });

  it('leaves unspaced hyphens alone', () => {
    expect(normalizeDate('2020-2021')).toBe('2020-2021');
  });
});

describe('stripInvalidXmlChars', () => {
  it('removes control characters and lone surrogates but keeps pairs', () => {
    expect(stripInvalidXmlChars('bell\u0007')).toBe('bell');
    expect(stripInvalidXmlChars('a\uD800b')).toBe('ab');
    expect(stripInvalidXmlChars('ok 😀')).toBe('ok 😀');
  });

  it('keeps tabs and newlines', () => {
    expect(stripInvalidXmlChars('a\tb\nc')).toBe('a\tb\nc');
  });
});

describe('makeUrl', () => {
  it('prepends https to www. addresses', () => {
    expect(makeUrl('www.example.com')).toBe('https://www.example.com');
  });

  it('keeps an existing protocol', () => {
    expect(makeUrl('http://example.com')).toBe('http://example.com');
  });
});

describe('findUrls', () => {
  it('returns every match with its position and target', () => {
    expect(findUrls('see https://a.io and www.b.org.')).toEqual([
      { index: 4, text: 'https://a.io', href: 'https://a.io' },
      { index: 21, text: 'www.b.org.', href: 'https://www.b.org.' },
    ]);
  });
});
