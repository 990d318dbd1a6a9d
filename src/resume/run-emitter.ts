import { renderText, stripInvalidXmlChars } from './text.js';
import type { RenderOptions, TextEmitter, TextFormat } from './text.js';

export type RunSpec =
  | { kind: 'text'; text: string; bold: boolean; italic: boolean; superScript: boolean }
  | { kind: 'link'; text: string; href: string; bold: boolean; italic: boolean }
  | { kind: 'tab' }
  | { kind: 'break' };

/** Collects styled runs for the rich document. */
export class RunEmitter implements TextEmitter<RunSpec[]> {
  private readonly runs: RunSpec[] = [];

  literal(text: string, format: TextFormat): void {
    this.pushText(text, format, false);
  }

  ordinal(digits: string, suffix: string, format: TextFormat): void {
    this.pushText(digits, format, false);
    this.pushText(suffix, format, true);
  }

  link(text: string, href: string, format: TextFormat): void {
    this.runs.push({ kind: 'link', text: stripInvalidXmlChars(text), href: stripInvalidXmlChars(href), ...format });
  }

  tab(): void {
    this.runs.push({ kind: 'tab' });
  }

  lineBreak(): void {
    this.runs.push({ kind: 'break' });
  }

  result(): RunSpec[] {
    return this.runs;
  }

  private pushText(text: string, format: TextFormat, superScript: boolean): void {
    // The docx writer escapes & < > itself
    const clean = stripInvalidXmlChars(text);
    if (!clean) return;
    this.runs.push({ kind: 'text', text: clean, bold: format.bold, italic: format.italic, superScript });
  }
}

export function renderRuns(text: string, options: RenderOptions = {}): RunSpec[] {
  return renderText(text, new RunEmitter(), options);
}

export function plainTextOfRuns(runs: RunSpec[]): string {
  return runs
    .map((run) => {
      switch (run.kind) {
        case 'tab':
          return '\t';
        case 'break':
          return '\n';
        default:
          return run.text;
      }
    })
    .join('');
}
