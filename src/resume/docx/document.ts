import {
  AlignmentType, BorderStyle, Document, ExternalHyperlink, Packer, Paragraph, Tab, Table,
  TableBorders, TableCell, TableLayoutType, TableRow, TextRun, UnderlineType, WidthType,
} from 'docx';
import type { Manifest } from '../../manifest/schema.js';
import { stripInvalidXmlChars } from '../text.js';
import type { RunSpec } from '../run-emitter.js';
import { buildResumeLayout } from './layout.js';
import type { CellSpec, ParagraphSpec, ResumeLayout } from './layout.js';

// Page geometry in twips (1440 per inch); font sizes in half-points

const FONT = 'Times New Roman';
const BODY_SIZE = 22;                    // 11pt
const NAME_SIZE = 36;                    // 18pt
const LINE_SPACING = 276;                // 1.15 lines
const PAGE = { width: 12240, height: 15840 };          // US Letter
const MARGINS = { top: 720, bottom: 720, left: 864, right: 864 };
const COLUMN_WIDTHS = [245, 1584, 8582];               // 0.17in / 1.10in / 5.96in
const TABLE_INDENT = -360;                             // -0.25in
const HANGING_INDENT = 720;                            // 0.5in

const baseSpacing = { before: 0, after: 0, line: LINE_SPACING };

type RunChild = TextRun | ExternalHyperlink;

function toRunChild(run: RunSpec): RunChild {
  switch (run.kind) {
    case 'tab':
      return new TextRun({ children: [new Tab()] });
    case 'break':
      return new TextRun({ break: 1 });
    case 'link':
      return new ExternalHyperlink({
        link: run.href,
        children: [
          new TextRun({
            text: run.text,
            bold: run.bold,
            italics: run.italic,
            color: '0000FF',
            underline: { type: UnderlineType.SINGLE },
          }),
        ],
      });
    case 'text':
      return new TextRun({ text: run.text, bold: run.bold, italics: run.italic, superScript: run.superScript });
  }
}

function toParagraph(spec: ParagraphSpec): Paragraph {
  return new Paragraph({
    spacing: baseSpacing,
    alignment: spec.alignment === 'center' ? AlignmentType.CENTER : undefined,
    bullet: spec.bullet ? { level: 0 } : undefined,
    indent: spec.hangingIndent ? { left: HANGING_INDENT, hanging: HANGING_INDENT } : undefined,
    children: spec.runs.map(toRunChild),
  });
}

function toCell(spec: CellSpec, columnIdx: number): TableCell {
  const span = spec.columnSpan ?? 1;
  const width = COLUMN_WIDTHS.slice(columnIdx, columnIdx + span).reduce((sum, w) => sum + w, 0);
  const paragraphs = spec.paragraphs.map(toParagraph);

  return new TableCell({
    width: { size: width, type: WidthType.DXA },
    columnSpan: span > 1 ? span : undefined,
    borders: spec.bottomRule
      ? { bottom: { style: BorderStyle.SINGLE, size: 12, space: 0, color: '000000' } }
      : undefined,
    // A cell must hold at least one paragraph
    children: paragraphs.length > 0 ? paragraphs : [new Paragraph({ spacing: baseSpacing })],
  });
}

function toTable(layout: ResumeLayout): Table {
  const rows = layout.rows.map((row) => {
    let column = 0;
    const cells = row.cells.map((cell) => {
      const tableCell = toCell(cell, column);
      column += cell.columnSpan ?? 1;
      return tableCell;
    });
    return new TableRow({ children: cells });
  });

  return new Table({
    rows,
    columnWidths: COLUMN_WIDTHS,
    width: { size: COLUMN_WIDTHS.reduce((sum, w) => sum + w, 0), type: WidthType.DXA },
    layout: TableLayoutType.FIXED,
    indent: { size: TABLE_INDENT, type: WidthType.DXA },
    borders: TableBorders.NONE,
  });
}

function nameParagraph(name: string): Paragraph {
  return new Paragraph({
    alignment: AlignmentType.CENTER,
    spacing: { ...baseSpacing, after: 120 },
    children: [new TextRun({ text: stripInvalidXmlChars(name), bold: true, size: NAME_SIZE })],
  });
}

export function buildResumeDocument(manifest: Manifest): Document {
  const layout = buildResumeLayout(manifest);

  return new Document({
    styles: {
      default: {
        document: { run: { font: FONT, size: BODY_SIZE } },
      },
    },
    sections: [
      {
        properties: {
          page: { size: PAGE, margin: MARGINS },
        },
        children: [nameParagraph(layout.name), toTable(layout)],
      },
    ],
  });
}

export async function renderResumeDocx(manifest: Manifest): Promise<Buffer> {
  return Packer.toBuffer(buildResumeDocument(manifest));
}
