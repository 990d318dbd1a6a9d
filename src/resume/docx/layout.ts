import type { Education, JobEntry, Manifest, TechEntry } from '../../manifest/schema.js';
import { normalizeDate } from '../text.js';
import type { RenderOptions } from '../text.js';
import { renderRuns } from '../run-emitter.js';
import type { RunSpec } from '../run-emitter.js';

export interface ParagraphSpec {
  runs: RunSpec[];
  alignment?: 'center';
  bullet?: boolean;
  hangingIndent?: boolean;
}

export interface CellSpec {
  paragraphs: ParagraphSpec[];
  columnSpan?: number;
  bottomRule?: boolean;
}

export interface RowSpec {
  kind: 'contact' | 'education' | 'experience-header' | 'job' | 'spacer' | 'technical';
  cells: CellSpec[];
}

export interface ResumeLayout {
  name: string;
  rows: RowSpec[];
}

/** Rendered pieces of one paragraph, concatenated in order. */
type Piece = [text: string, options?: RenderOptions];

function paragraph(pieces: Piece[], extra: Omit<ParagraphSpec, 'runs'> = {}): ParagraphSpec {
  return { runs: pieces.flatMap(([text, options]) => renderRuns(text, options)), ...extra };
}

const emptyCell = (): CellSpec => ({ paragraphs: [] });

function labelCell(label: string, options: RenderOptions = { bold: true }): CellSpec {
  return { paragraphs: [paragraph([[label, options]])] };
}

function spacerRow(): RowSpec {
  return { kind: 'spacer', cells: [emptyCell(), emptyCell(), emptyCell()] };
}

function contactRow(lines: readonly string[]): RowSpec {
  return {
    kind: 'contact',
    cells: [
      emptyCell(),
      {
        columnSpan: 2,
        bottomRule: true,
        paragraphs: lines.map((line) => paragraph([[line, { linkify: true }]], { alignment: 'center' })),
      },
    ],
  };
}

function educationRow(edu: Education): RowSpec {
  return {
    kind: 'education',
    cells: [
      emptyCell(),
      labelCell('EDUCATION'),
      {
        paragraphs: [
          paragraph([[edu.degree, { bold: true }]]),
          paragraph([[edu.institution]]),
          paragraph([['Major:', { bold: true }], [` ${edu.major}`]]),
          paragraph([['Specialization:', { bold: true }], [` ${edu.specialization}`]]),
        ],
      },
    ],
  };
}

function jobRow(job: JobEntry): RowSpec {
  const content: ParagraphSpec[] = [
    paragraph([[`${job.title}, `, { bold: true }], [job.company, { italic: true }]]),
  ];
  if (job.goal) content.push(paragraph([[`Goal: ${job.goal}`]]));
  if (job.value) content.push(paragraph([[`Value: ${job.value}`]]));
  content.push(paragraph([['My Contribution:', { italic: true }]]));
  for (const bullet of job.contributions) {
    content.push(paragraph([[bullet]], { bullet: true }));
  }

  return {
    kind: 'job',
    cells: [emptyCell(), labelCell(normalizeDate(job.date), { italic: true }), { paragraphs: content }],
  };
}

function technicalParagraph(item: TechEntry): ParagraphSpec {
  return paragraph([[`${item.label}:`, { bold: true }], [` ${item.details}`]], {
    hangingIndent: item.hanging_indent === true,
  });
}

/**
 * Lays the resume out as rows of a three-column table (spacer, label,
 * content). Pure data; `buildResumeDocument` turns it into docx objects.
 */
export function buildResumeLayout(manifest: Manifest): ResumeLayout {
  const rows: RowSpec[] = [
    contactRow(manifest.contact_lines),
    educationRow(manifest.education),
    {
      kind: 'experience-header',
      cells: [emptyCell(), labelCell('EXPERIENCE', { bold: true, italic: true }), emptyCell()],
    },
    ...manifest.experience.map(jobRow),
    spacerRow(),
    {
      kind: 'technical',
      cells: [
        emptyCell(),
        labelCell('TECHNICAL EXPERIENCE'),
        { paragraphs: manifest.technical_experience.map(technicalParagraph) },
      ],
    },
    spacerRow(),
  ];

  return { name: manifest.name, rows };
}
