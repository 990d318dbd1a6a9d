import type { Education, JobEntry, Manifest, TechEntry } from '../manifest/schema.js';
import { escapeHtml, renderHtmlText } from './html-emitter.js';
import { normalizeDate } from './text.js';
import { fillTemplate } from './template.js';
import type { TemplateBindings } from './template.js';

function nameRow(name: string): string {
  return ['<tr>', '<td></td>', `<td class="name-cell" colspan="2">${escapeHtml(name)}</td>`, '</tr>'].join('\n');
}

function contactRow(lines: readonly string[]): string {
  return [
    '<tr class="contact-row">',
    '<td></td>',
    '<td class="contact-cell" colspan="2">',
    lines.map((line) => `<div>${renderHtmlText(line, { linkify: true })}</div>`).join('\n'),
    '</td>',
    '</tr>',
  ].join('\n');
}

function educationRow(edu: Education): string {
  return [
    '<tr class="section-row">',
    '<td></td>',
    '<td><strong>EDUCATION</strong></td>',
    '<td>',
    `<p>${renderHtmlText(edu.degree, { bold: true })}</p>`,
    `<p>${renderHtmlText(edu.institution)}</p>`,
    `<p><strong>Major:</strong>${renderHtmlText(` ${edu.major}`)}</p>`,
    `<p><strong>Specialization:</strong>${renderHtmlText(` ${edu.specialization}`)}</p>`,
    '</td>',
    '</tr>',
  ].join('\n');
}

function experienceHeaderRow(): string {
  return [
    '<tr class="section-row">',
    '<td></td>',
    '<td><em><strong>EXPERIENCE</strong></em></td>',
    '<td></td>',
    '</tr>',
  ].join('\n');
}

function jobRow(job: JobEntry): string {
  const parts = [
    '<tr class="job-row">',
    '<td></td>',
    `<td><p>${renderHtmlText(normalizeDate(job.date), { italic: true })}</p></td>`,
    '<td>',
    `<p>${renderHtmlText(`${job.title}, `, { bold: true })}${renderHtmlText(job.company, { italic: true })}</p>`,
  ];
  if (job.goal) parts.push(`<p>${renderHtmlText(`Goal: ${job.goal}`)}</p>`);
  if (job.value) parts.push(`<p>${renderHtmlText(`Value: ${job.value}`)}</p>`);
  parts.push('<p><em>My Contribution:</em></p>');
  parts.push('<ul class="bullet-list">');
  parts.push(...job.contributions.map((bullet) => `<li>${renderHtmlText(bullet)}</li>`));
  parts.push('</ul>', '</td>', '</tr>');
  return parts.join('\n');
}

function technicalLine(item: TechEntry): string {
  const style = item.hanging_indent ? ' style="margin-left: 0.50in; text-indent: -0.50in;"' : '';
  return `<p${style}>${renderHtmlText(`${item.label}:`, { bold: true })}${renderHtmlText(` ${item.details}`)}</p>`;
}

function technicalRow(items: readonly TechEntry[]): string {
  return [
    '<tr class="section-row">',
    '<td></td>',
    '<td><strong>TECHNICAL EXPERIENCE</strong></td>',
    '<td>',
    items.map(technicalLine).join('\n'),
    '</td>',
    '</tr>',
  ].join('\n');
}

export function buildPageBindings(manifest: Manifest): TemplateBindings {
  return {
    TITLE: `${escapeHtml(manifest.name)} - Resume`,
    NAME_ROW: nameRow(manifest.name),
    CONTACT_ROW: contactRow(manifest.contact_lines),
    EDUCATION_ROW: educationRow(manifest.education),
    EXPERIENCE_HEADER_ROW: experienceHeaderRow(),
    EXPERIENCE_ROWS: manifest.experience.map(jobRow).join('\n'),
    TECHNICAL_ROW: technicalRow(manifest.technical_experience),
  };
}

/** Fills either page template (full document or embeddable fragment). */
export function renderResumePage(manifest: Manifest, template: string): string {
  return fillTemplate(template, buildPageBindings(manifest));
}
