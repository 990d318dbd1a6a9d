import { writeFileSync } from 'node:fs';
import { DEFAULT_PATHS } from '../config/paths.js';
import type { ResumePaths } from '../config/paths.js';
import { ChromePdfRenderer } from '../export/pdf.js';
import type { PdfRenderer } from '../export/pdf.js';
import { loadManifest } from '../manifest/loader.js';
import { logger } from '../observability/logger.js';
import { renderResumeDocx } from './docx/document.js';
import { renderResumePage } from './page.js';
import { loadTemplate } from './template.js';

const log = logger.child({ module: 'resume:orchestrator' });

export interface ConversionOptions {
  paths?: ResumePaths;
  pdfRenderer?: PdfRenderer;
}

export interface ConversionResult {
  docx: string;
  html: string;
  markdown: string;
  /** Null when PDF rendering failed; the other outputs are still written. */
  pdf: string | null;
}

export async function runConversion(options: ConversionOptions = {}): Promise<ConversionResult> {
  const paths = options.paths ?? DEFAULT_PATHS;

  log.info({ path: paths.manifest }, 'Reading manifest');
  const manifest = loadManifest(paths.manifest);

  log.info('Rendering DOCX');
  writeFileSync(paths.docx, await renderResumeDocx(manifest));
  log.info({ path: paths.docx }, 'Created DOCX');

  log.info('Rendering HTML');
  const html = renderResumePage(manifest, loadTemplate(paths.htmlTemplate));
  writeFileSync(paths.html, html, 'utf-8');
  log.info({ path: paths.html }, 'Created HTML');

  // The .md artifact is the embeddable HTML fragment, not Markdown syntax
  log.info('Rendering Markdown');
  writeFileSync(paths.markdown, renderResumePage(manifest, loadTemplate(paths.embedTemplate)), 'utf-8');
  log.info({ path: paths.markdown }, 'Created Markdown');

  log.info('Rendering PDF');
  let pdf: string | null = null;
  try {
    const renderer = options.pdfRenderer ?? new ChromePdfRenderer();
    await renderer.render(html, paths.pdf);
    pdf = paths.pdf;
    log.info({ path: paths.pdf }, 'Created PDF');
  } catch (err) {
    log.warn(
      { err },
      `PDF conversion failed: ${err instanceof Error ? err.message : String(err)}. ` +
        'You can print the HTML file to PDF from your browser instead.',
    );
  }

  return { docx: paths.docx, html: paths.html, markdown: paths.markdown, pdf };
}
