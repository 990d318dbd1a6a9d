import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const ROOT = resolve(__dirname, '../..');

export interface ResumePaths {
  manifest: string;
  htmlTemplate: string;
  embedTemplate: string;
  docx: string;
  html: string;
  markdown: string;
  pdf: string;
}

export function resolvePaths(root: string): ResumePaths {
  return {
    manifest: resolve(root, 'resume.yaml'),
    htmlTemplate: resolve(root, 'templates/resume.html.tmpl'),
    embedTemplate: resolve(root, 'templates/resume.embed.tmpl'),
    docx: resolve(root, 'Resume.docx'),
    html: resolve(root, 'Resume.html'),
    // Holds the embeddable HTML fragment; downstream consumers read it under this name
    markdown: resolve(root, 'Resume.md'),
    pdf: resolve(root, 'Resume.pdf'),
  };
}

export const DEFAULT_PATHS = resolvePaths(ROOT);
