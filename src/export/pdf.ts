import { existsSync } from 'node:fs';
import puppeteer from 'puppeteer-core';
import { env } from '../config/env.js';
import { logger } from '../observability/logger.js';

const log = logger.child({ module: 'export:pdf' });

export interface PdfRenderer {
  render(html: string, outputPath: string): Promise<void>;
}

const CHROME_CANDIDATES: Record<string, string[]> = {
  linux: [
    '/usr/bin/google-chrome',
    '/usr/bin/google-chrome-stable',
    '/usr/bin/chromium',
    '/usr/bin/chromium-browser',
    '/snap/bin/chromium',
  ],
  darwin: [
    '/Applications/Google Chrome.app/Contents/MacOS/Google Chrome',
    '/Applications/Chromium.app/Contents/MacOS/Chromium',
  ],
  win32: [
    'C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe',
    'C:\\Program Files (x86)\\Google\\Chrome\\Application\\chrome.exe',
  ],
};

export function detectChromePath(
  configured: string | undefined = env.CHROME_PATH,
  platform: string = process.platform,
): string | undefined {
  if (configured) return configured;
  return (CHROME_CANDIDATES[platform] ?? []).find((candidate) => existsSync(candidate));
}

/** Prints HTML to PDF with a locally installed Chrome or Chromium. */
export class ChromePdfRenderer implements PdfRenderer {
  constructor(private readonly executablePath: string | undefined = detectChromePath()) {}

  async render(html: string, outputPath: string): Promise<void> {
    if (!this.executablePath) {
      throw new Error('Chrome/Chromium not found. Install it or set CHROME_PATH in .env');
    }

    log.debug({ executablePath: this.executablePath }, 'Launching browser');
    const browser = await puppeteer.launch({
      executablePath: this.executablePath,
      headless: true,
      args: ['--no-sandbox', '--disable-setuid-sandbox', '--disable-dev-shm-usage', '--disable-gpu'],
    });

    try {
      const page = await browser.newPage();
      await page.setContent(html, { waitUntil: 'load' });
      await page.pdf({ path: outputPath, format: 'Letter', printBackground: true });
    } finally {
      await browser.close();
    }
  }
}
