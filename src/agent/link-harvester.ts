import { promises as fs } from 'node:fs';
import path from 'node:path';
import { chromium, type BrowserContext } from 'playwright-core';
import type { BrowserConfig } from '../config/index.js';
import { errorMessage } from '../exceptions.js';
import { createLogger, type Logger } from '../logging-config.js';
import type { AgentRunOptions, AgentRunSummary, ExtractionAgent } from './views.js';

const SKIPPED_SCHEMES = /^(javascript|mailto|tel|data):/i;

const decodeSafely = (value: string): string => {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
};

/**
 * Resolve raw hrefs against the page URL and keep http(s) links whose path
 * ends in one of the document extensions. Order of first appearance is kept.
 */
export function selectDocumentLinks(
  hrefs: readonly string[],
  baseUrl: string,
  extensions: readonly string[]
): string[] {
  const wanted = extensions.map((ext) => ext.toLowerCase());
  const seen = new Set<string>();
  const links: string[] = [];

  for (const href of hrefs) {
    const trimmed = href.trim();
    if (!trimmed || trimmed.startsWith('#') || SKIPPED_SCHEMES.test(trimmed)) {
      continue;
    }

    let resolved: URL;
    try {
      resolved = new URL(trimmed, baseUrl);
    } catch {
      continue;
    }
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
      continue;
    }

    resolved.hash = '';
    const pathname = decodeSafely(resolved.pathname).toLowerCase();
    if (!wanted.some((ext) => pathname.endsWith(ext))) {
      continue;
    }

    const normalized = resolved.toString();
    if (!seen.has(normalized)) {
      seen.add(normalized);
      links.push(normalized);
    }
  }

  return links;
}

/**
 * Local file name for a document link: decoded basename with unsafe
 * characters replaced, or a numbered fallback.
 */
export function fileNameForLink(link: string, index: number, fallbackExtension: string): string {
  const basename = path.posix.basename(decodeSafely(new URL(link).pathname));
  const sanitized = basename.replace(/[^A-Za-z0-9._-]+/g, '_').replace(/^[._]+/, '');
  return sanitized || `document-${index + 1}${fallbackExtension}`;
}

function uniqueFileName(name: string, used: Set<string>): string {
  let candidate = name;
  const ext = path.extname(name);
  const stem = name.slice(0, name.length - ext.length);
  for (let n = 2; used.has(candidate); n++) {
    candidate = `${stem}-${n}${ext}`;
  }
  used.add(candidate);
  return candidate;
}

/**
 * Default agent: opens the page in Chromium, collects document links and
 * fetches each one through the browser context so cookies are reused.
 */
export class DocumentLinkHarvester implements ExtractionAgent {
  private readonly logger: Logger;

  constructor(
    private readonly config: BrowserConfig,
    options: { logger?: Logger } = {}
  ) {
    this.logger = options.logger ?? createLogger('agent.harvester');
  }

  async runAgentExtraction(url: string, outputDirectory: string, options: AgentRunOptions): Promise<AgentRunSummary> {
    const { signal } = options;
    signal.throwIfAborted();

    const requestTimeout = Math.min(this.config.navigationTimeoutMs, options.timeoutMs);
    const browser = await chromium.launch({
      headless: this.config.headless,
      executablePath: this.config.executablePath,
      args: this.config.args,
      timeout: requestTimeout,
    });

    const closeBrowser = () => {
      browser.close().catch((error: unknown) => {
        this.logger.debug(`Error closing browser: ${errorMessage(error)}`);
      });
    };
    signal.addEventListener('abort', closeBrowser, { once: true });

    try {
      // Aborted while the browser was launching
      signal.throwIfAborted();
      const context = await browser.newContext({ acceptDownloads: true });
      const links = await this.discoverLinks(context, url, requestTimeout);
      signal.throwIfAborted();
      this.logger.info(`Found ${links.length} document link(s) on ${url}`);

      const used = new Set<string>();
      const downloaded: string[] = [];
      for (const [index, link] of links.entries()) {
        signal.throwIfAborted();
        const saved = await this.fetchDocument(context, link, index, outputDirectory, used, requestTimeout);
        if (saved) {
          downloaded.push(saved);
        }
      }

      return {
        downloaded,
        message: `Downloaded ${downloaded.length} of ${links.length} document(s)`,
      };
    } finally {
      signal.removeEventListener('abort', closeBrowser);
      await browser.close().catch((error: unknown) => {
        this.logger.debug(`Error closing browser: ${errorMessage(error)}`);
      });
    }
  }

  private async discoverLinks(context: BrowserContext, url: string, timeout: number): Promise<string[]> {
    const extensions = this.config.documentExtensions;
    // The target itself is a document
    if (selectDocumentLinks([url], url, extensions).length > 0) {
      return [url];
    }

    const page = await context.newPage();
    await page.goto(url, { waitUntil: 'domcontentloaded', timeout });
    await page.waitForLoadState('networkidle', { timeout }).catch(() => {
      this.logger.debug(`Network did not go idle on ${url}, continuing`);
    });

    const hrefs = await page
      .locator('a[href]')
      .evaluateAll((anchors) => anchors.map((anchor) => anchor.getAttribute('href') ?? ''));
    return selectDocumentLinks(hrefs, page.url(), extensions);
  }

  private async fetchDocument(
    context: BrowserContext,
    link: string,
    index: number,
    outputDirectory: string,
    used: Set<string>,
    timeout: number
  ): Promise<string | null> {
    try {
      const response = await context.request.get(link, { timeout });
      if (!response.ok()) {
        this.logger.warning(`Skipping ${link}: HTTP ${response.status()}`);
        return null;
      }

      const fileName = uniqueFileName(fileNameForLink(link, index, this.config.documentExtensions[0] ?? ''), used);
      const target = path.join(outputDirectory, fileName);
      await fs.writeFile(target, await response.body());
      this.logger.info(`Downloaded ${fileName}`, { url: link });
      return target;
    } catch (error) {
      this.logger.warning(`Failed to download ${link}: ${errorMessage(error)}`);
      return null;
    }
  }
}
