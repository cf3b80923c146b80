import { dirname, join } from 'node:path';
import { chromium, type Browser, type Page } from 'playwright-core';
import type { DownloadConfig, DownloadStrategy } from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { doiUrl, pdfSuffixUrl } from '../sources/utils.js';
import { getLogger } from '../utils/logger.js';
import { adoptLatestPdf, waitForDownloads } from './download-dir.js';

/** Opens a download menu on publisher pages that have one */
export const DROPDOWN_TRIGGER = "//button[contains(text(), 'Download')]";
export const DROPDOWN_PDF_LINK = "//a[contains(text(), 'Download PDF')]";

/**
 * Direct download affordances, tried in order after the dropdown.
 */
export const DOWNLOAD_SELECTORS = [
    "//button[contains(text(), 'Download PDF')]",
    "//a[contains(text(), 'Download PDF')]",
    "//button[contains(@class, 'download')]//span[contains(text(), 'PDF')]",
    "//div[@class='dropdown-menu show']//a[contains(text(), 'Download PDF')]",
    "//button[@id='download-button']",
] as const;

/** Publisher domains that serve the PDF at "<landing page>/pdf" */
export const PDF_SUFFIX_DOMAINS = ['mdpi.com'];

export interface BrowserStrategyOptions extends Partial<DownloadConfig> {
    /** Pause between opening the dropdown and clicking its PDF entry */
    dropdownDelayMs?: number;
    pollIntervalMs?: number;
}

/**
 * Drives headless Chromium to the DOI resolver and clicks the publisher's
 * "Download PDF" affordance. Best-effort scraping of third-party pages:
 * every failure is reported as null so the next strategy can run.
 */
export class BrowserDownloadStrategy implements DownloadStrategy {
    readonly name = 'browser';
    private readonly headless: boolean;
    private readonly executablePath?: string;
    private readonly clickTimeoutMs: number;
    private readonly downloadTimeoutMs: number;
    private readonly dropdownDelayMs: number;
    private readonly pollIntervalMs: number;

    constructor(options: BrowserStrategyOptions = {}) {
        this.headless = options.headless ?? DEFAULT_CONFIG.download.headless;
        this.executablePath = options.executablePath;
        this.clickTimeoutMs = options.clickTimeoutMs ?? DEFAULT_CONFIG.download.clickTimeoutMs;
        this.downloadTimeoutMs = options.downloadTimeoutMs ?? DEFAULT_CONFIG.download.downloadTimeoutMs;
        this.dropdownDelayMs = options.dropdownDelayMs ?? 1000;
        this.pollIntervalMs = options.pollIntervalMs ?? 1000;
    }

    appliesTo(): boolean {
        return true;
    }

    async fetch(doi: string, targetPath: string): Promise<string | null> {
        const logger = getLogger();
        const outputDir = dirname(targetPath);
        let browser: Browser | null = null;

        try {
            browser = await chromium.launch({
                headless: this.headless,
                ...(this.executablePath ? { executablePath: this.executablePath } : { channel: 'chrome' }),
                args: ['--no-sandbox', '--disable-dev-shm-usage'],
            });
            const context = await browser.newContext({ acceptDownloads: true });
            const page = await context.newPage();

            const saves: Array<Promise<void>> = [];
            page.on('download', (download) => {
                const dest = join(outputDir, download.suggestedFilename());
                logger.debug({ dest }, 'Browser download started');
                saves.push(
                    download
                        .saveAs(dest)
                        .catch((error: unknown) => logger.warn({ dest, error }, 'Saving browser download failed'))
                );
            });

            const url = doiUrl(doi);
            logger.info({ url }, 'Navigating to DOI resolver');
            await page.goto(url, { waitUntil: 'domcontentloaded' });

            let clicked = await this.clickDownload(page);

            if (!clicked) {
                const currentUrl = page.url();
                if (PDF_SUFFIX_DOMAINS.some((domain) => currentUrl.includes(domain))) {
                    const pdfUrl = pdfSuffixUrl(currentUrl);
                    logger.info({ pdfUrl }, 'No download button, trying direct PDF URL');
                    // Chromium reports a navigation that turns into a download as a failed goto.
                    await page.goto(pdfUrl).catch((error: unknown) =>
                        logger.debug({ pdfUrl, error }, 'Direct PDF navigation ended without a page')
                    );
                    clicked = true;
                }
            }

            if (!clicked) {
                logger.info({ doi }, 'No PDF download affordance found');
                return null;
            }

            const deadline = Date.now() + this.downloadTimeoutMs;
            await this.waitForSaves(saves, deadline);
            const settled = await waitForDownloads(outputDir, {
                timeoutMs: Math.max(0, deadline - Date.now()),
                pollIntervalMs: this.pollIntervalMs,
            });
            if (!settled) {
                logger.warn({ outputDir }, 'Download still in progress after timeout');
            }

            const pdfPath = await adoptLatestPdf(targetPath, outputDir);
            if (!pdfPath) {
                logger.warn({ doi }, 'No PDF file found after download attempt');
                return null;
            }

            logger.info({ pdfPath }, 'PDF downloaded via browser');
            return pdfPath;
        } catch (error) {
            logger.warn({ doi, error }, 'Browser download failed');
            return null;
        } finally {
            if (browser) {
                await browser.close().catch((error: unknown) => logger.debug({ error }, 'Browser close failed'));
            }
        }
    }

    /**
     * Try the dropdown first, then each direct selector.
     * @returns true once something was clicked
     */
    private async clickDownload(page: Page): Promise<boolean> {
        const logger = getLogger();

        try {
            await page.locator(`xpath=${DROPDOWN_TRIGGER}`).first().click({ timeout: this.clickTimeoutMs });
            await page.waitForTimeout(this.dropdownDelayMs);
            await page.locator(`xpath=${DROPDOWN_PDF_LINK}`).first().click({ timeout: this.dropdownDelayMs });
            logger.info('Clicked PDF download from dropdown');
            return true;
        } catch (error) {
            logger.debug({ error }, 'No download dropdown');
        }

        for (const selector of DOWNLOAD_SELECTORS) {
            try {
                await page.locator(`xpath=${selector}`).first().click({ timeout: this.clickTimeoutMs });
                logger.info({ selector }, 'Clicked download button');
                return true;
            } catch (error) {
                logger.debug({ selector, error }, 'Download selector not clickable');
            }
        }

        return false;
    }

    /**
     * Wait for the first download event until `deadline`, then for every
     * started save to finish. Saves log their own failures.
     */
    private async waitForSaves(saves: Array<Promise<void>>, deadline: number): Promise<void> {
        while (saves.length === 0 && Date.now() < deadline) {
            await new Promise((resolve) => setTimeout(resolve, this.pollIntervalMs));
        }
        await Promise.all(saves);
    }
}
