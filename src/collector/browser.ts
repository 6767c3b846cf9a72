import puppeteer, { type Browser, type HTTPResponse } from "puppeteer-core";
import { BROWSER_USER_AGENT, sleep } from "./fetcher.js";

export type BrowserSession = {
  content: () => Promise<string>;
  /** Clicks the first element matching the selector. False when it is missing, hidden or refuses the click. */
  loadMore: (selector: string, settleMs: number) => Promise<boolean>;
  close: () => Promise<void>;
};

export type PageExpander = {
  open: (url: string) => Promise<BrowserSession>;
  close: () => Promise<void>;
};

export type BrowserOptions = {
  executablePath: string;
  disabled: boolean;
  timeoutMs: number;
};

const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));

/** Same success rule as the HTTP fetcher: only a 200 navigation counts as a loaded page. */
export const assertPageLoaded = (response: Pick<HTTPResponse, "status"> | null, url: string) => {
  if (!response) {
    throw new Error(`No response loading ${url}`);
  }
  if (response.status() !== 200) {
    throw new Error(`status ${response.status()}`);
  }
};

const createPuppeteerExpander = (browser: Browser, timeoutMs: number): PageExpander => ({
  open: async (url) => {
    const page = await browser.newPage();
    try {
      await page.setUserAgent(BROWSER_USER_AGENT);
      assertPageLoaded(await page.goto(url, { waitUntil: "domcontentloaded", timeout: timeoutMs }), url);
    } catch (error) {
      await page.close();
      throw error;
    }

    return {
      content: () => page.content(),
      loadMore: async (selector, settleMs) => {
        try {
          const handle = await page.$(selector);
          if (!handle) return false;
          try {
            if (!(await handle.isVisible())) return false;
            await handle.click();
          } finally {
            await handle.dispose();
          }
        } catch (error) {
          console.warn(`Load-more click failed: ${describeError(error)}`);
          return false;
        }
        await sleep(settleMs);
        return true;
      },
      close: () => page.close()
    };
  },
  close: () => browser.close()
});

/**
 * Launches a headless browser when one is configured. Resolves to null when automation
 * is switched off, no executable is configured, or the launch fails.
 */
export const detectPageExpander = async (options: BrowserOptions): Promise<PageExpander | null> => {
  if (options.disabled || !options.executablePath) {
    return null;
  }
  try {
    const browser = await puppeteer.launch({
      executablePath: options.executablePath,
      headless: true,
      args: ["--no-sandbox", "--disable-setuid-sandbox"]
    });
    return createPuppeteerExpander(browser, options.timeoutMs);
  } catch (error) {
    console.warn(`Browser automation unavailable: ${describeError(error)}`);
    return null;
  }
};
