export const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

export type Fetcher = {
  /** Resolves to the page markup, or null once every attempt has failed. Never rejects. */
  fetch: (url: string) => Promise<string | null>;
};

export type FetcherOptions = {
  maxAttempts: number;
  delayMs: number;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
};

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));

export const createHttpFetcher = (options: FetcherOptions): Fetcher => {
  const fetchImpl = options.fetchImpl ?? fetch;
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));

  const attempt = async (url: string): Promise<string> => {
    const response = await fetchImpl(url, {
      headers: {
        "User-Agent": BROWSER_USER_AGENT,
        Accept: "text/html,application/xhtml+xml"
      },
      signal: AbortSignal.timeout(options.timeoutMs)
    });
    if (response.status !== 200) {
      await response.body?.cancel();
      throw new Error(`status ${response.status}`);
    }
    return response.text();
  };

  return {
    fetch: async (url) => {
      for (let n = 1; n <= maxAttempts; n += 1) {
        try {
          return await attempt(url);
        } catch (error) {
          if (n < maxAttempts) {
            console.warn(`Retry ${n}/${maxAttempts} for ${url} (${describeError(error)})`);
            await wait(options.delayMs);
            continue;
          }
          console.error(`Failed to fetch ${url} after ${maxAttempts} attempts: ${describeError(error)}`);
        }
      }
      return null;
    }
  };
};
