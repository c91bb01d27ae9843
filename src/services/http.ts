/**
 * Text fetching with a per-request timeout
 */

export interface FetchTextOptions {
    timeoutMs: number;
    userAgent: string;
    accept?: string;
}

export interface FetchedText {
    body: string;
    contentType: string;
    url: string;            // Final URL after redirects
}

export const ACCEPT_JSON = 'application/json, text/plain;q=0.8, */*;q=0.5';
export const ACCEPT_FEED = 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*';
export const ACCEPT_HTML = 'text/html,application/xhtml+xml';

/**
 * GET a URL and return its body as text.
 * Throws on non-2xx status, timeout or connection failure.
 */
export async function fetchText(url: string, options: FetchTextOptions): Promise<FetchedText> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

    try {
        const response = await fetch(url, {
            signal: controller.signal,
            headers: {
                'User-Agent': options.userAgent,
                Accept: options.accept ?? '*/*',
            },
        });

        if (!response.ok) {
            throw new Error(`Request to ${url} failed (status ${response.status})`);
        }

        return {
            body: await response.text(),
            contentType: (response.headers.get('content-type') || '').toLowerCase(),
            url: response.url || url,
        };
    } catch (error) {
        if (error instanceof Error && error.name === 'AbortError') {
            throw new Error(`Request to ${url} timed out after ${options.timeoutMs}ms`, { cause: error });
        }
        throw error;
    } finally {
        clearTimeout(timeoutId);
    }
}
