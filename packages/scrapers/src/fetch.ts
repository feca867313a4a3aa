const DEFAULT_TIMEOUT_MS = 30_000;

const UA =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

/**
 * GET a URL with a browser user-agent and read its body with `read`, aborting
 * after `timeoutMs`. The deadline covers the body as well as the headers.
 * Throws on network errors, timeouts and non-2xx responses.
 */
async function request<T>(url: string, timeoutMs: number, read: (res: Response) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetch(url, {
      signal: controller.signal,
      redirect: "follow",
      headers: { "User-Agent": UA },
    });
    if (!res.ok) {
      throw new Error(`HTTP ${res.status}: ${url}`);
    }
    return await read(res);
  } catch (err) {
    if (controller.signal.aborted) {
      throw new Error(`Timed out after ${timeoutMs}ms: ${url}`);
    }
    throw err;
  } finally {
    clearTimeout(timeoutId);
  }
}

/** Fetch an HTML page as text. */
export async function fetchText(url: string, timeoutMs = DEFAULT_TIMEOUT_MS): Promise<string> {
  return request(url, timeoutMs, (res) => res.text());
}

/** Fetch a binary document (flyer PDFs). */
export async function fetchBuffer(url: string, timeoutMs = DEFAULT_TIMEOUT_MS): Promise<Buffer> {
  return request(url, timeoutMs, async (res) => Buffer.from(await res.arrayBuffer()));
}
