export class FetchTimeoutError extends Error {
  constructor(url: string, timeoutMs: number) {
    super(`Request to ${new URL(url).pathname} timed out after ${timeoutMs}ms`);
    this.name = 'FetchTimeoutError';
  }
}

/**
 * Non-2xx reply from an upstream HTTP service.
 */
export class UpstreamResponseError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = 'UpstreamResponseError';
  }
}

/**
 * Fetch and read the reply through `read` under one deadline. The timer runs
 * until `read` settles, so a body that stalls after the headers still aborts.
 */
export async function fetchWithTimeout<T>(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, { ...init, signal: controller.signal });
    return await read(response);
  } catch (error) {
    if (controller.signal.aborted) {
      throw new FetchTimeoutError(url, timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

/**
 * POST a JSON body and return the parsed JSON reply. Non-2xx replies reject with the body text.
 */
export async function postJson(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  timeoutMs: number
): Promise<unknown> {
  return fetchWithTimeout(
    url,
    {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body)
    },
    timeoutMs,
    async (response) => {
      const text = await response.text();
      if (!response.ok) {
        throw new UpstreamResponseError(response.status, `${new URL(url).host} responded ${response.status}: ${text}`);
      }
      const payload: unknown = JSON.parse(text);
      return payload;
    }
  );
}
