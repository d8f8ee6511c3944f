/**
 * `fetch` with a per-call timeout. An optional parent signal (the caller's
 * deadline) aborts the request as well; both surface as an `AbortError`.
 *
 * The timeout and the parent link stay armed until `readResponse` settles,
 * so a stalled body is cancelled the same way as a stalled connection.
 */
export async function fetchWithTimeout<T>(
  url: string,
  options: RequestInit,
  timeoutMs: number,
  readResponse: (response: Response, signal: AbortSignal) => Promise<T>,
  parentSignal?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  const onParentAbort = (): void => controller.abort();

  if (parentSignal?.aborted) {
    controller.abort();
  } else {
    parentSignal?.addEventListener('abort', onParentAbort, { once: true });
  }

  try {
    const response = await fetch(url, {
      ...options,
      signal: controller.signal,
    });
    return await readResponse(response, controller.signal);
  } finally {
    clearTimeout(timeoutId);
    parentSignal?.removeEventListener('abort', onParentAbort);
  }
}
