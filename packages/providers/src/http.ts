/** Settles with the body text, or rejects once `signal` aborts, whichever comes first. */
export function readBodyText(response: Response, signal: AbortSignal): Promise<string> {
  if (signal.aborted) {
    return Promise.reject(new Error('aborted before the body was read'));
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => reject(new Error('aborted while reading the body'));
    signal.addEventListener('abort', onAbort, { once: true });
    response.text().then(
      (text) => {
        signal.removeEventListener('abort', onAbort);
        resolve(text);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
