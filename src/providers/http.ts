import {
  InferenceAbortedError,
  InferenceFatalError,
  InferenceTransientError,
  errorMessage,
} from "../errors.js";

export function joinUrl(host: string, pathname: string): string {
  return `${host.replace(/\/+$/, "")}${pathname}`;
}

export function isTransientStatus(status: number): boolean {
  return status == 408 || status == 429 || status >= 500;
}

export function classifyStatus(
  status: number,
  detail: string,
): InferenceTransientError | InferenceFatalError {
  return isTransientStatus(status)
    ? new InferenceTransientError(`Endpoint returned HTTP ${status}.`, detail, status)
    : new InferenceFatalError(`Endpoint rejected the request with HTTP ${status}.`, detail, status);
}

/** Maps a failed `fetch` call: an aborted signal wins over the network error. */
export function classifyFetchError(
  err: unknown,
  host: string,
  signal?: AbortSignal,
): InferenceAbortedError | InferenceTransientError {
  if (signal?.aborted) {
    return new InferenceAbortedError();
  }
  return new InferenceTransientError(
    `Cannot reach the inference endpoint at ${host}.`,
    errorMessage(err),
  );
}

/** Yields the non-empty lines of an NDJSON body as they arrive. */
export async function* readLines(
  body: ReadableStream<Uint8Array>,
): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffered = "";

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      buffered += decoder.decode(value, { stream: true });

      let newline = buffered.indexOf("\n");
      while (newline != -1) {
        const line = buffered.slice(0, newline).trim();
        buffered = buffered.slice(newline + 1);
        if (line) yield line;
        newline = buffered.indexOf("\n");
      }
    }

    buffered += decoder.decode();
    if (buffered.trim()) yield buffered.trim();
  } finally {
    reader.releaseLock();
  }
}
