import fs from 'node:fs';
import path from 'node:path';
import { Readable, Transform } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { AccessDeniedError, errorMessage, SiteError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface HttpOptions {
  timeoutMs: number;
  userAgent: string;
  /** Caller's cancellation; aborts the request and any body still streaming. */
  signal?: AbortSignal;
}

export interface FileDownload {
  path: string;
  bytes: number;
  contentType: string;
}

function checkResponse(response: Response, url: string): void {
  if (response.status === 401 || response.status === 403) {
    throw new AccessDeniedError(`Access denied (${response.status}) for ${url}`, {
      url,
      status: response.status,
    });
  }
  if (!response.ok) {
    throw new SiteError(`Request failed: ${response.status} from ${url}`, {
      url,
      status: response.status,
    });
  }
}

function wrapFetchError(err: unknown, url: string, options: HttpOptions): Error {
  if (err instanceof SiteError || err instanceof AccessDeniedError) return err;
  if (err instanceof Error && err.name === 'AbortError') {
    if (options.signal?.aborted) {
      return new SiteError(`Request cancelled: ${url}`, { url });
    }
    return new SiteError(`Request timed out after ${options.timeoutMs}ms: ${url}`, { url, timeout: options.timeoutMs });
  }
  return new SiteError(`Request failed: ${errorMessage(err)}`, { url });
}

/**
 * A signal that fires on the request timeout or when the caller aborts.
 */
function requestSignal(options: HttpOptions): { signal: AbortSignal; release: () => void } {
  const controller = new AbortController();
  const abort = (): void => controller.abort();
  const timer = setTimeout(abort, options.timeoutMs);
  const caller = options.signal;

  if (caller?.aborted) abort();
  else caller?.addEventListener('abort', abort, { once: true });

  return {
    signal: controller.signal,
    release: () => {
      clearTimeout(timer);
      caller?.removeEventListener('abort', abort);
    },
  };
}

function removePartFile(partPath: string): void {
  if (fs.statSync(partPath, { throwIfNoEntry: false })?.isFile()) {
    fs.rmSync(partPath, { force: true });
  }
}

/**
 * GET a URL and return its body as text.
 */
export async function fetchText(url: string, options: HttpOptions, accept = 'text/html, */*'): Promise<string> {
  const { signal, release } = requestSignal(options);

  try {
    const response = await fetch(url, {
      headers: { 'User-Agent': options.userAgent, Accept: accept },
      signal,
      redirect: 'follow',
    });
    checkResponse(response, url);
    return await response.text();
  } catch (err) {
    throw wrapFetchError(err, url, options);
  } finally {
    release();
  }
}

/**
 * Stream a URL to `destPath` without buffering it in memory. The body goes to
 * `<destPath>.part` first and is renamed into place once complete; the part
 * file is removed on failure.
 */
export async function downloadToFile(
  url: string,
  destPath: string,
  options: HttpOptions & { onProgress?: (bytes: number, totalBytes?: number) => void },
): Promise<FileDownload> {
  const { signal, release } = requestSignal(options);
  const partPath = `${destPath}.part`;

  try {
    const response = await fetch(url, {
      headers: { 'User-Agent': options.userAgent },
      signal,
      redirect: 'follow',
    });
    checkResponse(response, url);

    if (!response.body) {
      throw new SiteError(`Empty response body from ${url}`, { url });
    }

    const lengthHeader = response.headers.get('content-length');
    const totalBytes = lengthHeader ? parseInt(lengthHeader, 10) || undefined : undefined;
    const contentType = response.headers.get('content-type') ?? '';

    fs.mkdirSync(path.dirname(destPath), { recursive: true });
    let bytes = 0;
    const meter = new Transform({
      transform(chunk: Uint8Array, _encoding, callback) {
        bytes += chunk.byteLength;
        options.onProgress?.(bytes, totalBytes);
        callback(null, chunk);
      },
    });

    await pipeline(Readable.fromWeb(response.body), meter, fs.createWriteStream(partPath), { signal });

    if (bytes === 0) {
      throw new SiteError(`Downloaded file is empty: ${url}`, { url });
    }
    if (totalBytes && totalBytes !== bytes) {
      // Some servers misreport Content-Length; keep the file.
      logger.warn({ url, expected: totalBytes, received: bytes }, 'Size mismatch after download');
    }

    fs.renameSync(partPath, destPath);
    return { path: destPath, bytes, contentType };
  } catch (err) {
    removePartFile(partPath);
    throw wrapFetchError(err, url, options);
  } finally {
    release();
  }
}
