/**
 * phpforge Engine — HTTPS Downloader
 *
 * Fetches the Composer phar, its published checksum and the Symfony CLI
 * installer. HTTPS only; HTTP URLs are rejected before any request is made.
 */

import * as fs from "fs";
import * as path from "path";
import * as https from "https";
import { IncomingMessage } from "http";
import { pipeline } from "stream/promises";
import { text } from "stream/consumers";
import { DownloadError, errorMessage } from "./errors";
import { Logger } from "./utils/logger";

export interface DownloadResult {
  file_path: string;
  bytes_downloaded: number;
  duration_ms: number;
}

export interface Downloader {
  download(url: string, destDir: string, filename?: string): Promise<DownloadResult>;
  fetchText(url: string): Promise<string>;
}

export interface HttpsDownloaderOptions {
  /** Abort when no bytes arrive for this long (default 60 s) */
  idleTimeoutMs?: number;
  agent?: https.Agent;
}

const MAX_REDIRECTS = 5;
const IDLE_TIMEOUT_MS = 60_000;

function assertHttps(url: string): void {
  if (!url.startsWith("https://")) {
    throw new DownloadError(`Download URL must be HTTPS. Got: ${url}`, { url });
  }
}

function timeoutError(url: string, idleTimeoutMs: number): DownloadError {
  return new DownloadError(
    `Download timed out after ${idleTimeoutMs / 1000} seconds: ${url}`,
    { url },
  );
}

/**
 * GET a URL, following redirects, and hand the final 200 response to the caller.
 * The idle timeout covers the wait for headers only; see watchIdle() for the body.
 */
function get(
  url: string,
  redirectsLeft: number,
  options: { idleTimeoutMs: number; agent?: https.Agent },
): Promise<IncomingMessage> {
  return new Promise<IncomingMessage>((resolve, reject) => {
    assertHttps(url);
    let responded = false;

    const request = https.get(url, { agent: options.agent }, (response) => {
      responded = true;
      const { statusCode, headers } = response;

      if (statusCode && statusCode >= 300 && statusCode < 400 && headers.location) {
        response.resume();
        if (redirectsLeft <= 0) {
          reject(new DownloadError(`Too many redirects for ${url}`, { url }));
          return;
        }
        const next = new URL(headers.location, url).toString();
        get(next, redirectsLeft - 1, options).then(resolve, reject);
        return;
      }

      if (statusCode !== 200) {
        response.resume();
        reject(
          new DownloadError(`Download failed: HTTP ${statusCode} for ${url}`, {
            url,
            status: statusCode,
          }),
        );
        return;
      }

      resolve(response);
    });

    request.on("error", (err) => {
      reject(new DownloadError(`Download request failed: ${err.message}`, { url }));
    });

    request.setTimeout(options.idleTimeoutMs, () => {
      if (responded) return;
      request.destroy();
      reject(timeoutError(url, options.idleTimeoutMs));
    });
  });
}

/** Destroy the body stream with a DownloadError once it stalls */
function watchIdle(response: IncomingMessage, url: string, idleTimeoutMs: number): void {
  response.setTimeout(idleTimeoutMs, () => {
    response.destroy(timeoutError(url, idleTimeoutMs));
  });
}

function interrupted(url: string, err: unknown): DownloadError {
  return err instanceof DownloadError
    ? err
    : new DownloadError(`Download interrupted: ${errorMessage(err)}: ${url}`, { url });
}

export class HttpsDownloader implements Downloader {
  private readonly idleTimeoutMs: number;

  constructor(
    private readonly logger: Logger,
    private readonly options: HttpsDownloaderOptions = {},
  ) {
    this.idleTimeoutMs = options.idleTimeoutMs ?? IDLE_TIMEOUT_MS;
  }

  private request(url: string): Promise<IncomingMessage> {
    return get(url, MAX_REDIRECTS, { ...this.options, idleTimeoutMs: this.idleTimeoutMs });
  }

  async download(
    url: string,
    destDir: string,
    filename?: string,
  ): Promise<DownloadResult> {
    assertHttps(url);

    const resolvedFilename =
      filename || path.basename(new URL(url).pathname) || "download";
    const destPath = path.join(destDir, resolvedFilename);
    fs.mkdirSync(destDir, { recursive: true });

    this.logger.info({ url, dest: destPath }, "Starting download");
    const startTime = Date.now();
    const response = await this.request(url);
    watchIdle(response, url, this.idleTimeoutMs);

    const expectedBytes = Number(response.headers["content-length"] ?? NaN);
    let downloadedBytes = 0;
    response.on("data", (chunk: Buffer) => {
      downloadedBytes += chunk.length;
    });

    try {
      await pipeline(response, fs.createWriteStream(destPath));
      if (Number.isFinite(expectedBytes) && downloadedBytes !== expectedBytes) {
        throw new DownloadError(
          `Download incomplete: got ${downloadedBytes} of ${expectedBytes} bytes: ${url}`,
          { url },
        );
      }
    } catch (err) {
      fs.rmSync(destPath, { force: true });
      this.logger.warn({ url, error: errorMessage(err) }, "Download failed");
      throw interrupted(url, err);
    }

    const duration = Date.now() - startTime;
    this.logger.info(
      { dest: destPath, bytes: downloadedBytes, duration_ms: duration },
      "Download complete",
    );
    return {
      file_path: destPath,
      bytes_downloaded: downloadedBytes,
      duration_ms: duration,
    };
  }

  async fetchText(url: string): Promise<string> {
    const response = await this.request(url);
    watchIdle(response, url, this.idleTimeoutMs);

    try {
      return await text(response);
    } catch (err) {
      throw interrupted(url, err);
    }
  }
}
