/**
 * src/utils/datasetHelpers.ts
 *
 * File and download helpers for the hazard dataset. The dataset is fetched once
 * into local storage and reused on every later start.
 */

import fs from 'fs';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import fetch from 'node-fetch';
import { logger, describeError } from './logger';

export interface DatasetSource {
  url: string;
  path: string;
  downloadTimeoutMs: number;
}

/**
 * Ensures that the specified directory exists, creating it recursively if needed.
 */
export async function ensureDirectoryExists(directory: string): Promise<void> {
  try {
    await fs.promises.mkdir(directory, { recursive: true });
  } catch (err) {
    logger.error(`Error creating directory ${directory}`, { error: describeError(err) });
    throw err;
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

async function removeIfPresent(filePath: string): Promise<void> {
  try {
    await fs.promises.unlink(filePath);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return;
    logger.warn(`[DATA] Could not remove ${filePath}`, { error: describeError(err) });
  }
}

/**
 * Streams the resource at `url` to `destination`. The body is written to a
 * sibling `.download` file and renamed into place once complete, so a failed
 * download never leaves a partial file at `destination`.
 *
 * `timeoutMs` bounds the whole transfer. node-fetch's own timeout stops at the
 * response headers, so the body is destroyed once the remaining budget runs out.
 */
export async function downloadFile(url: string, destination: string, timeoutMs: number): Promise<number> {
  const deadline = Date.now() + timeoutMs;
  const res = await fetch(url, { timeout: timeoutMs });
  if (!res.ok) {
    throw new Error(`Failed to download file from ${url}: ${res.status} ${res.statusText}`);
  }

  const body = res.body;
  if (!(body instanceof Readable)) {
    throw new Error(`Download from ${url} returned no readable body`);
  }

  const tempPath = `${destination}.download`;
  const timer = setTimeout(() => {
    body.destroy(new Error(`Download from ${url} timed out after ${timeoutMs}ms`));
  }, Math.max(deadline - Date.now(), 0));

  try {
    const fileStream = fs.createWriteStream(tempPath);
    await pipeline(body, fileStream);
    await fs.promises.rename(tempPath, destination);
    return fileStream.bytesWritten;
  } catch (err) {
    await removeIfPresent(tempPath);
    throw err;
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Makes sure the dataset file exists locally, downloading it when missing.
 * Returns true when a download happened.
 */
export async function ensureDatasetFile(source: DatasetSource): Promise<boolean> {
  await ensureDirectoryExists(path.dirname(source.path));

  if (await fileExists(source.path)) {
    logger.info('[DATA] Dataset file exists locally', { path: source.path });
    return false;
  }

  logger.info('[DATA] Dataset file not found locally. Downloading...', { url: source.url, path: source.path });
  const startedAt = Date.now();
  const bytes = await downloadFile(source.url, source.path, source.downloadTimeoutMs);
  logger.info('[DATA] Downloaded dataset', {
    path: source.path,
    sizeMB: Number((bytes / 1024 / 1024).toFixed(2)),
    ms: Date.now() - startedAt,
  });
  return true;
}
