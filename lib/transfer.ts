import axios, { type AxiosInstance } from 'axios';
import { promises as fs } from 'fs';
import path from 'path';
import { HttpError, TooLargeError, TransferError, toCatalogError } from './errors';
import { assertAbsoluteUrl } from './fetcher';
import { baseMimeType, extensionFor } from './formats';
import type { AcquisitionLink, DownloadedFile, Entry } from './types';
import { createReadableFilename } from './utils/filename';

export interface TransferRequest {
  entry: Entry;
  link: AcquisitionLink;
}

/**
 * Moves one book from the server into a local file
 */
export type BookTransfer = (request: TransferRequest) => Promise<DownloadedFile>;

export interface HttpTransferOptions {
  client?: AxiosInstance;
  timeoutMs: number;
  maxBytes: number;
  userAgent: string;
  stagingDir: string;
}

export function createHttpTransfer(options: HttpTransferOptions): BookTransfer {
  return async ({ entry, link }) => {
    const { data, contentType } = await downloadBytes(link.href, options);
    const mimeType = baseMimeType(link.mimeType) || baseMimeType(contentType) || 'application/octet-stream';
    const fileName = createReadableFilename(entry.title, entry.authors, extensionFor({ href: link.href, mimeType }));

    console.log(`[Download] Received ${fileName} (${data.byteLength} bytes)`);
    return writeFileAtomic(options.stagingDir, fileName, data, mimeType);
  };
}

async function downloadBytes(url: string, options: HttpTransferOptions): Promise<{ data: Buffer; contentType: string }> {
  const { client = axios, timeoutMs, maxBytes, userAgent } = options;
  assertAbsoluteUrl(url);

  try {
    console.log('[Download] Downloading file from:', url);
    const response = await client.get<ArrayBuffer>(url, {
      responseType: 'arraybuffer',
      headers: {
        'User-Agent': userAgent,
      },
      timeout: timeoutMs,
      maxContentLength: maxBytes,
      validateStatus: () => true,
    });

    if (response.status < 200 || response.status >= 300) {
      throw new HttpError(response.status, url);
    }

    const data = Buffer.from(response.data);
    if (data.byteLength > maxBytes) {
      throw new TooLargeError(maxBytes, url);
    }
    if (data.byteLength === 0) {
      throw new TransferError(`Server sent an empty file for ${url}`);
    }

    const contentType = response.headers['content-type'];
    return { data, contentType: typeof contentType === 'string' ? contentType : '' };
  } catch (error) {
    throw toCatalogError(error, url);
  }
}

/**
 * Writes `data` under a fresh directory inside `stagingDir`. The file only
 * appears under its final name once completely written.
 */
export async function writeFileAtomic(
  stagingDir: string,
  fileName: string,
  data: Buffer,
  mimeType: string
): Promise<DownloadedFile> {
  await fs.mkdir(stagingDir, { recursive: true });
  const dir = await fs.mkdtemp(path.join(stagingDir, 'opds-'));
  const finalPath = path.join(dir, fileName);
  const partPath = `${finalPath}.part`;

  try {
    await fs.writeFile(partPath, data);
    await fs.rename(partPath, finalPath);
  } catch (error) {
    await fs.rm(dir, { recursive: true, force: true });
    throw new TransferError(`Could not write ${fileName}`, error);
  }

  return { path: finalPath, fileName, mimeType, size: data.byteLength };
}

/**
 * Removes a staged file and the directory created for it
 */
export async function discardStagedFile(file: DownloadedFile): Promise<void> {
  await fs.rm(path.dirname(file.path), { recursive: true, force: true });
}
