import { z } from 'zod';
import { ImportError, downloadError, errorMessage } from '../errors.js';

export const manifestSchema = z.array(
  z.object({
    name: z.string().trim().min(1),
    url: z.string().url(),
    size: z.number().int().nonnegative().optional(),
  })
);

export type ManifestEntry = z.infer<typeof manifestSchema>[number];

/** The slice of a fetch `Response` the downloader reads. */
export type FetchResponse = {
  ok: boolean;
  status: number;
  arrayBuffer(): Promise<ArrayBufferLike>;
};

export type FetchLike = (url: string, init?: { signal?: AbortSignal }) => Promise<FetchResponse>;

export type DownloadOptions = {
  timeoutMs: number;
  maxBytes: number;
  fetchImpl?: FetchLike;
};

export type DownloadResult =
  | { name: string; ok: true; bytes: Uint8Array }
  | { name: string; ok: false; error: string };

export function parseManifest(input: unknown): ManifestEntry[] {
  return manifestSchema.parse(input);
}

export async function downloadFile(entry: ManifestEntry, options: DownloadOptions): Promise<Uint8Array> {
  const { timeoutMs, maxBytes, fetchImpl = fetch } = options;
  if (entry.size !== undefined && entry.size > maxBytes) {
    throw downloadError(`${entry.name}: declared size ${entry.size} exceeds the ${maxBytes} byte limit`);
  }

  let bytes: Uint8Array;
  try {
    const response = await fetchImpl(entry.url, { signal: AbortSignal.timeout(timeoutMs) });
    if (!response.ok) {
      throw downloadError(`${entry.name}: server responded with ${response.status}`);
    }
    bytes = new Uint8Array(await response.arrayBuffer());
  } catch (error) {
    if (error instanceof ImportError) throw error;
    throw downloadError(`${entry.name}: ${errorMessage(error)}`, error);
  }

  if (bytes.byteLength > maxBytes) {
    throw downloadError(`${entry.name}: ${bytes.byteLength} bytes exceeds the ${maxBytes} byte limit`);
  }
  return bytes;
}

/** Fetches every entry concurrently; one failed download does not affect the others. */
export async function downloadFiles(
  manifest: readonly ManifestEntry[],
  options: DownloadOptions
): Promise<DownloadResult[]> {
  return Promise.all(
    manifest.map(async (entry): Promise<DownloadResult> => {
      try {
        return { name: entry.name, ok: true, bytes: await downloadFile(entry, options) };
      } catch (error) {
        return { name: entry.name, ok: false, error: errorMessage(error) };
      }
    })
  );
}
