import { PassThrough } from 'node:stream';
import archiver from 'archiver';

export interface ArchiveEntry {
  name: string;
  content: Buffer;
}

/**
 * Give repeated names a ` (n)` suffix before the extension so every entry
 * in the archive is distinct: `a.txt`, `a (1).txt`, `a (2).txt`.
 */
export function dedupeEntryNames(names: readonly string[]): string[] {
  const seen = new Map<string, number>();
  const taken = new Set<string>();
  const result: string[] = [];

  for (const original of names) {
    let count = seen.get(original) ?? 0;
    let candidate = original;
    while (taken.has(candidate)) {
      count += 1;
      const dot = original.lastIndexOf('.');
      const base = dot > 0 ? original.slice(0, dot) : original;
      const ext = dot > 0 ? original.slice(dot) : '';
      candidate = `${base} (${count})${ext}`;
    }
    seen.set(original, count);
    taken.add(candidate);
    result.push(candidate);
  }

  return result;
}

/** Build a zip in memory from already-loaded entries. */
export async function buildZipArchive(entries: readonly ArchiveEntry[]): Promise<Buffer> {
  const archive = archiver('zip', { zlib: { level: 1 } });
  const sink = new PassThrough();
  const chunks: Buffer[] = [];

  const collected = new Promise<void>((resolve, reject) => {
    sink.on('data', (chunk: Buffer) => chunks.push(chunk));
    sink.on('end', resolve);
    sink.on('error', reject);
    archive.on('error', reject);
  });

  archive.pipe(sink);

  const names = dedupeEntryNames(entries.map((entry) => entry.name));
  entries.forEach((entry, i) => {
    archive.append(entry.content, { name: names[i] ?? entry.name });
  });

  await Promise.all([archive.finalize(), collected]);
  return Buffer.concat(chunks);
}
