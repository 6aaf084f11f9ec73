import { describe, it, expect } from 'vitest';
import { buildZipArchive, dedupeEntryNames } from './archive.js';

describe('dedupeEntryNames', () => {
  it('should leave distinct names untouched', () => {
    expect(dedupeEntryNames(['a.txt', 'b.txt'])).toEqual(['a.txt', 'b.txt']);
  });

  it('should number repeated names before the extension', () => {
    expect(dedupeEntryNames(['a.txt', 'a.txt', 'a.txt'])).toEqual([
      'a.txt',
      'a (1).txt',
      'a (2).txt',
    ]);
  });

  it('should number names without an extension at the end', () => {
    expect(dedupeEntryNames(['notes', 'notes'])).toEqual(['notes', 'notes (1)']);
  });

  it('should skip a suffix that an earlier entry already uses', () => {
    expect(dedupeEntryNames(['a (1).txt', 'a.txt', 'a.txt'])).toEqual([
      'a (1).txt',
      'a.txt',
      'a (2).txt',
    ]);
  });
});

describe('buildZipArchive', () => {
  it('should produce a zip containing every entry name', async () => {
    const zip = await buildZipArchive([
      { name: 'invoice.pdf', content: Buffer.from('%PDF-1.4 test') },
      { name: 'invoice.pdf', content: Buffer.from('%PDF-1.4 other') },
    ]);

    // Local file header signature
    expect(zip.subarray(0, 4)).toEqual(Buffer.from([0x50, 0x4b, 0x03, 0x04]));
    const text = zip.toString('latin1');
    expect(text).toContain('invoice.pdf');
    expect(text).toContain('invoice (1).pdf');
  });

  it('should produce a valid empty archive when there are no entries', async () => {
    const zip = await buildZipArchive([]);
    // End of central directory record only
    expect(zip.subarray(0, 4)).toEqual(Buffer.from([0x50, 0x4b, 0x05, 0x06]));
  });
});
