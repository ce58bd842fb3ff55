/**
 * CSV Reader - streams a CSV file one record at a time
 *
 * Handles:
 * - UTF-8 BOM stripping
 * - Windows (\r\n) and Unix (\n) line endings
 * - Quoted fields with embedded delimiters and escaped quotes ("")
 * - Blank lines before the header (skipped); later ones become a single empty field
 *
 * Records are line based: a quoted field cannot span lines.
 */

import { createReadStream } from 'fs';
import { stat } from 'fs/promises';
import { createInterface } from 'readline';

export function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Parse a single CSV line into trimmed fields, respecting quoted values.
 */
export function parseFields(line: string, delimiter = ','): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;
  let i = 0;

  while (i < line.length) {
    const ch = line[i];

    if (inQuotes) {
      if (ch === '"') {
        // Escaped quote ""
        if (i + 1 < line.length && line[i + 1] === '"') {
          current += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
        i++;
        continue;
      }
      current += ch;
      i++;
    } else {
      if (ch === '"' && current.trim().length === 0) {
        current = '';
        inQuotes = true;
        i++;
        continue;
      }
      if (ch === delimiter) {
        fields.push(current.trim());
        current = '';
        i++;
        continue;
      }
      current += ch;
      i++;
    }
  }

  fields.push(current.trim());
  return fields;
}

/**
 * Yield the fields of the first non-blank line (the header) and of every line
 * after it. A blank data line yields `['']`, so it still counts as a row. The
 * file is read lazily; memory use does not grow with file size.
 */
export async function* readCsvRecords(path: string): AsyncGenerator<string[]> {
  // Fails fast with ENOENT instead of an error event mid-iteration
  await stat(path);

  const input = createReadStream(path, { encoding: 'utf8' });
  const lines = createInterface({ input, crlfDelay: Infinity });
  let firstLine = true;
  let seenHeader = false;

  try {
    for await (const raw of lines) {
      const line = firstLine ? stripBom(raw) : raw;
      firstLine = false;
      if (!seenHeader) {
        if (line.trim().length === 0) continue;
        seenHeader = true;
      }
      yield parseFields(line);
    }
  } finally {
    lines.close();
    input.destroy();
  }
}

/** Fields of the first non-blank line, or undefined for an empty file. */
export async function readHeader(path: string): Promise<string[] | undefined> {
  const records = readCsvRecords(path);
  try {
    const first = await records.next();
    return first.done ? undefined : first.value;
  } finally {
    await records.return(undefined);
  }
}

/** Group an async stream into arrays of at most `size` items. */
export async function* inBatches<T>(items: AsyncIterable<T>, size: number): AsyncGenerator<T[]> {
  let batch: T[] = [];
  for await (const item of items) {
    batch.push(item);
    if (batch.length >= size) {
      yield batch;
      batch = [];
    }
  }
  if (batch.length > 0) yield batch;
}
