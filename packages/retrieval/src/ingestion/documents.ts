/**
 * FILE PURPOSE: Turn recipe sources (plain text, CSV exports) into RecipeDocuments
 * WHY: The corpus builder takes documents, not files. CSV rows keep selected
 *      columns as metadata so passages can be traced back to their recipe.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import Papa from 'papaparse';
import type { MetadataValue, RecipeDocument } from '@recipe-qa/shared-types';

export interface TableColumns {
  textColumn: string;
  metaColumns: readonly string[];
}

function toMetadataValue(value: unknown): MetadataValue {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  return String(value);
}

/**
 * One document per row with non-blank text. `sourceRow` is the row's
 * position in `rows`, counted before blank rows are skipped.
 */
export function rowsToDocuments(
  rows: readonly Record<string, unknown>[],
  { textColumn, metaColumns }: TableColumns,
): RecipeDocument[] {
  const docs: RecipeDocument[] = [];
  rows.forEach((row, sourceRow) => {
    const cell = row[textColumn];
    const text = cell === undefined || cell === null ? '' : String(cell);
    if (!text.trim()) return;

    const metadata: Record<string, MetadataValue> = { sourceRow };
    for (const col of metaColumns) {
      metadata[col] = toMetadataValue(row[col]);
    }
    docs.push({ text, metadata });
  });
  return docs;
}

/** Parse a CSV export with a header row. Empty lines are skipped. */
export function parseRecipeCsv(csv: string, columns: TableColumns): RecipeDocument[] {
  const parsed = Papa.parse<Record<string, unknown>>(csv, { header: true, skipEmptyLines: true });
  if (parsed.errors.length > 0) {
    const first = parsed.errors[0];
    process.stderr.write(`WARN: CSV parse reported ${parsed.errors.length} issue(s), first: ${first?.message ?? 'unknown'}\n`);
  }
  return rowsToDocuments(parsed.data, columns);
}

/**
 * Read a recipe file. `.csv` yields one document per row; anything else is a
 * single document. Returns null when the file does not exist.
 */
export async function loadRecipeDocuments(path: string, columns: TableColumns): Promise<RecipeDocument[] | null> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) {
      process.stderr.write(`WARN: Recipe file not found: ${path}\n`);
      return null;
    }
    throw err;
  }

  if (extname(path).toLowerCase() === '.csv') {
    return parseRecipeCsv(content, columns);
  }
  return content.trim() ? [{ text: content, metadata: {} }] : [];
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
