/**
 * Recipe dataset loader (CSV).
 *
 * Expected columns (header names are trimmed and lowercased):
 *   name | title          recipe name
 *   minutes | time_minutes total time
 *   tags, ingredients     list cells, e.g. ['main-dish', 'easy']
 *   id, description       optional
 */

import fs from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { logger } from '../../../lib/logger/structured-logger.js';
import type { RecipeRecord } from '../types.js';

export class DatasetError extends Error {
  constructor(message: string, public readonly details?: unknown) {
    super(message);
    this.name = 'DatasetError';
  }
}

/**
 * Quoted fields may hold commas, newlines and doubled quotes. A stray quote
 * inside an unquoted field is kept as text. Blank lines are dropped.
 * @throws DatasetError on malformed CSV, e.g. an unterminated quoted field
 */
export function parseCsv(text: string, source = '<inline>'): string[][] {
  try {
    const rows: string[][] = parse(text, {
      bom: true,
      relax_quotes: true,
      relax_column_count: true,
      skip_empty_lines: true,
      skip_records_with_empty_values: true,
    });
    return rows;
  } catch (err) {
    throw new DatasetError(`Dataset ${source} is not valid CSV: ${err instanceof Error ? err.message : String(err)}`, err);
  }
}

/**
 * Parse a list-like cell: "['a', \"b's\"]" → ["a", "b's"].
 * A cell without brackets is read as a comma-separated list.
 */
export function parseListCell(cell: string): string[] {
  const trimmed = cell.trim();
  if (!trimmed || trimmed === '[]') return [];
  if (!trimmed.startsWith('[')) {
    return trimmed.split(',').map(s => s.trim()).filter(Boolean);
  }

  const items: string[] = [];
  let i = 1;
  while (i < trimmed.length) {
    const quote = trimmed[i];
    if (quote !== "'" && quote !== '"') {
      i++;
      continue;
    }
    let value = '';
    let j = i + 1;
    while (j < trimmed.length && trimmed[j] !== quote) {
      if (trimmed[j] === '\\' && j + 1 < trimmed.length) {
        value += trimmed[j + 1];
        j += 2;
        continue;
      }
      value += trimmed[j];
      j++;
    }
    if (value.trim()) items.push(value.trim());
    i = j + 1;
  }

  if (items.length === 0) {
    return trimmed.slice(1, trimmed.endsWith(']') ? -1 : undefined)
      .split(',')
      .map(s => s.trim())
      .filter(Boolean);
  }
  return items;
}

function findColumn(header: readonly string[], names: readonly string[]): number {
  for (const name of names) {
    const idx = header.indexOf(name);
    if (idx !== -1) return idx;
  }
  return -1;
}

/**
 * Turn CSV text into recipe records.
 * Rows whose minutes are not a finite non-negative number are skipped.
 * @param source - File name for messages
 * @throws DatasetError when the CSV is malformed or a required column is missing
 */
export function recordsFromCsv(text: string, source = '<inline>'): RecipeRecord[] {
  const [headerRow, ...rows] = parseCsv(text, source);
  if (!headerRow) {
    throw new DatasetError(`Dataset ${source} is empty`);
  }

  const header = headerRow.map(h => h.trim().toLowerCase());
  const columns = {
    id: findColumn(header, ['id']),
    title: findColumn(header, ['name', 'title']),
    minutes: findColumn(header, ['minutes', 'time_minutes']),
    tags: findColumn(header, ['tags']),
    ingredients: findColumn(header, ['ingredients']),
    description: findColumn(header, ['description']),
  };

  const missing = [
    columns.title === -1 ? 'name' : null,
    columns.minutes === -1 ? 'minutes' : null,
    columns.tags === -1 ? 'tags' : null,
    columns.ingredients === -1 ? 'ingredients' : null,
  ].filter((c): c is string => c !== null);
  if (missing.length > 0) {
    throw new DatasetError(`Dataset ${source} is missing required columns: ${missing.join(', ')}`, { header });
  }

  const cell = (row: readonly string[], idx: number): string => (idx === -1 ? '' : row[idx] ?? '');

  const records: RecipeRecord[] = [];
  let skipped = 0;
  rows.forEach((row, i) => {
    const minutesText = cell(row, columns.minutes).trim();
    const minutes = Number(minutesText);
    if (minutesText === '' || !Number.isFinite(minutes) || minutes < 0) {
      skipped++;
      return;
    }
    records.push({
      id: cell(row, columns.id).trim() || String(i + 1),
      title: cell(row, columns.title).trim(),
      description: cell(row, columns.description).trim(),
      tags: parseListCell(cell(row, columns.tags)),
      ingredients: parseListCell(cell(row, columns.ingredients)),
      timeMinutes: minutes,
    });
  });

  if (skipped > 0) {
    logger.warn({ event: 'dataset_rows_skipped', source, skipped }, '[DATASET] Rows with invalid minutes skipped');
  }
  return records;
}

export async function loadRecipesCsv(filePath: string): Promise<RecipeRecord[]> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (err) {
    throw new DatasetError(`Cannot read dataset ${filePath}`, err);
  }

  const records = recordsFromCsv(text, filePath);
  logger.info({ event: 'dataset_loaded', source: filePath, count: records.length }, '[DATASET] Recipes loaded');
  return records;
}
