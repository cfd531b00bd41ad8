import Papa from 'papaparse';
import { DatasetParseError } from '../errors';
import type { RowRange } from '../jobs/model';

export type CsvRow = Record<string, string>;

export interface CsvDataset {
  fields: string[];
  rows: CsvRow[];
}

const decoder = new TextDecoder('utf-8');

export function parseCsv(input: Uint8Array | string, filename = 'dataset.csv'): CsvDataset {
  const text = (typeof input === 'string' ? input : decoder.decode(input)).replace(/^\uFEFF/u, '');
  if (!text.trim()) {
    return { fields: [], rows: [] };
  }

  const result = Papa.parse<CsvRow>(text, {
    header: true,
    skipEmptyLines: true,
  });

  // single-column files have no delimiter to detect; papaparse falls back to ','
  const problems = result.errors.filter((e) => e.type !== 'Delimiter');
  if (problems.length > 0) {
    throw new DatasetParseError(
      filename,
      problems.map((e) => (typeof e.row === 'number' ? `row ${e.row + 1}: ${e.message}` : e.message))
    );
  }

  const fields = result.meta.fields ?? [];
  const rows = result.data.map((row) => {
    const normalized: CsvRow = {};
    for (const field of fields) normalized[field] = row[field] ?? '';
    return normalized;
  });

  return { fields, rows };
}

export function serializeCsv(dataset: CsvDataset): string {
  return Papa.unparse(
    {
      fields: dataset.fields,
      data: dataset.rows.map((row) => dataset.fields.map((field) => row[field] ?? '')),
    },
    { newline: '\n' }
  );
}

export function sliceRows(dataset: CsvDataset, range: RowRange): CsvDataset {
  return { fields: [...dataset.fields], rows: dataset.rows.slice(range.start, range.end) };
}

/**
 * Concatenates datasets in the given order. Columns are the union of all
 * headers, in order of first appearance; missing cells become empty.
 */
export function concatDatasets(datasets: CsvDataset[]): CsvDataset {
  const fields: string[] = [];
  const seen = new Set<string>();
  for (const dataset of datasets) {
    for (const field of dataset.fields) {
      if (!seen.has(field)) {
        seen.add(field);
        fields.push(field);
      }
    }
  }

  const rows = datasets.flatMap((dataset) =>
    dataset.rows.map((row) => {
      const merged: CsvRow = {};
      for (const field of fields) merged[field] = row[field] ?? '';
      return merged;
    })
  );

  return { fields, rows };
}
