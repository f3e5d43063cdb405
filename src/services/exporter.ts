import { mkdir, rm, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { ExportOptions } from '../config';
import type { FieldName, NormalizedRecord } from '../types/job';
import { logger } from '../utils/logger';

export interface ExportResult {
  written: boolean;
  entries: number;
  path?: string;
}

/**
 * The character a free-text field must not carry for the chosen scheme
 */
export function activeDelimiter(options: ExportOptions): string {
  return options.scheme === 'standard' ? options.delimiter : options.recordDelimiter;
}

/**
 * Quotes a value when it contains the delimiter, a quote or a line break
 */
export function quoteField(value: string, delimiter: string): string {
  if (value.includes(delimiter) || /["\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * One line per record, header first, every line newline-terminated
 */
export function formatStandard(
  records: NormalizedRecord[],
  fieldNames: FieldName[],
  options: ExportOptions
): string {
  const line = (values: string[]): string =>
    values.map(value => quoteField(value || options.placeholder, options.delimiter)).join(options.delimiter);

  const lines = [
    line(fieldNames),
    ...records.map(record => line(fieldNames.map(name => record[name] ?? ''))),
  ];
  return lines.map(l => `${l}\n`).join('');
}

/**
 * Strips both delimiters and line breaks; an empty result becomes the placeholder
 */
export function cleanFlattenedValue(value: string, options: ExportOptions): string {
  let cleaned = value.replace(/[\r\n]+/g, ' ');
  // Removing one token can join its neighbours into another
  while (cleaned.includes(options.fieldDelimiter) || cleaned.includes(options.recordDelimiter)) {
    cleaned = cleaned
      .split(options.fieldDelimiter).join('')
      .split(options.recordDelimiter).join('');
  }
  return cleaned.trim() || options.placeholder;
}

/**
 * Single line: fields joined by the field delimiter, records (header included) by the record delimiter
 */
export function formatFlattened(
  records: NormalizedRecord[],
  fieldNames: FieldName[],
  options: ExportOptions
): string {
  const row = (values: string[]): string =>
    values.map(value => cleanFlattenedValue(value, options)).join(options.fieldDelimiter);

  return [
    row(fieldNames),
    ...records.map(record => row(fieldNames.map(name => record[name] ?? ''))),
  ].join(options.recordDelimiter);
}

/**
 * Writes normalized records to a delimited text file.
 * An existing file at the target path is replaced, never appended to.
 */
export class JobExporter {
  constructor(private options: ExportOptions) {}

  format(records: NormalizedRecord[], fieldNames: FieldName[]): string {
    return this.options.scheme === 'standard'
      ? formatStandard(records, fieldNames, this.options)
      : formatFlattened(records, fieldNames, this.options);
  }

  async export(
    records: NormalizedRecord[],
    fieldNames: FieldName[],
    filePath: string
  ): Promise<ExportResult> {
    if (records.length === 0) {
      logger.info('No jobs found matching criteria.');
      return { written: false, entries: 0 };
    }

    const content = this.format(records, fieldNames);

    await mkdir(dirname(filePath), { recursive: true });
    await rm(filePath, { force: true });
    await writeFile(filePath, content, 'utf-8');

    logger.info(`File saved: ${filePath} (${records.length} entries)`, {
      scheme: this.options.scheme,
    });
    return { written: true, entries: records.length, path: filePath };
  }
}
