import { readFile } from 'fs/promises';
import Papa from 'papaparse';
import axios from 'axios';
import { RawRow, RawTable, createLogger } from '@review-lens/shared';
import { SourceUnavailableError, describeError } from './errors.js';

/**
 * Anything that can hand the pipeline a raw review table.
 * Implementations own their own timeouts; the pipeline never retries.
 */
export interface DatasetSource {
  describe(): string;
  fetch(): Promise<RawTable>;
}

const logger = createLogger('DatasetSource');

/**
 * Parse CSV text with a header row into a raw table
 */
export function parseCsv(text: string, sourceName: string): RawTable {
  const result = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  const columns = result.meta.fields ?? [];
  if (columns.length === 0) {
    throw new SourceUnavailableError(sourceName, 'dataset has no header row');
  }

  if (result.errors.length > 0) {
    logger.warn(`CSV parser reported ${result.errors.length} issue(s)`, {
      source: sourceName,
      firstIssue: result.errors[0]?.message,
    });
  }

  const rows: RawRow[] = result.data.map((row) => Object.freeze({ ...row }));
  return Object.freeze({ columns: Object.freeze([...columns]), rows: Object.freeze(rows) });
}

/**
 * Reads the dataset from a CSV file on disk
 */
export class CsvFileSource implements DatasetSource {
  constructor(private readonly path: string) {}

  describe(): string {
    return `file:${this.path}`;
  }

  async fetch(): Promise<RawTable> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (error) {
      throw new SourceUnavailableError(this.describe(), describeError(error), { cause: error });
    }
    return parseCsv(text, this.describe());
  }
}

export interface HttpCsvSourceOptions {
  timeoutMs?: number;
}

/**
 * Downloads the dataset as CSV over HTTP(S)
 */
export class HttpCsvSource implements DatasetSource {
  private readonly timeoutMs: number;

  constructor(private readonly url: string, options: HttpCsvSourceOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  describe(): string {
    return this.url;
  }

  async fetch(): Promise<RawTable> {
    let text: string;
    try {
      const response = await axios.get<string>(this.url, {
        timeout: this.timeoutMs,
        responseType: 'text',
        // Keep the body as text even when the server labels it JSON
        transformResponse: (data: string) => data,
      });
      text = response.data;
    } catch (error) {
      throw new SourceUnavailableError(this.describe(), describeError(error), { cause: error });
    }
    return parseCsv(text, this.describe());
  }
}

export interface DatasetSourceConfig {
  DATASET_PATH?: string;
  DATASET_URL?: string;
  DATASET_TIMEOUT_MS: number;
}

/**
 * Pick the dataset source named by configuration. A local path wins over a URL.
 */
export function createDatasetSource(config: DatasetSourceConfig): DatasetSource {
  if (config.DATASET_PATH) {
    return new CsvFileSource(config.DATASET_PATH);
  }
  if (config.DATASET_URL) {
    return new HttpCsvSource(config.DATASET_URL, { timeoutMs: config.DATASET_TIMEOUT_MS });
  }
  throw new Error('No dataset configured: set DATASET_PATH or DATASET_URL');
}
