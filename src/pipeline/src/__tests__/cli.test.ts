import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { RawTable } from '@review-lens/shared';
import { readCriteria, runCli } from '../cli.js';
import { DatasetSource } from '../source.js';
import { InvalidCriteriaError, SourceUnavailableError } from '../errors.js';
import { rawTable } from './helpers.js';

const dataset = rawTable([
  { app_name: 'Chess', app_category: 'Games', rating: '5' },
  { app_name: 'Chess', app_category: 'Games', rating: '4' },
  { app_name: 'Hammer', app_category: 'Tools', rating: '2' },
]);

class FakeSource implements DatasetSource {
  fetch = vi.fn<() => Promise<RawTable>>().mockResolvedValue(dataset);

  describe(): string {
    return 'fake:reviews';
  }
}

const settings = { DATASET_CACHE_TTL_MS: 60_000, TOP_APPS_LIMIT: 10 };

describe('readCriteria', () => {
  it('should treat an unset or empty filter as no constraint', () => {
    expect(readCriteria(undefined)).toEqual({});
    expect(readCriteria('')).toEqual({});
  });

  it('should parse JSON criteria', () => {
    expect(readCriteria('{"appName":"Chess","ratingRange":[3,5]}')).toEqual({
      appName: 'Chess',
      ratingRange: [3, 5],
    });
  });

  it('should reject malformed JSON', () => {
    try {
      readCriteria('{appName:');
      expect.unreachable('readCriteria should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidCriteriaError);
      if (error instanceof InvalidCriteriaError) {
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0]).toMatch(/^REVIEW_FILTER is not valid JSON: /);
      }
    }
  });

  it('should reject criteria the schema does not accept', () => {
    expect(() => readCriteria('{"ratingRange":[5,1]}')).toThrow(InvalidCriteriaError);
  });
});

describe('runCli', () => {
  let source: FakeSource;
  let write: Mock<(line: string) => void>;

  beforeEach(() => {
    source = new FakeSource();
    write = vi.fn<(line: string) => void>();
  });

  it('should print the summary for the filtered view', async () => {
    const { view } = await runCli({ ...settings, REVIEW_FILTER: '{"category":"Games"}' }, source, write);

    expect(view).toHaveLength(2);
    expect(write.mock.calls.map(([line]) => line)).toEqual([
      'Total reviews: 2',
      'Average rating: 4.50',
      'Unique apps: 1',
      'Languages: 1',
      'Best category: n/a',
      'Worst category: n/a',
      'Sentiment: Very Poor 0, Poor 0, Average 0, Good 1, Excellent 1',
      'Top apps: Chess (2)',
    ]);
  });

  it('should reject bad JSON before fetching the dataset', async () => {
    await expect(runCli({ ...settings, REVIEW_FILTER: 'not json' }, source, write))
      .rejects.toBeInstanceOf(InvalidCriteriaError);
    expect(source.fetch).not.toHaveBeenCalled();
    expect(write).not.toHaveBeenCalled();
  });

  it('should reject invalid criteria before fetching the dataset', async () => {
    await expect(runCli({ ...settings, REVIEW_FILTER: '{"language":"en"}' }, source, write))
      .rejects.toBeInstanceOf(InvalidCriteriaError);
    expect(source.fetch).not.toHaveBeenCalled();
  });

  it('should reject when the source is unavailable', async () => {
    source.fetch.mockRejectedValueOnce(new SourceUnavailableError('fake:reviews', 'offline'));

    await expect(runCli(settings, source, write))
      .rejects.toThrow('Dataset source fake:reviews unavailable: offline');
    expect(write).not.toHaveBeenCalled();
  });
});
