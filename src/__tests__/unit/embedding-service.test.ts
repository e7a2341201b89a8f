import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { OpenRouterClient } from '../../clients/openrouter.js';
import { EmbeddingCache } from '../../core/embedding-cache.js';
import { createUnthrottledRateLimiter } from '../../core/rate-limiter.js';
import { EmbeddingService, chunk } from '../../services/embedding-service.js';
import { jsonResponse, requestJson, stubFetch } from '../helpers/fetch-stub.js';

interface EmbeddingRequest {
  model: string;
  input: string[];
}

let dir: string;
let requests: string[][];

/** Each text embeds as [length, 1]; batches containing "fail" answer 500 */
function stubEmbeddings() {
  requests = [];
  return stubFetch({
    '/embeddings': (_url, init) => {
      const { input } = requestJson<EmbeddingRequest>(init);
      requests.push(input);
      if (input.includes('fail')) return jsonResponse({ message: 'upstream error' }, 500);
      return { data: input.map((text, index) => ({ embedding: [text.length, 1], index })) };
    },
  });
}

function createService(cache: EmbeddingCache, batchSize = 256) {
  const client = new OpenRouterClient(createUnthrottledRateLimiter(), {
    apiKey: 'test-key',
    baseUrl: 'https://llm.test',
    timeoutMs: 1000,
  });
  return new EmbeddingService(client, cache, { model: 'test/embed', batchSize, concurrency: 1 });
}

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'embedding-service-'));
});

afterEach(async () => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
  await fs.rm(dir, { recursive: true, force: true });
});

describe('chunk', () => {
  it('splits into fixed-size slices', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunk([], 3)).toEqual([]);
  });

  it('rejects a non-positive size', () => {
    expect(() => chunk([1], 0)).toThrow(RangeError);
  });
});

describe('EmbeddingService.embedTexts', () => {
  it('requests each uncached text once, by normalized key', async () => {
    stubEmbeddings();
    const cache = new EmbeddingCache(path.join(dir, 'cache.json'));
    cache.set('beta', [9, 9]);

    const embeddings = await createService(cache).embedTexts(['Alpha', 'alpha ', 'Beta']);

    expect(requests).toEqual([['alpha']]);
    expect(embeddings).toEqual([
      [5, 1],
      [5, 1],
      [9, 9],
    ]);
  });

  it('makes no request when everything is cached', async () => {
    const fetchMock = stubEmbeddings();
    const cache = new EmbeddingCache(path.join(dir, 'cache.json'));
    cache.set('x', [1, 1]);

    expect(await createService(cache).embedTexts(['X'])).toEqual([[1, 1]]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('leaves null slots for a failed batch and keeps the others', async () => {
    const errorLog = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    stubEmbeddings();
    const cache = new EmbeddingCache(path.join(dir, 'cache.json'));

    const embeddings = await createService(cache, 2).embedTexts(['a', 'bb', 'fail']);

    expect(requests).toEqual([['a', 'bb'], ['fail']]);
    expect(embeddings).toEqual([[1, 1], [2, 1], null]);
    expect(cache.size).toBe(2);
    expect(errorLog).toHaveBeenCalledTimes(1);
  });
});

describe('EmbeddingService.relate', () => {
  it('relates the embedded texts and reports their positions', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    stubEmbeddings();
    const cache = new EmbeddingCache(path.join(dir, 'cache.json'));

    const result = await createService(cache, 1).relate(['ab', 'fail', 'abc']);

    expect(result.indices).toEqual([0, 2]);
    expect(result.matrix).toEqual([
      [5, 7],
      [7, 10],
    ]);
  });
});
