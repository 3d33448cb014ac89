import { JinaEmbeddingProvider, cosineSimilarity, distanceToSimilarity, isUsableEmbedding } from './embedding-service';
import { ErrorCode } from './error-handling';

describe('JinaEmbeddingProvider', () => {
  const fetchMock = vi.fn<(input: string, init?: RequestInit) => Promise<Response>>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function okResponse(embedding: number[]) {
    return new Response(JSON.stringify({ data: [{ embedding }] }), { status: 200 });
  }

  it('should fail without an API key and never call the API', async () => {
    const provider = new JinaEmbeddingProvider();

    await expect(provider.embedText('ladybug')).rejects.toMatchObject({ code: ErrorCode.COLLABORATOR_UNAVAILABLE });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should embed text with the configured model', async () => {
    fetchMock.mockImplementation(async () => okResponse([0.1, 0.2, 0.3]));
    const provider = new JinaEmbeddingProvider({ apiKey: 'test-key', model: 'jina-clip-v1' });

    const vector = await provider.embedText('ladybug');

    expect(vector).toEqual([0.1, 0.2, 0.3]);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.jina.ai/v1/embeddings');
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-key' });
    expect(JSON.parse(String(init?.body))).toEqual({ model: 'jina-clip-v1', input: [{ text: 'ladybug' }] });
  });

  it('should send images as a base64 data URI', async () => {
    fetchMock.mockImplementation(async () => okResponse([1, 0]));
    const provider = new JinaEmbeddingProvider({ apiKey: 'test-key' });

    await provider.embedImage(new TextEncoder().encode('hi'));

    const body = JSON.parse(String(fetchMock.mock.calls[0][1]?.body));
    expect(body.input).toEqual([{ image: 'data:image/jpeg;base64,aGk=' }]);
  });

  it('should report a rejected API key as the service being unavailable, without retrying', async () => {
    fetchMock.mockImplementation(async () => new Response('invalid api key', { status: 401 }));
    const provider = new JinaEmbeddingProvider({ apiKey: 'test-key' });

    await expect(provider.embedText('x')).rejects.toMatchObject({ code: ErrorCode.COLLABORATOR_UNAVAILABLE });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should blame the input only for an oversized image', async () => {
    fetchMock.mockImplementation(async () => new Response('payload too large', { status: 413 }));
    const provider = new JinaEmbeddingProvider({ apiKey: 'test-key' });

    await expect(provider.embedImage(new Uint8Array(8))).rejects.toMatchObject({ code: ErrorCode.INVALID_INPUT });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should retry a server error', async () => {
    fetchMock
      .mockImplementationOnce(async () => new Response('overloaded', { status: 503 }))
      .mockImplementation(async () => okResponse([0.5, 0.5]));
    const provider = new JinaEmbeddingProvider({
      apiKey: 'test-key',
      retry: { initialDelayMs: 1, maxDelayMs: 1, jitter: false },
    });

    expect(await provider.embedText('x')).toEqual([0.5, 0.5]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('should give up on a request that never answers', async () => {
    fetchMock.mockImplementation(() => new Promise<Response>(() => {}));
    const provider = new JinaEmbeddingProvider({ apiKey: 'test-key', timeoutMs: 20, retry: { maxRetries: 0 } });

    await expect(provider.embedText('x')).rejects.toMatchObject({ code: ErrorCode.COLLABORATOR_TIMEOUT });
  });
});

describe('vector helpers', () => {
  it('should compute cosine similarity independent of magnitude', () => {
    expect(cosineSimilarity([2, 0], [5, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 3])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
  });

  it('should reject vectors of different length', () => {
    expect(() => cosineSimilarity([1], [1, 0])).toThrow('Vectors must have same length');
  });

  it('should turn cosine distance into similarity', () => {
    expect(distanceToSimilarity(0.15)).toBeCloseTo(0.85, 10);
    expect(distanceToSimilarity(1.4)).toBe(0);
  });

  it('should flag empty, zero and non-finite vectors as unusable', () => {
    expect(isUsableEmbedding([], 0)).toBe(false);
    expect(isUsableEmbedding([0, 0], 2)).toBe(false);
    expect(isUsableEmbedding([1, Number.NaN], 2)).toBe(false);
    expect(isUsableEmbedding([0.1, 0], 2)).toBe(true);
  });

  it('should flag a vector of the wrong width as unusable', () => {
    expect(isUsableEmbedding([0.1, 0.2, 0.3], 2)).toBe(false);
    expect(isUsableEmbedding([0.1], 2)).toBe(false);
  });
});
