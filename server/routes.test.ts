import { toWire, replyStatus, toLocationInput } from './routes';
import { api } from '@shared/routes';
import { ErrorCode } from './error-handling';

describe('toWire', () => {
  it('should encode bytes as base64 and dates as ISO strings, recursively', () => {
    const wire = toWire({
      kind: 'prompt',
      thumbnail: new TextEncoder().encode('hi'),
      item: { registeredAt: new Date(Date.UTC(2026, 0, 1)), tags: [new Uint8Array([255])] },
      similarity: 0.9,
      note: null,
    });

    expect(wire).toEqual({
      kind: 'prompt',
      thumbnail: 'aGk=',
      item: { registeredAt: '2026-01-01T00:00:00.000Z', tags: ['/w=='] },
      similarity: 0.9,
      note: null,
    });
  });
});

describe('replyStatus', () => {
  it('should map error replies to their HTTP status', () => {
    expect(replyStatus({ kind: 'error', code: ErrorCode.ITEM_NOT_FOUND, retryable: false, expect: null })).toBe(404);
    expect(replyStatus({ kind: 'error', code: ErrorCode.COLLABORATOR_TIMEOUT, retryable: true, expect: 'photo' })).toBe(504);
  });

  it('should answer 200 for everything else', () => {
    expect(replyStatus({ kind: 'prompt', expect: 'name', reason: 'new_item' })).toBe(200);
  });
});

describe('location request bodies', () => {
  it('should parse each accepted shape into a location input', () => {
    const parse = (body: unknown) => toLocationInput(api.conversations.location.input.parse(body));

    expect(parse({ latitude: 52.1, longitude: 21.0 })).toEqual({ kind: 'coordinates', latitude: 52.1, longitude: 21.0 });
    expect(parse({ postalCode: '00-001' })).toEqual({ kind: 'postal_code', postalCode: '00-001' });
    expect(parse({ skip: true })).toEqual({ kind: 'skip' });
  });

  it('should reject mixed or empty bodies', () => {
    expect(api.conversations.location.input.safeParse({}).success).toBe(false);
    expect(api.conversations.location.input.safeParse({ postalCode: '00-001', skip: true }).success).toBe(false);
  });
});

describe('api contract', () => {
  it('should export only the request contract', async () => {
    const contract = await import('@shared/routes');

    expect(Object.keys(contract).sort()).toEqual(['api', 'locationInputSchema']);
  });

  it('should mount every route under /api', () => {
    const paths = [
      ...Object.values(api.conversations).map((route) => route.path),
      ...Object.values(api.users).map((route) => route.path),
      ...Object.values(api.items).map((route) => route.path),
      api.search.text.path,
      api.health.path,
    ];

    expect(paths).toHaveLength(13);
    expect(paths.every((path) => path.startsWith('/api/'))).toBe(true);
  });
});
