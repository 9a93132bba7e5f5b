import * as core from './index.js';

describe('core index exports', () => {
  it('re-exports runtime modules', () => {
    expect(core.HttpClient).toBeTypeOf('function');
    expect(core.HttpClientError).toBeTypeOf('function');
    expect(core.InMemoryCacheStore).toBeTypeOf('function');
    expect(core.SerializedGate).toBeTypeOf('function');
    expect(core.UnrestrictedGate).toBeTypeOf('function');
    expect(core.createRequestGate).toBeTypeOf('function');
    expect(core.createCacheKey).toBeTypeOf('function');
    expect(core.encodeForm).toBeTypeOf('function');
    expect(core.encodeMultipart).toBeTypeOf('function');
    expect(core.createLogger).toBeTypeOf('function');
    expect(core.HttpClientConfigSchema).toBeDefined();
    expect(core.DEFAULT_READ_TIMEOUT).toBe(16_834);
  });
});
