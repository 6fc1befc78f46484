import { ConfigurationError } from '../../src/domain/errors';
import { loadSettings } from '../../src/config/settings';

describe('loadSettings', () => {
  test('falls back to defaults for an empty environment', () => {
    expect(loadSettings({})).toEqual({
      gcpProjectId: undefined,
      organizationId: undefined,
      vertexLocation: 'us-central1',
      vertexModel: 'gemini-1.5-flash',
      aiProvider: 'gemini',
      ollamaModel: 'llama3',
      ollamaEndpoint: 'http://localhost:11434',
      temperature: 0.2,
      maxOutputTokens: 8192,
      dataDir: 'data',
      maxAttempts: 3,
      timeoutMs: 30000,
      concurrency: 4,
      logLevel: 'info',
    });
  });

  test('reads and coerces variables', () => {
    const settings = loadSettings({
      GCP_PROJECT_ID: 'ai-host',
      AI_PROVIDER: 'OLLAMA',
      AI_TEMPERATURE: '0',
      AUDIT_MAX_ATTEMPTS: '5',
      AUDIT_CONCURRENCY: '8',
      DATA_DIR: '/var/lib/audit',
      LOG_LEVEL: 'DEBUG',
    });
    expect(settings.gcpProjectId).toBe('ai-host');
    expect(settings.aiProvider).toBe('ollama');
    expect(settings.temperature).toBe(0);
    expect(settings.maxAttempts).toBe(5);
    expect(settings.concurrency).toBe(8);
    expect(settings.dataDir).toBe('/var/lib/audit');
    expect(settings.logLevel).toBe('debug');
  });

  test('reads a numeric organization id', () => {
    expect(loadSettings({ GCP_ORGANIZATION_ID: '123456789' }).organizationId).toBe('123456789');
    expect(() => loadSettings({ GCP_ORGANIZATION_ID: 'organizations/123456789' })).toThrow(
      'Invalid environment: GCP_ORGANIZATION_ID: must be a numeric organization id',
    );
  });

  test('treats blank values as unset', () => {
    expect(loadSettings({ AI_PROVIDER: '  ', AUDIT_TIMEOUT_MS: '' }).aiProvider).toBe('gemini');
    expect(loadSettings({ AUDIT_TIMEOUT_MS: '' }).timeoutMs).toBe(30000);
  });

  test('rejects out-of-range values', () => {
    expect(() => loadSettings({ AUDIT_MAX_ATTEMPTS: '0' })).toThrow(ConfigurationError);
    expect(() => loadSettings({ AUDIT_MAX_ATTEMPTS: '11' })).toThrow(/^Invalid environment: AUDIT_MAX_ATTEMPTS: /);
    expect(() => loadSettings({ AI_TEMPERATURE: '1.5' })).toThrow(/^Invalid environment: AI_TEMPERATURE: /);
  });

  test('rejects unknown providers and malformed endpoints', () => {
    expect(() => loadSettings({ AI_PROVIDER: 'openai' })).toThrow(/AI_PROVIDER/);
    expect(() => loadSettings({ OLLAMA_ENDPOINT: 'localhost' })).toThrow(/OLLAMA_ENDPOINT/);
  });

  test('lists every problem in one error', () => {
    try {
      loadSettings({ AUDIT_TIMEOUT_MS: 'soon', AUDIT_CONCURRENCY: '100' });
      throw new Error('expected loadSettings to throw');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      expect(err instanceof ConfigurationError && err.typedError.details?.issues).toHaveLength(2);
    }
  });
});
