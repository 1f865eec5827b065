import { loadConfig } from './config';
import { createServiceRegistry, getServiceAvailability } from './service-registry';

describe('loadConfig', () => {
  it('should apply defaults and drop blank keys', () => {
    const config = loadConfig({ OPENAI_API_KEY: '   ', GOOGLE_API_KEY: ' test-key ', EXPERT_TIMEOUT_MS: '2500' });

    expect(config.OPENAI_API_KEY).toBeUndefined();
    expect(config.GOOGLE_API_KEY).toBe('test-key');
    expect(config.EXPERT_TIMEOUT_MS).toBe(2500);
    expect(config.SYNTHESIS_TIMEOUT_MS).toBe(15000);
    expect(config.MAX_QUERY_ATTEMPTS).toBe(3);
    expect(config.PORT).toBe(5000);
  });

  it('should reject out-of-range settings', () => {
    expect(() => loadConfig({ SEARCH_LIMIT: '0' })).toThrow(/^Invalid environment configuration: SEARCH_LIMIT/);
  });
});

describe('createServiceRegistry', () => {
  it('should start with every upstream unavailable when no keys are set', () => {
    const registry = createServiceRegistry(loadConfig({}));

    expect(registry.experts.map(e => e.id)).toEqual(['google_vision', 'aws_rekognition', 'clip_encoder']);
    expect(getServiceAvailability(registry)).toEqual({
      googleVision: false,
      rekognition: false,
      clipEmbedder: false,
      reasoner: false,
    });
  });

  it('should use the configured expert deadline', () => {
    const registry = createServiceRegistry(loadConfig({ EXPERT_TIMEOUT_MS: '1234' }));

    expect(registry.experts.every(e => e.timeoutMs === 1234)).toBe(true);
  });
});
