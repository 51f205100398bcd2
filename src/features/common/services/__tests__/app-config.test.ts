import {
  ConfigurationError,
  DEFAULT_MAX_IMAGE_UPLOAD_BYTES,
  getAppConfig,
  parseAllowedOrigins,
} from '../app-config';

describe('getAppConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(getAppConfig({})).toEqual({
      provider: 'openai',
      openai: { apiKey: undefined, baseURL: undefined },
      azure: {
        apiKey: undefined,
        instanceName: undefined,
        deploymentName: undefined,
        apiVersion: undefined,
      },
      model: 'gpt-4o',
      maxTokens: 2048,
      temperature: 0.7,
      corsAllowedOrigins: ['*'],
      maxImageUploadBytes: DEFAULT_MAX_IMAGE_UPLOAD_BYTES,
    });
    expect(DEFAULT_MAX_IMAGE_UPLOAD_BYTES).toBe(20971520);
  });

  it('reads model settings and coerces numbers', () => {
    const config = getAppConfig({
      OPENAI_API_KEY: 'test-key',
      OPENAI_BASE_URL: 'http://localhost:8080/v1',
      OPENAI_MODEL: 'gpt-4o-mini',
      OPENAI_MAX_TOKENS: '512',
      OPENAI_TEMPERATURE: '0.2',
      MAX_IMAGE_UPLOAD_BYTES: '1024',
    });

    expect(config.provider).toBe('openai');
    expect(config.openai).toEqual({
      apiKey: 'test-key',
      baseURL: 'http://localhost:8080/v1',
    });
    expect(config.model).toBe('gpt-4o-mini');
    expect(config.maxTokens).toBe(512);
    expect(config.temperature).toBe(0.2);
    expect(config.maxImageUploadBytes).toBe(1024);
  });

  it('switches to azure when an instance name is set', () => {
    const config = getAppConfig({
      AZURE_OPENAI_API_KEY: 'test-key',
      AZURE_OPENAI_API_INSTANCE_NAME: 'my-instance',
      AZURE_OPENAI_API_DEPLOYMENT_NAME: 'gpt-4o',
      AZURE_OPENAI_API_VERSION: '2024-10-21',
    });

    expect(config.provider).toBe('azure');
    expect(config.azure).toEqual({
      apiKey: 'test-key',
      instanceName: 'my-instance',
      deploymentName: 'gpt-4o',
      apiVersion: '2024-10-21',
    });
  });

  it('treats blank variables as unset', () => {
    const config = getAppConfig({
      OPENAI_MODEL: '   ',
      OPENAI_MAX_TOKENS: '',
      AZURE_OPENAI_API_INSTANCE_NAME: ' ',
    });

    expect(config.model).toBe('gpt-4o');
    expect(config.maxTokens).toBe(2048);
    expect(config.provider).toBe('openai');
  });

  it('splits the allowed origins', () => {
    const config = getAppConfig({
      CORS_ALLOWED_ORIGINS: 'http://localhost:3000, https://chat.example.com',
    });

    expect(config.corsAllowedOrigins).toEqual([
      'http://localhost:3000',
      'https://chat.example.com',
    ]);
  });

  it('rejects invalid numbers with the variable names', () => {
    const read = () =>
      getAppConfig({ OPENAI_MAX_TOKENS: 'many', OPENAI_TEMPERATURE: '3' });

    expect(read).toThrow(ConfigurationError);
    expect(read).toThrow(/OPENAI_MAX_TOKENS: .*OPENAI_TEMPERATURE: /);
  });

  it('rejects a base URL that is not a URL', () => {
    expect(() => getAppConfig({ OPENAI_BASE_URL: 'not a url' })).toThrow(
      /OPENAI_BASE_URL/
    );
  });
});

describe('parseAllowedOrigins', () => {
  it('defaults to any origin', () => {
    expect(parseAllowedOrigins(undefined)).toEqual(['*']);
    expect(parseAllowedOrigins(' , ')).toEqual(['*']);
  });

  it('drops empty entries', () => {
    expect(parseAllowedOrigins('http://a.test,,http://b.test')).toEqual([
      'http://a.test',
      'http://b.test',
    ]);
  });
});
