import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from './index.js';
import { ErrorType, PipelineError } from '../errors.js';

function configError(env: NodeJS.ProcessEnv): PipelineError | undefined {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof PipelineError) return error;
    throw error;
  }
  return undefined;
}

describe('loadConfig', () => {
  it('should fall back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('should read pipeline and VAD settings', () => {
    const config = loadConfig({
      PORT: '8080',
      MIN_BUFFER_DURATION_SECONDS: '1.5',
      MAX_BUFFER_DURATION_SECONDS: '4',
      STOP_TIMEOUT_MS: '2000',
      VAD_THRESHOLD_DB: '-40',
      VAD_HOLD_OPEN_SECONDS: '0.5'
    });

    expect(config.port).toBe(8080);
    expect(config.pipeline).toEqual({
      minBufferDurationSeconds: 1.5,
      maxBufferDurationSeconds: 4,
      stopTimeoutMs: 2000
    });
    expect(config.vad).toEqual({ thresholdDB: -40, holdOpenWindowSeconds: 0.5 });
  });

  it('should read cloud backend settings', () => {
    const config = loadConfig({
      STT_BACKEND: 'cloud',
      STT_LANGUAGE: 'ru',
      CLOUD_STT_BASE_URL: 'http://localhost:9000/v1',
      CLOUD_STT_API_KEY: 'test-secret',
      CLOUD_STT_MODEL: 'whisper-large',
      DIARIZATION_URL: 'http://localhost:9001'
    });

    expect(config.stt.backend).toBe('cloud');
    expect(config.stt.languageHint).toBe('ru');
    expect(config.stt.cloud).toEqual({
      baseURL: 'http://localhost:9000/v1',
      apiKey: 'test-secret',
      model: 'whisper-large'
    });
    expect(config.diarization.baseURL).toBe('http://localhost:9001');
  });

  it('should treat blank values as unset', () => {
    const config = loadConfig({ PORT: '  ', STT_LANGUAGE: '' });

    expect(config.port).toBe(3001);
    expect(config.stt.languageHint).toBeUndefined();
  });

  it('should reject non-numeric values', () => {
    expect(configError({ VAD_THRESHOLD_DB: 'loud' })?.type).toBe(ErrorType.INVALID_CONFIG);
  });

  it('should reject an unknown backend', () => {
    expect(configError({ STT_BACKEND: 'gpu' })?.message).toBe('STT_BACKEND must be "local" or "cloud", got "gpu"');
  });

  it('should reject a minimum above the maximum', () => {
    const error = configError({ MIN_BUFFER_DURATION_SECONDS: '6', MAX_BUFFER_DURATION_SECONDS: '5' });
    expect(error?.type).toBe(ErrorType.INVALID_CONFIG);
  });

  it('should reject a non-positive minimum', () => {
    expect(configError({ MIN_BUFFER_DURATION_SECONDS: '0' })?.type).toBe(ErrorType.INVALID_CONFIG);
  });
});
