import { describe, it, expect } from 'vitest';
import { createBackend, createServices } from './bootstrap.js';
import { DEFAULT_CONFIG, AppConfig } from './config/index.js';
import { CloudSTTService } from './services/CloudSTTService.js';
import { WhisperService } from './services/WhisperService.js';

describe('createBackend', () => {
  it('should use local Whisper by default', () => {
    const backend = createBackend(DEFAULT_CONFIG);

    expect(backend).toBeInstanceOf(WhisperService);
    expect(backend instanceof WhisperService && backend.getModelName()).toBe('Xenova/whisper-base');
  });

  it('should use the cloud provider when configured', () => {
    const config: AppConfig = { ...DEFAULT_CONFIG, stt: { ...DEFAULT_CONFIG.stt, backend: 'cloud' } };

    expect(createBackend(config)).toBeInstanceOf(CloudSTTService);
  });
});

describe('createServices', () => {
  it('should wire an idle pipeline with the configured language hint', () => {
    const config: AppConfig = { ...DEFAULT_CONFIG, stt: { ...DEFAULT_CONFIG.stt, languageHint: 'ru' } };

    const services = createServices(config);

    expect(services.pipeline.isRunning).toBe(false);
    expect(services.pipeline.getLanguageHint()).toBe('ru');
    expect(services.manager.getStatus()).toEqual({
      running: false,
      generation: 0,
      languageHint: 'ru',
      currentSessionId: null
    });
  });

  it('should leave diarization unavailable without a worker URL', () => {
    expect(createServices(DEFAULT_CONFIG).diarization.isAvailable).toBe(false);
  });

  it('should enable diarization when a worker URL is set', () => {
    const config: AppConfig = { ...DEFAULT_CONFIG, diarization: { baseURL: 'http://localhost:9001' } };

    expect(createServices(config).diarization.isAvailable).toBe(true);
  });
});
