import { AppConfig } from './config/index.js';
import { CloudSTTService } from './services/CloudSTTService.js';
import { DiarizationService } from './services/DiarizationService.js';
import { RealtimeTranscriptionService } from './services/RealtimeTranscriptionService.js';
import { RemoteDiarizationBackend } from './services/RemoteDiarizationBackend.js';
import { TranscriptionManager } from './services/TranscriptionManager.js';
import { VADService } from './services/VADService.js';
import { WhisperService } from './services/WhisperService.js';
import { TranscriptionBackend } from './types/index.js';

export interface Services {
  backend: TranscriptionBackend;
  pipeline: RealtimeTranscriptionService;
  manager: TranscriptionManager;
  diarization: DiarizationService;
}

export function createBackend(config: AppConfig): TranscriptionBackend {
  if (config.stt.backend === 'cloud') {
    return new CloudSTTService({
      baseURL: config.stt.cloud.baseURL,
      apiKey: config.stt.cloud.apiKey,
      model: config.stt.cloud.model,
      language: config.stt.languageHint
    });
  }
  return new WhisperService(config.stt.whisperModel);
}

/**
 * Wire the pipeline, session manager and diarization from configuration
 */
export function createServices(config: AppConfig, backend: TranscriptionBackend = createBackend(config)): Services {
  const vad = new VADService({
    thresholdDB: config.vad.thresholdDB,
    holdOpenWindowSeconds: config.vad.holdOpenWindowSeconds
  });

  const pipeline = new RealtimeTranscriptionService(backend, {
    minBufferDurationSeconds: config.pipeline.minBufferDurationSeconds,
    maxBufferDurationSeconds: config.pipeline.maxBufferDurationSeconds,
    stopTimeoutMs: config.pipeline.stopTimeoutMs,
    languageHint: config.stt.languageHint
  }, vad);

  const diarization = new DiarizationService(
    new RemoteDiarizationBackend({ baseURL: config.diarization.baseURL })
  );

  return {
    backend,
    pipeline,
    manager: new TranscriptionManager(pipeline),
    diarization
  };
}
