import { ErrorType, PipelineError } from '../errors.js';

export type SttBackendKind = 'local' | 'cloud';

export interface AppConfig {
  port: number;
  pipeline: {
    minBufferDurationSeconds: number;
    maxBufferDurationSeconds: number;
    stopTimeoutMs: number;
  };
  vad: {
    thresholdDB: number;
    holdOpenWindowSeconds: number;
  };
  stt: {
    backend: SttBackendKind;
    whisperModel: string;
    languageHint?: string;
    cloud: {
      baseURL: string;
      apiKey?: string;
      model: string;
    };
  };
  diarization: {
    baseURL?: string;
  };
}

export const DEFAULT_CONFIG: AppConfig = {
  port: 3001,
  pipeline: {
    minBufferDurationSeconds: 2.0,
    maxBufferDurationSeconds: 5.0,
    stopTimeoutMs: 10000
  },
  vad: {
    thresholdDB: -50,
    holdOpenWindowSeconds: 0.8
  },
  stt: {
    backend: 'local',
    whisperModel: 'Xenova/whisper-base',
    cloud: {
      baseURL: 'https://api.openai.com/v1',
      model: 'whisper-1'
    }
  },
  diarization: {}
};

function readNumber(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new PipelineError(ErrorType.INVALID_CONFIG, `${key} must be a number, got "${raw}"`);
  }
  return value;
}

function readString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw ? raw : undefined;
}

function readBackend(env: NodeJS.ProcessEnv): SttBackendKind {
  const raw = readString(env, 'STT_BACKEND') ?? DEFAULT_CONFIG.stt.backend;
  if (raw !== 'local' && raw !== 'cloud') {
    throw new PipelineError(ErrorType.INVALID_CONFIG, `STT_BACKEND must be "local" or "cloud", got "${raw}"`);
  }
  return raw;
}

/**
 * Build the runtime configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const minBufferDurationSeconds = readNumber(
    env,
    'MIN_BUFFER_DURATION_SECONDS',
    DEFAULT_CONFIG.pipeline.minBufferDurationSeconds
  );
  const maxBufferDurationSeconds = readNumber(
    env,
    'MAX_BUFFER_DURATION_SECONDS',
    DEFAULT_CONFIG.pipeline.maxBufferDurationSeconds
  );

  if (minBufferDurationSeconds <= 0 || minBufferDurationSeconds > maxBufferDurationSeconds) {
    throw new PipelineError(
      ErrorType.INVALID_CONFIG,
      `Buffer durations must satisfy 0 < min <= max (min=${minBufferDurationSeconds}, max=${maxBufferDurationSeconds})`
    );
  }

  return {
    port: readNumber(env, 'PORT', DEFAULT_CONFIG.port),
    pipeline: {
      minBufferDurationSeconds,
      maxBufferDurationSeconds,
      stopTimeoutMs: readNumber(env, 'STOP_TIMEOUT_MS', DEFAULT_CONFIG.pipeline.stopTimeoutMs)
    },
    vad: {
      thresholdDB: readNumber(env, 'VAD_THRESHOLD_DB', DEFAULT_CONFIG.vad.thresholdDB),
      holdOpenWindowSeconds: readNumber(env, 'VAD_HOLD_OPEN_SECONDS', DEFAULT_CONFIG.vad.holdOpenWindowSeconds)
    },
    stt: {
      backend: readBackend(env),
      whisperModel: readString(env, 'WHISPER_MODEL') ?? DEFAULT_CONFIG.stt.whisperModel,
      languageHint: readString(env, 'STT_LANGUAGE'),
      cloud: {
        baseURL: readString(env, 'CLOUD_STT_BASE_URL') ?? DEFAULT_CONFIG.stt.cloud.baseURL,
        apiKey: readString(env, 'CLOUD_STT_API_KEY'),
        model: readString(env, 'CLOUD_STT_MODEL') ?? DEFAULT_CONFIG.stt.cloud.model
      }
    },
    diarization: {
      baseURL: readString(env, 'DIARIZATION_URL')
    }
  };
}
