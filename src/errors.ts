import axios from 'axios';

export enum ErrorType {
  NETWORK_ERROR = 'NETWORK_ERROR',
  API_ERROR = 'API_ERROR',
  INVALID_API_KEY = 'INVALID_API_KEY',
  RATE_LIMITED = 'RATE_LIMITED',
  MODEL_NOT_AVAILABLE = 'MODEL_NOT_AVAILABLE',
  AUDIO_DECODE_ERROR = 'AUDIO_DECODE_ERROR',
  DIARIZATION_FAILED = 'DIARIZATION_FAILED',
  INVALID_CONFIG = 'INVALID_CONFIG',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR'
}

/**
 * Error raised by backends, decoders and configuration
 */
export class PipelineError extends Error {
  type: ErrorType;
  retryable: boolean;

  constructor(type: ErrorType, message: string, retryable: boolean = false) {
    super(message);
    this.type = type;
    this.retryable = retryable;
    this.name = 'PipelineError';
  }
}

/**
 * Map an HTTP client failure from a remote provider onto a PipelineError
 */
export const parseProviderError = (error: unknown): PipelineError => {
  if (error instanceof PipelineError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;

    if (status === undefined) {
      return new PipelineError(ErrorType.NETWORK_ERROR, `Network error: ${error.message}`, true);
    }
    if (status === 401 || status === 403) {
      return new PipelineError(ErrorType.INVALID_API_KEY, `Provider rejected credentials (${status})`);
    }
    if (status === 429) {
      return new PipelineError(ErrorType.RATE_LIMITED, 'Provider rate limit exceeded', true);
    }
    if (status >= 500) {
      return new PipelineError(ErrorType.API_ERROR, `Provider server error (${status})`, true);
    }
    return new PipelineError(ErrorType.API_ERROR, `Provider request failed (${status}): ${error.message}`);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new PipelineError(ErrorType.UNKNOWN_ERROR, message);
};
