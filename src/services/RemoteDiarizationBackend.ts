import axios, { AxiosInstance } from 'axios';
import { ErrorType, PipelineError, parseProviderError } from '../errors.js';
import { DiarizationBackend, SpeakerSegment } from '../types/index.js';
import { encodeWav } from '../utils/audio.js';

export interface RemoteDiarizationOptions {
  baseURL?: string;
  timeoutMs?: number;
  client?: Pick<AxiosInstance, 'post'>;
}

/** Segment shape produced by the diarization worker */
interface WorkerSegment {
  speaker_id: string;
  start_time: number;
  end_time: number;
  confidence?: number;
}

interface WorkerOutput {
  success: boolean;
  segments: WorkerSegment[];
  error?: string;
}

function isWorkerSegment(value: unknown): value is WorkerSegment {
  return typeof value === 'object' && value !== null &&
    'speaker_id' in value && typeof value.speaker_id === 'string' &&
    'start_time' in value && typeof value.start_time === 'number' &&
    'end_time' in value && typeof value.end_time === 'number';
}

function isWorkerOutput(value: unknown): value is WorkerOutput {
  return typeof value === 'object' && value !== null &&
    'success' in value && typeof value.success === 'boolean' &&
    'segments' in value && Array.isArray(value.segments) && value.segments.every(isWorkerSegment);
}

/**
 * Diarization backend that delegates to an external diarization worker over HTTP
 */
export class RemoteDiarizationBackend implements DiarizationBackend {
  private client: Pick<AxiosInstance, 'post'> | null;

  constructor(options: RemoteDiarizationOptions) {
    if (options.client) {
      this.client = options.client;
    } else if (options.baseURL) {
      this.client = axios.create({ baseURL: options.baseURL, timeout: options.timeoutMs ?? 120000 });
    } else {
      this.client = null;
    }
  }

  get isModelAvailable(): boolean {
    return this.client !== null;
  }

  async process(samples: Float32Array, sampleRate: number): Promise<SpeakerSegment[]> {
    if (!this.client) {
      throw new PipelineError(ErrorType.MODEL_NOT_AVAILABLE, 'Diarization worker is not configured');
    }

    let data: unknown;
    try {
      const response = await this.client.post<unknown>('/diarize', encodeWav(samples, sampleRate), {
        headers: { 'Content-Type': 'audio/wav' }
      });
      data = response.data;
    } catch (error) {
      throw parseProviderError(error);
    }

    if (!isWorkerOutput(data)) {
      throw new PipelineError(ErrorType.DIARIZATION_FAILED, 'Unexpected response from diarization worker');
    }
    if (!data.success) {
      throw new PipelineError(ErrorType.DIARIZATION_FAILED, `Diarization failed: ${data.error ?? 'unknown error'}`);
    }

    return data.segments.map(segment => ({
      start: segment.start_time,
      end: segment.end_time,
      speakerLabel: segment.speaker_id
    }));
  }
}
