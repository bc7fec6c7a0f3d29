import axios, { AxiosInstance } from 'axios';
import { ErrorType, PipelineError, parseProviderError } from '../errors.js';
import { AudioFormat, CloudTranscriptionBackend, TranscriptionSegment } from '../types/index.js';

export interface CloudSTTOptions {
  baseURL: string;
  apiKey?: string;
  model: string;
  language?: string;
  timeoutMs?: number;
  client?: Pick<AxiosInstance, 'post'>;
}

interface VerboseSegment {
  text: string;
  start: number;
  end: number;
}

interface VerboseTranscription {
  text: string;
  segments?: VerboseSegment[];
}

const MIME_TYPES: Record<AudioFormat, string> = {
  wav: 'audio/wav',
  mp3: 'audio/mpeg',
  m4a: 'audio/mp4',
  webm: 'audio/webm'
};

function isVerboseSegment(value: unknown): value is VerboseSegment {
  return typeof value === 'object' && value !== null &&
    'text' in value && typeof value.text === 'string' &&
    'start' in value && typeof value.start === 'number' &&
    'end' in value && typeof value.end === 'number';
}

function isVerboseTranscription(value: unknown): value is VerboseTranscription {
  if (typeof value !== 'object' || value === null) return false;
  if (!('text' in value) || typeof value.text !== 'string') return false;
  if (!('segments' in value) || value.segments === undefined) return true;
  return Array.isArray(value.segments) && value.segments.every(isVerboseSegment);
}

/**
 * Remote speech-to-text against an OpenAI-compatible /audio/transcriptions endpoint
 */
export class CloudSTTService implements CloudTranscriptionBackend {
  readonly kind = 'cloud';
  private client: Pick<AxiosInstance, 'post'>;

  constructor(private options: CloudSTTOptions) {
    this.client = options.client ?? axios.create({
      baseURL: options.baseURL,
      timeout: options.timeoutMs ?? 30000,
      headers: options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {}
    });
  }

  /**
   * Upload an encoded audio file and return relative segments
   */
  async transcribe(audioPayload: Uint8Array, format: AudioFormat): Promise<TranscriptionSegment[]> {
    if (!this.options.model) {
      throw new PipelineError(ErrorType.MODEL_NOT_AVAILABLE, 'No STT model configured');
    }

    const form = new FormData();
    form.append('file', new Blob([audioPayload], { type: MIME_TYPES[format] }), `audio.${format}`);
    form.append('model', this.options.model);
    form.append('response_format', 'verbose_json');
    if (this.options.language) {
      form.append('language', this.options.language);
    }

    let data: unknown;
    try {
      const response = await this.client.post<unknown>('/audio/transcriptions', form);
      data = response.data;
    } catch (error) {
      const mapped = parseProviderError(error);
      console.error('Cloud transcription request failed:', mapped.message);
      throw mapped;
    }

    if (!isVerboseTranscription(data)) {
      throw new PipelineError(ErrorType.API_ERROR, 'Unexpected response from transcription provider');
    }

    if (data.segments && data.segments.length > 0) {
      return data.segments
        .map(segment => ({ text: segment.text.trim(), startTime: segment.start, endTime: segment.end }))
        .filter(segment => segment.text !== '');
    }

    // Providers without segment timing only return the text
    const text = data.text.trim();
    return text ? [{ text, startTime: 0, endTime: 0 }] : [];
  }
}
