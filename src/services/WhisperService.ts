import { pipeline } from '@huggingface/transformers';
import { ErrorType, PipelineError } from '../errors.js';
import { LocalTranscriptionBackend, TARGET_SAMPLE_RATE, TranscriptionSegment } from '../types/index.js';

export interface WhisperOptions {
  return_timestamps: boolean;
  task: 'transcribe';
  language?: string;
  chunk_length_s?: number;
  stride_length_s?: number;
}

export type Transcriber = (audio: Float32Array, options: WhisperOptions) => Promise<unknown>;
export type TranscriberLoader = (modelName: string) => Promise<Transcriber>;

interface RecognitionChunk {
  text: string;
  timestamp: [number | null, number | null];
}

interface RecognitionOutput {
  text: string;
  chunks?: RecognitionChunk[];
}

const loadWhisperPipeline: TranscriberLoader = async (modelName) => {
  const transcriber = await pipeline('automatic-speech-recognition', modelName);
  return (audio, options) => transcriber(audio, options);
};

function isRecognitionChunk(value: unknown): value is RecognitionChunk {
  return typeof value === 'object' && value !== null &&
    'text' in value && typeof value.text === 'string' &&
    'timestamp' in value && Array.isArray(value.timestamp);
}

function isRecognitionOutput(value: unknown): value is RecognitionOutput {
  if (typeof value !== 'object' || value === null) return false;
  if (!('text' in value) || typeof value.text !== 'string') return false;
  if (!('chunks' in value) || value.chunks === undefined) return true;
  return Array.isArray(value.chunks) && value.chunks.every(isRecognitionChunk);
}

/**
 * On-device Whisper transcription through transformers.js
 */
export class WhisperService implements LocalTranscriptionBackend {
  readonly kind = 'local';
  private transcriber: Transcriber | null = null;
  private loading: Promise<Transcriber> | null = null;

  constructor(
    private modelName: string = 'Xenova/whisper-base',
    private loadModel: TranscriberLoader = loadWhisperPipeline
  ) {}

  /**
   * Initialize Whisper model
   */
  async initialize(): Promise<void> {
    if (this.transcriber) return;

    if (!this.loading) {
      console.log(`Loading Whisper model ${this.modelName}...`);
      this.loading = this.loadModel(this.modelName);
    }

    try {
      this.transcriber = await this.loading;
      console.log('Whisper model loaded successfully');
    } catch (error) {
      this.loading = null;
      console.error('Failed to load Whisper model:', error);
      throw new PipelineError(
        ErrorType.MODEL_NOT_AVAILABLE,
        `Failed to load ${this.modelName}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  /**
   * Transcribe a mono 16 kHz buffer; segment times are relative to its start
   */
  async transcribe(samples: Float32Array, sampleRate: number, languageHint?: string): Promise<TranscriptionSegment[]> {
    if (sampleRate !== TARGET_SAMPLE_RATE) {
      throw new PipelineError(
        ErrorType.AUDIO_DECODE_ERROR,
        `Whisper expects ${TARGET_SAMPLE_RATE} Hz audio, got ${sampleRate} Hz`
      );
    }

    await this.initialize();
    const transcriber = this.transcriber;
    if (!transcriber) {
      throw new PipelineError(ErrorType.MODEL_NOT_AVAILABLE, 'Whisper model is not loaded');
    }

    const durationSeconds = samples.length / sampleRate;

    // Long buffers go through the pipeline's own 30s chunking
    const options: WhisperOptions = durationSeconds > 30 ? {
      return_timestamps: true,
      task: 'transcribe',
      chunk_length_s: 30,
      stride_length_s: 5
    } : {
      return_timestamps: true,
      task: 'transcribe'
    };
    if (languageHint) {
      options.language = languageHint;
    }

    const raw = await transcriber(samples, options);
    const result: unknown = Array.isArray(raw) ? raw[0] : raw;
    if (!isRecognitionOutput(result)) {
      throw new PipelineError(ErrorType.API_ERROR, 'Unexpected output from Whisper pipeline');
    }

    return this.toSegments(result, durationSeconds);
  }

  private toSegments(result: RecognitionOutput, durationSeconds: number): TranscriptionSegment[] {
    if (result.chunks && result.chunks.length > 0) {
      return result.chunks
        .map(chunk => ({
          text: chunk.text.trim(),
          startTime: chunk.timestamp[0] ?? 0,
          endTime: chunk.timestamp[1] ?? durationSeconds
        }))
        .filter(segment => segment.text !== '');
    }

    const text = result.text.trim();
    return text ? [{ text, startTime: 0, endTime: durationSeconds }] : [];
  }

  /**
   * Get available models
   */
  static getAvailableModels(): string[] {
    return [
      'Xenova/whisper-tiny',
      'Xenova/whisper-base',
      'Xenova/whisper-small',
      'Xenova/whisper-medium',
      'Xenova/whisper-large-v3'
    ];
  }

  getModelName(): string {
    return this.modelName;
  }

  /**
   * Check if model is loaded
   */
  isModelLoaded(): boolean {
    return this.transcriber !== null;
  }
}
