export const TARGET_SAMPLE_RATE = 16000;

export type AudioSource = 'microphone' | 'systemAudio';

export interface AudioChunk {
  /** Mono float32 PCM at 16 kHz */
  samples: Float32Array;
  /** Seconds since capture start, monotonic within its source */
  timestamp: number;
  source: AudioSource;
}

export interface LabeledAudioChunk {
  samples: Float32Array;
  timestamp: number;
  speaker: string;
}

/**
 * Segment returned by a transcription backend. Times are relative to the
 * start of the submitted buffer.
 */
export interface TranscriptionSegment {
  text: string;
  startTime: number;
  endTime: number;
}

export type DetectedLanguage = 'en' | 'ru' | 'es';

export interface TranscriptSegment {
  id: string;
  text: string;
  /** Absolute seconds on the capture clock */
  startTime: number;
  endTime: number;
  speaker: string;
  detectedLanguage?: DetectedLanguage;
}

export type AudioFormat = 'wav' | 'mp3' | 'm4a' | 'webm';

export interface LocalTranscriptionBackend {
  readonly kind: 'local';
  transcribe(samples: Float32Array, sampleRate: number, languageHint?: string): Promise<TranscriptionSegment[]>;
}

export interface CloudTranscriptionBackend {
  readonly kind: 'cloud';
  transcribe(audioPayload: Uint8Array, format: AudioFormat): Promise<TranscriptionSegment[]>;
}

export type TranscriptionBackend = LocalTranscriptionBackend | CloudTranscriptionBackend;

export interface SpeakerSegment {
  start: number;
  end: number;
  speakerLabel: string;
}

export interface DiarizationBackend {
  readonly isModelAvailable: boolean;
  process(samples: Float32Array, sampleRate: number): Promise<SpeakerSegment[]>;
}

export interface VADOptions {
  thresholdDB?: number;
  holdOpenWindowSeconds?: number;
}

export interface TranscriptionSession {
  id: string;
  startTime: Date;
  endTime?: Date;
  segments: TranscriptSegment[];
  status: 'recording' | 'processing' | 'completed' | 'error';
}
