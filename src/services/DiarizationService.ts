import { DiarizationResult } from '../models/DiarizationResult.js';
import { DiarizationBackend, TARGET_SAMPLE_RATE } from '../types/index.js';
import { decodeWav } from '../utils/audio.js';

/**
 * Offline speaker diarization of a complete recording.
 * Keeps the most recent result for lookups and renames.
 */
export class DiarizationService {
  private cachedResult: DiarizationResult | null = null;

  constructor(private readonly backend: DiarizationBackend) {}

  get isAvailable(): boolean {
    return this.backend.isModelAvailable;
  }

  async diarize(samples: Float32Array, sampleRate: number): Promise<DiarizationResult> {
    if (samples.length === 0) {
      return this.cache(DiarizationResult.empty());
    }

    if (!this.backend.isModelAvailable) {
      console.warn('Diarization model not available, returning empty result');
      return this.cache(DiarizationResult.empty());
    }

    const duration = samples.length / sampleRate;
    console.log(`Starting diarization of ${duration.toFixed(1)}s of audio`);

    const segments = await this.backend.process(samples, sampleRate);
    const result = DiarizationResult.fromSegments(segments);

    console.log(`Diarization complete: ${result.speakerCount} speakers, ${result.segments.length} segments`);
    return this.cache(result);
  }

  /**
   * Decode a WAV file and diarize it
   */
  async diarizeWav(bytes: Uint8Array): Promise<DiarizationResult> {
    return this.diarize(decodeWav(bytes), TARGET_SAMPLE_RATE);
  }

  speakerLabelAt(time: number): string | null {
    return this.cachedResult?.speakerLabelAt(time) ?? null;
  }

  renameSpeaker(oldLabel: string, newLabel: string): void {
    this.cachedResult?.renameSpeaker(oldLabel, newLabel);
  }

  getCachedResult(): DiarizationResult | null {
    return this.cachedResult;
  }

  private cache(result: DiarizationResult): DiarizationResult {
    this.cachedResult = result;
    return result;
  }
}
