import { LabeledAudioChunk, VADOptions } from '../types/index.js';
import { calculateRMS, decibelsToLinear, linearToDecibels } from '../utils/audio.js';
import { shouldLogCount } from '../utils/logging.js';

export interface VADStats {
  processed: number;
  passed: number;
  filtered: number;
}

/**
 * Energy-based voice activity gate with a hold-open window.
 *
 * Note: lastSpeechTime is shared by every chunk passing through one instance,
 * whichever speaker it belongs to, so speech on one channel keeps the window
 * open for silence on the other.
 */
export class VADService {
  private thresholdDB: number;
  private thresholdLinear: number;
  private readonly holdOpenWindowSeconds: number;
  private lastSpeechTime: number | null = null;
  private stats: VADStats = { processed: 0, passed: 0, filtered: 0 };

  constructor(options: VADOptions = {}) {
    const defaultOptions = {
      thresholdDB: -50,          // dB threshold for speech detection
      holdOpenWindowSeconds: 0.8 // keep passing audio this long after speech
    };
    const merged = { ...defaultOptions, ...options };

    this.thresholdDB = merged.thresholdDB;
    this.holdOpenWindowSeconds = merged.holdOpenWindowSeconds;
    this.thresholdLinear = decibelsToLinear(this.thresholdDB);
  }

  /**
   * Pass speech (and silence inside the hold-open window), drop the rest
   */
  filter(chunk: LabeledAudioChunk): LabeledAudioChunk | null {
    const chunkNum = ++this.stats.processed;
    const rms = calculateRMS(chunk.samples);
    const isSpeech = rms > this.thresholdLinear;

    if (shouldLogCount(chunkNum)) {
      console.log(
        `VAD chunk #${chunkNum} [${chunk.speaker}]: RMS=${rms.toFixed(6)} (${linearToDecibels(rms).toFixed(1)} dB), ` +
        `threshold=${this.thresholdDB} dB, isSpeech=${isSpeech}`
      );
    }

    if (isSpeech) {
      this.lastSpeechTime = chunk.timestamp;
      this.stats.passed++;
      return chunk;
    }

    if (this.lastSpeechTime !== null && chunk.timestamp - this.lastSpeechTime < this.holdOpenWindowSeconds) {
      this.stats.passed++;
      return chunk;
    }

    const filteredNum = ++this.stats.filtered;
    if (shouldLogCount(filteredNum)) {
      console.log(`VAD filtered chunk #${chunkNum} (total filtered: ${filteredNum})`);
    }
    return null;
  }

  /**
   * Forget hold-open state and counters
   */
  reset(): void {
    this.lastSpeechTime = null;
    this.stats = { processed: 0, passed: 0, filtered: 0 };
  }

  /**
   * Update threshold dynamically
   */
  setThreshold(thresholdDB: number): void {
    this.thresholdDB = thresholdDB;
    this.thresholdLinear = decibelsToLinear(thresholdDB);
  }

  getThresholdDB(): number {
    return this.thresholdDB;
  }

  getHoldOpenWindowSeconds(): number {
    return this.holdOpenWindowSeconds;
  }

  getStats(): VADStats {
    return { ...this.stats };
  }
}
