import { TARGET_SAMPLE_RATE } from '../types/index.js';

export interface BufferSnapshot {
  samples: Float32Array;
  startTime: number;
  duration: number;
}

export interface SpeakerBufferInfo {
  sampleCount: number;
  duration: number;
  startTime: number;
  lastChunkTime: number;
}

/**
 * Growable window of audio accumulated for one speaker
 */
export class SpeakerBuffer {
  private data: Float32Array;
  private length = 0;
  startTime = 0;
  lastChunkTime = 0;

  constructor(readonly sampleRate: number = TARGET_SAMPLE_RATE) {
    this.data = new Float32Array(sampleRate * 2);
  }

  get sampleCount(): number {
    return this.length;
  }

  get duration(): number {
    return this.length / this.sampleRate;
  }

  get isEmpty(): boolean {
    return this.length === 0;
  }

  append(samples: Float32Array, timestamp: number): void {
    if (this.length === 0) {
      this.startTime = timestamp;
    }

    this.ensureCapacity(this.length + samples.length);
    this.data.set(samples, this.length);
    this.length += samples.length;
    this.lastChunkTime = timestamp;
  }

  /**
   * Drop the oldest samples so at most maxSamples remain.
   * startTime moves forward by the dropped duration.
   */
  trimTo(maxSamples: number): number {
    const excess = this.length - maxSamples;
    if (excess <= 0) return 0;

    this.data.copyWithin(0, excess, this.length);
    this.length = maxSamples;
    this.startTime += excess / this.sampleRate;
    return excess;
  }

  /**
   * Copy out the current contents and clear the buffer
   */
  takeSnapshot(): BufferSnapshot {
    const snapshot: BufferSnapshot = {
      samples: this.data.slice(0, this.length),
      startTime: this.startTime,
      duration: this.duration
    };
    this.clear();
    return snapshot;
  }

  clear(): void {
    this.length = 0;
    this.startTime = 0;
    this.lastChunkTime = 0;
  }

  info(): SpeakerBufferInfo {
    return {
      sampleCount: this.length,
      duration: this.duration,
      startTime: this.startTime,
      lastChunkTime: this.lastChunkTime
    };
  }

  private ensureCapacity(required: number): void {
    if (required <= this.data.length) return;

    let capacity = Math.max(this.data.length, 1);
    while (capacity < required) {
      capacity *= 2;
    }
    const grown = new Float32Array(capacity);
    grown.set(this.data.subarray(0, this.length));
    this.data = grown;
  }
}
