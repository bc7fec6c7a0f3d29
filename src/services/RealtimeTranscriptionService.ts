import { v4 as uuidv4 } from 'uuid';
import { VADService } from './VADService.js';
import { LanguageDetector } from './LanguageDetector.js';
import { SpeakerBuffer, SpeakerBufferInfo, BufferSnapshot } from '../models/SpeakerBuffer.js';
import { AsyncChannel } from '../utils/AsyncChannel.js';
import { encodeWav } from '../utils/audio.js';
import { shouldLogCount } from '../utils/logging.js';
import {
  LabeledAudioChunk,
  TARGET_SAMPLE_RATE,
  TranscriptSegment,
  TranscriptionBackend,
  TranscriptionSegment
} from '../types/index.js';

export interface TranscriptionErrorContext {
  speaker: string;
  generation: number;
  /** Seconds of audio dropped with the failed call */
  duration: number;
}

export interface RealtimeTranscriptionOptions {
  minBufferDurationSeconds?: number; // Buffer length that triggers a transcription
  maxBufferDurationSeconds?: number; // Trim point while a transcription is in flight
  drainPollIntervalMs?: number;
  stopTimeoutMs?: number;
  languageHint?: string;
  onTranscriptionError?: (error: unknown, context: TranscriptionErrorContext) => void;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Streaming transcription over a merged, labeled chunk stream.
 *
 * Audio is gated by VAD and accumulated per speaker. Once a speaker holds
 * minBufferDurationSeconds of audio and has nothing in flight, the buffer is
 * handed to the backend without blocking the read loop. At most one call is in
 * flight per speaker; while one is, the buffer is trimmed back to the minimum
 * whenever it reaches maxBufferDurationSeconds.
 *
 * Every start() bumps the generation. Work captured under an older generation
 * never touches buffers, the active set or the output.
 */
export class RealtimeTranscriptionService {
  private readonly buffers = new Map<string, SpeakerBuffer>();
  private readonly activeTranscriptions = new Set<string>();
  private generation = 0;
  private running = false;
  private output: AsyncChannel<TranscriptSegment> | null = null;
  private abortController: AbortController | null = null;
  private languageHint: string | undefined;

  private readonly minBufferDurationSeconds: number;
  private readonly maxBufferDurationSeconds: number;
  private readonly drainPollIntervalMs: number;
  private readonly stopTimeoutMs: number;
  private readonly onTranscriptionError: (error: unknown, context: TranscriptionErrorContext) => void;

  constructor(
    private readonly backend: TranscriptionBackend,
    options: RealtimeTranscriptionOptions = {},
    private readonly vad: VADService = new VADService(),
    private readonly languageDetector: LanguageDetector = new LanguageDetector()
  ) {
    this.minBufferDurationSeconds = options.minBufferDurationSeconds ?? 2.0;
    this.maxBufferDurationSeconds = options.maxBufferDurationSeconds ?? 5.0;
    this.drainPollIntervalMs = options.drainPollIntervalMs ?? 50;
    this.stopTimeoutMs = options.stopTimeoutMs ?? 10000;
    this.languageHint = options.languageHint;
    this.onTranscriptionError = options.onTranscriptionError ?? ((error, context) => {
      console.error(
        `Transcription failed for [${context.speaker}] (gen ${context.generation}), ` +
        `dropping ${context.duration.toFixed(2)}s of audio:`,
        error
      );
    });
  }

  get isRunning(): boolean {
    return this.running;
  }

  get currentGeneration(): number {
    return this.generation;
  }

  /**
   * Start consuming a merged stream. Any previous run is superseded and its
   * output completed.
   */
  start(mixedStream: AsyncIterable<LabeledAudioChunk>): AsyncIterable<TranscriptSegment> {
    this.abortController?.abort();
    this.output?.close();

    this.generation += 1;
    const gen = this.generation;

    this.buffers.clear();
    this.activeTranscriptions.clear();
    this.vad.reset();
    this.running = true;

    const output = new AsyncChannel<TranscriptSegment>();
    const controller = new AbortController();
    this.output = output;
    this.abortController = controller;

    console.log(`Transcription pipeline starting generation ${gen}`);

    this.processStream(mixedStream, gen, controller.signal).catch(error => {
      console.error(`Transcription pipeline loop failed (gen ${gen}):`, error);
      if (this.generation === gen) {
        this.running = false;
        output.fail(error);
      }
    });

    return output;
  }

  /**
   * Stop reading, wait for in-flight calls (bounded), transcribe whatever is
   * still buffered and complete the output.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    this.running = false;
    const gen = this.generation;
    this.abortController?.abort();
    this.abortController = null;

    const deadline = Date.now() + this.stopTimeoutMs;
    while (this.activeTranscriptions.size > 0 && Date.now() < deadline) {
      await sleep(this.drainPollIntervalMs);
      if (this.generation !== gen) return;
    }

    try {
      await this.flushAllBuffers(gen);
    } finally {
      // The output is terminal after stop, even if the flush failed
      if (this.generation === gen) {
        this.output?.close();
        this.output = null;
        this.buffers.clear();
        this.activeTranscriptions.clear();
        console.log(`Transcription pipeline stopped (gen ${gen})`);
      }
    }
  }

  setLanguageHint(hint: string | undefined): void {
    this.languageHint = hint;
  }

  getLanguageHint(): string | undefined {
    return this.languageHint;
  }

  getBufferInfo(speaker: string): SpeakerBufferInfo | null {
    return this.buffers.get(speaker)?.info() ?? null;
  }

  isTranscribing(speaker: string): boolean {
    return this.activeTranscriptions.has(speaker);
  }

  private async processStream(
    stream: AsyncIterable<LabeledAudioChunk>,
    gen: number,
    signal: AbortSignal
  ): Promise<void> {
    const iterator = stream[Symbol.asyncIterator]();
    const stopped = new Promise<IteratorReturnResult<undefined>>(resolve => {
      if (signal.aborted) {
        resolve({ done: true, value: undefined });
        return;
      }
      signal.addEventListener('abort', () => resolve({ done: true, value: undefined }), { once: true });
    });

    let chunkCount = 0;
    while (true) {
      const pending = iterator.next();
      const next = await Promise.race([pending, stopped]);
      if (next.done) {
        if (signal.aborted) {
          // Nobody awaits the abandoned read any more
          pending.catch(error => console.warn('Pipeline input failed after release:', error));
        }
        break;
      }
      if (signal.aborted || !this.running || this.generation !== gen) break;

      chunkCount++;
      if (shouldLogCount(chunkCount)) {
        console.log(`Pipeline received chunk #${chunkCount} from [${next.value.speaker}]: ${next.value.samples.length} samples`);
      }
      this.ingest(next.value, gen);
    }

    if (signal.aborted || this.generation !== gen) {
      this.releaseInput(iterator);
      console.log(`Pipeline gen ${gen} stopped or superseded after ${chunkCount} chunks`);
      return;
    }

    console.log(`Pipeline stream ended (gen ${gen}) after ${chunkCount} chunks, draining`);

    while (this.activeTranscriptions.size > 0) {
      await sleep(this.drainPollIntervalMs);
      if (signal.aborted || this.generation !== gen) return;
    }

    await this.flushAllBuffers(gen);
    if (signal.aborted || this.generation !== gen) return;

    this.running = false;
    this.abortController = null;
    this.output?.close();
    this.output = null;
    this.buffers.clear();
    console.log(`Pipeline gen ${gen} finished`);
  }

  private ingest(chunk: LabeledAudioChunk, gen: number): void {
    const accepted = this.vad.filter(chunk);
    if (!accepted) return;

    const speaker = accepted.speaker;
    let buffer = this.buffers.get(speaker);
    if (!buffer) {
      buffer = new SpeakerBuffer(TARGET_SAMPLE_RATE);
      this.buffers.set(speaker, buffer);
      console.log(`Pipeline: created buffer for speaker [${speaker}]`);
    }
    buffer.append(accepted.samples, accepted.timestamp);

    const duration = buffer.duration;
    const busy = this.activeTranscriptions.has(speaker);

    if (duration >= this.minBufferDurationSeconds && !busy) {
      this.scheduleTranscription(speaker, gen);
    } else if (duration >= this.maxBufferDurationSeconds && busy) {
      const removed = buffer.trimTo(Math.round(this.minBufferDurationSeconds * TARGET_SAMPLE_RATE));
      if (removed > 0) {
        console.log(`Pipeline: trimmed [${speaker}] buffer by ${removed} samples (transcription in progress)`);
      }
    }
  }

  /**
   * Hand the speaker's buffer to the backend without awaiting it
   */
  private scheduleTranscription(speaker: string, gen: number): void {
    const buffer = this.buffers.get(speaker);
    if (!buffer || buffer.isEmpty) return;

    const snapshot = buffer.takeSnapshot();
    this.activeTranscriptions.add(speaker);
    console.log(`Pipeline: scheduling transcription for [${speaker}] (${snapshot.duration.toFixed(2)}s)`);

    this.transcribeSnapshot(speaker, snapshot, gen)
      .finally(() => {
        if (this.generation === gen) {
          this.activeTranscriptions.delete(speaker);
        }
      })
      .catch(error => console.error(`Transcription task for [${speaker}] failed unexpectedly:`, error));
  }

  private async transcribeSnapshot(speaker: string, snapshot: BufferSnapshot, gen: number): Promise<void> {
    if (this.generation !== gen) return;

    let segments: TranscriptionSegment[];
    try {
      segments = await this.callBackend(snapshot.samples);
    } catch (error) {
      this.reportFailure(error, { speaker, generation: gen, duration: snapshot.duration });
      return;
    }

    if (this.generation !== gen) {
      console.log(`Discarding ${segments.length} segments from superseded generation ${gen}`);
      return;
    }

    for (const segment of segments) {
      const text = segment.text.trim();
      if (!text) continue;

      this.output?.push({
        id: uuidv4(),
        text,
        startTime: snapshot.startTime + segment.startTime,
        endTime: snapshot.startTime + segment.endTime,
        speaker,
        detectedLanguage: this.languageDetector.detect(text)
      });
    }
  }

  private reportFailure(error: unknown, context: TranscriptionErrorContext): void {
    try {
      this.onTranscriptionError(error, context);
    } catch (hookError) {
      console.error(`Transcription error handler failed for [${context.speaker}]:`, hookError);
    }
  }

  private callBackend(samples: Float32Array): Promise<TranscriptionSegment[]> {
    const backend = this.backend;
    if (backend.kind === 'cloud') {
      return backend.transcribe(encodeWav(samples, TARGET_SAMPLE_RATE), 'wav');
    }
    return backend.transcribe(samples, TARGET_SAMPLE_RATE, this.languageHint);
  }

  /**
   * Transcribe every non-empty buffer, one at a time
   */
  private async flushAllBuffers(gen: number): Promise<void> {
    for (const [speaker, buffer] of [...this.buffers]) {
      if (this.generation !== gen) return;
      if (buffer.isEmpty) continue;

      if (this.activeTranscriptions.has(speaker)) {
        console.warn(`Dropping ${buffer.duration.toFixed(2)}s for [${speaker}]: transcription still in flight`);
        buffer.clear();
        continue;
      }

      const snapshot = buffer.takeSnapshot();
      this.activeTranscriptions.add(speaker);
      try {
        await this.transcribeSnapshot(speaker, snapshot, gen);
      } finally {
        if (this.generation === gen) {
          this.activeTranscriptions.delete(speaker);
        }
      }
    }
  }

  private releaseInput(iterator: AsyncIterator<LabeledAudioChunk>): void {
    const closing = iterator.return?.();
    closing?.catch(error => console.warn('Failed to release pipeline input:', error));
  }
}
