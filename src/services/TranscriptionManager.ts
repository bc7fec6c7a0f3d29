import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { AudioMixer, DEFAULT_SPEAKER_LABELS } from './AudioMixer.js';
import { RealtimeTranscriptionService } from './RealtimeTranscriptionService.js';
import { AsyncChannel } from '../utils/AsyncChannel.js';
import {
  AudioChunk,
  AudioSource,
  TARGET_SAMPLE_RATE,
  TranscriptSegment,
  TranscriptionSession
} from '../types/index.js';

interface ActiveSession {
  session: TranscriptionSession;
  inputs: Record<AudioSource, AsyncChannel<AudioChunk>>;
  samplesSeen: Record<AudioSource, number>;
  done: Promise<void>;
}

export interface PipelineStatus {
  running: boolean;
  generation: number;
  languageHint?: string;
  currentSessionId: string | null;
}

/**
 * Owns the capture-side inputs of a live session and collects its transcript.
 *
 * Events:
 * - `segment` (segment, sessionId) for every transcript segment
 * - `session` (session) whenever a session changes status
 */
export class TranscriptionManager extends EventEmitter {
  private sessions: Map<string, TranscriptionSession> = new Map();
  private current: ActiveSession | null = null;

  constructor(
    private pipeline: RealtimeTranscriptionService,
    private labels: Readonly<Record<AudioSource, string>> = DEFAULT_SPEAKER_LABELS
  ) {
    super();
  }

  /**
   * Start a new live session. A session already in progress is superseded.
   */
  startSession(): TranscriptionSession {
    if (this.current) {
      console.log(`Superseding session ${this.current.session.id}`);
      this.closeInputs(this.current);
    }

    const session: TranscriptionSession = {
      id: uuidv4(),
      startTime: new Date(),
      segments: [],
      status: 'recording'
    };
    this.sessions.set(session.id, session);

    const inputs: Record<AudioSource, AsyncChannel<AudioChunk>> = {
      microphone: new AsyncChannel<AudioChunk>(),
      systemAudio: new AsyncChannel<AudioChunk>()
    };
    const mixer = new AudioMixer(inputs.microphone, inputs.systemAudio, this.labels);
    const transcripts = this.pipeline.start(mixer.start());

    const active: ActiveSession = {
      session,
      inputs,
      samplesSeen: { microphone: 0, systemAudio: 0 },
      done: Promise.resolve()
    };
    active.done = this.collect(active, transcripts);
    this.current = active;

    console.log(`Session started: ${session.id}`);
    this.emit('session', session);
    return session;
  }

  /**
   * Feed captured audio into the current session.
   * Without a timestamp the chunk is placed right after the source's previous audio.
   */
  pushChunk(source: AudioSource, samples: Float32Array, timestamp?: number): boolean {
    const active = this.current;
    if (!active || active.session.status !== 'recording') {
      return false;
    }

    const chunkTimestamp = timestamp ?? active.samplesSeen[source] / TARGET_SAMPLE_RATE;
    active.samplesSeen[source] += samples.length;
    return active.inputs[source].push({ samples, timestamp: chunkTimestamp, source });
  }

  /**
   * End capture and wait until everything buffered has been transcribed
   */
  async finishSession(): Promise<TranscriptionSession | null> {
    const active = this.current;
    if (!active) {
      console.log('No session in progress');
      return null;
    }

    this.markProcessing(active);
    this.closeInputs(active);
    await active.done;
    return active.session;
  }

  /**
   * Stop the pipeline right away; buffered audio is still flushed
   */
  async stopSession(): Promise<TranscriptionSession | null> {
    const active = this.current;
    if (!active) {
      console.log('No session in progress');
      return null;
    }

    this.markProcessing(active);
    this.closeInputs(active);
    await this.pipeline.stop();
    await active.done;
    return active.session;
  }

  getSession(sessionId: string): TranscriptionSession | undefined {
    return this.sessions.get(sessionId);
  }

  getAllSessions(): TranscriptionSession[] {
    return Array.from(this.sessions.values());
  }

  getCurrentSession(): TranscriptionSession | null {
    return this.current?.session ?? null;
  }

  isRunning(): boolean {
    return this.pipeline.isRunning;
  }

  setLanguageHint(hint: string | undefined): void {
    this.pipeline.setLanguageHint(hint);
  }

  getStatus(): PipelineStatus {
    return {
      running: this.pipeline.isRunning,
      generation: this.pipeline.currentGeneration,
      languageHint: this.pipeline.getLanguageHint(),
      currentSessionId: this.current?.session.id ?? null
    };
  }

  private async collect(active: ActiveSession, transcripts: AsyncIterable<TranscriptSegment>): Promise<void> {
    const { session } = active;
    try {
      for await (const segment of transcripts) {
        session.segments.push(segment);
        this.emit('segment', segment, session.id);
      }
      session.status = 'completed';
    } catch (error) {
      console.error(`Session ${session.id} failed:`, error);
      session.status = 'error';
    }

    session.endTime = new Date();
    this.closeInputs(active);
    if (this.current === active) {
      this.current = null;
    }

    console.log(`Session ${session.id} ${session.status} with ${session.segments.length} segments`);
    this.emit('session', session);
  }

  private markProcessing(active: ActiveSession): void {
    if (active.session.status === 'recording') {
      active.session.status = 'processing';
      this.emit('session', active.session);
    }
  }

  private closeInputs(active: ActiveSession): void {
    active.inputs.microphone.close();
    active.inputs.systemAudio.close();
  }
}
