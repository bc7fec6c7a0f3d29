import { AsyncChannel } from '../utils/AsyncChannel.js';
import { shouldLogCount } from '../utils/logging.js';
import { AudioChunk, AudioSource, LabeledAudioChunk } from '../types/index.js';

export const DEFAULT_SPEAKER_LABELS: Readonly<Record<AudioSource, string>> = {
  microphone: 'You',
  systemAudio: 'Others'
};

/**
 * Fans microphone and system audio into one labeled stream.
 *
 * Chunks are labeled and forwarded as they arrive; waveforms are never mixed
 * and no reordering happens across sources.
 */
export class AudioMixer {
  constructor(
    private readonly microphoneStream: AsyncIterable<AudioChunk>,
    private readonly systemAudioStream: AsyncIterable<AudioChunk>,
    private readonly labels: Readonly<Record<AudioSource, string>> = DEFAULT_SPEAKER_LABELS
  ) {}

  /**
   * Start reading both sources. The returned stream completes once both have ended.
   */
  start(): AsyncIterable<LabeledAudioChunk> {
    const output = new AsyncChannel<LabeledAudioChunk>();
    console.log('AudioMixer starting');

    this.pump(output).catch(error => {
      console.error('AudioMixer failed:', error);
      output.fail(error);
    });

    return output;
  }

  private async pump(output: AsyncChannel<LabeledAudioChunk>): Promise<void> {
    await Promise.all([
      this.forward(this.microphoneStream, 'microphone', output),
      this.forward(this.systemAudioStream, 'systemAudio', output)
    ]);

    console.log('Both audio streams completed, finishing mixer');
    output.close();
  }

  private async forward(
    stream: AsyncIterable<AudioChunk>,
    name: AudioSource,
    output: AsyncChannel<LabeledAudioChunk>
  ): Promise<void> {
    const iterator = stream[Symbol.asyncIterator]();
    const released = new Promise<IteratorReturnResult<undefined>>(resolve => {
      output.onClose(() => resolve({ done: true, value: undefined }));
    });
    let chunkCount = 0;

    try {
      while (true) {
        const pending = iterator.next();
        const next = await Promise.race([pending, released]);

        if (output.isClosed) {
          // Consumer went away; a stalled pull must not keep the source open
          pending.catch(error => console.warn(`${name} stream failed after release:`, error));
          this.release(iterator, name);
          console.log(`${name} stream released after ${chunkCount} chunks`);
          return;
        }
        if (next.done) break;

        chunkCount++;
        output.push(this.labelChunk(next.value));

        if (shouldLogCount(chunkCount)) {
          console.log(`${name} chunk #${chunkCount}: ${next.value.samples.length} samples`);
        }
      }
    } catch (error) {
      console.error(`${name} stream failed after ${chunkCount} chunks:`, error);
      return;
    }

    console.log(`${name} stream ended after ${chunkCount} chunks`);
  }

  private release(iterator: AsyncIterator<AudioChunk>, name: AudioSource): void {
    const closing = iterator.return?.();
    closing?.catch(error => console.warn(`Failed to release ${name} stream:`, error));
  }

  private labelChunk(chunk: AudioChunk): LabeledAudioChunk {
    return {
      samples: chunk.samples,
      timestamp: chunk.timestamp,
      speaker: this.labels[chunk.source]
    };
  }
}
