import { describe, it, expect, vi } from 'vitest';
import { AxiosError } from 'axios';
import { RemoteDiarizationBackend } from './RemoteDiarizationBackend.js';
import { ErrorType } from '../errors.js';

describe('RemoteDiarizationBackend', () => {
  it('should be unavailable without a worker URL', async () => {
    const backend = new RemoteDiarizationBackend({});

    expect(backend.isModelAvailable).toBe(false);
    await expect(backend.process(new Float32Array(10), 16000)).rejects.toMatchObject({
      type: ErrorType.MODEL_NOT_AVAILABLE
    });
  });

  it('should post the audio as WAV and map worker segments', async () => {
    const post = vi.fn().mockResolvedValue({
      data: {
        success: true,
        segments: [
          { speaker_id: 'SPEAKER_0', start_time: 0, end_time: 1.5, confidence: 0.9 },
          { speaker_id: 'SPEAKER_1', start_time: 1.5, end_time: 3 }
        ]
      }
    });
    const backend = new RemoteDiarizationBackend({ client: { post } });

    const segments = await backend.process(new Float32Array(16000), 16000);

    expect(segments).toEqual([
      { start: 0, end: 1.5, speakerLabel: 'SPEAKER_0' },
      { start: 1.5, end: 3, speakerLabel: 'SPEAKER_1' }
    ]);
    const [url, body, config]: unknown[] = post.mock.calls[0];
    expect(url).toBe('/diarize');
    expect(body).toBeInstanceOf(Uint8Array);
    expect(body instanceof Uint8Array && String.fromCharCode(...body.subarray(0, 4))).toBe('RIFF');
    expect(config).toEqual({ headers: { 'Content-Type': 'audio/wav' } });
  });

  it('should surface a worker-reported failure', async () => {
    const post = vi.fn().mockResolvedValue({ data: { success: false, segments: [], error: 'no speech' } });
    const backend = new RemoteDiarizationBackend({ client: { post } });

    await expect(backend.process(new Float32Array(10), 16000)).rejects.toMatchObject({
      type: ErrorType.DIARIZATION_FAILED,
      message: 'Diarization failed: no speech'
    });
  });

  it('should reject malformed segments', async () => {
    const post = vi.fn().mockResolvedValue({ data: { success: true, segments: [{ speaker: 'A' }] } });
    const backend = new RemoteDiarizationBackend({ client: { post } });

    await expect(backend.process(new Float32Array(10), 16000)).rejects.toMatchObject({
      type: ErrorType.DIARIZATION_FAILED
    });
  });

  it('should map connection failures to network errors', async () => {
    const post = vi.fn().mockRejectedValue(new AxiosError('socket hang up', 'ECONNRESET'));
    const backend = new RemoteDiarizationBackend({ client: { post } });

    await expect(backend.process(new Float32Array(10), 16000)).rejects.toMatchObject({
      type: ErrorType.NETWORK_ERROR,
      retryable: true
    });
  });
});
