import pkg from 'wavefile';
const { WaveFile } = pkg;
import { ErrorType, PipelineError } from '../errors.js';
import { TARGET_SAMPLE_RATE } from '../types/index.js';

const INT16_MAX = 32767;

/**
 * Root-mean-square energy of a block of samples
 */
export function calculateRMS(samples: Float32Array): number {
  if (samples.length === 0) return 0;

  let sum = 0;
  for (let i = 0; i < samples.length; i++) {
    sum += samples[i] * samples[i];
  }
  return Math.sqrt(sum / samples.length);
}

export function decibelsToLinear(db: number): number {
  return Math.pow(10, db / 20);
}

export function linearToDecibels(value: number): number {
  return 20 * Math.log10(Math.max(value, 1e-10));
}

export function durationOf(sampleCount: number, sampleRate: number = TARGET_SAMPLE_RATE): number {
  return sampleCount / sampleRate;
}

/**
 * Encode float32 samples as a 16-bit little-endian PCM WAV file, mono.
 * Samples are clamped to [-1, 1] and scaled by 32767 (truncating).
 */
export function encodeWav(samples: Float32Array, sampleRate: number = TARGET_SAMPLE_RATE): Uint8Array {
  const pcm = new Int16Array(samples.length);
  for (let i = 0; i < samples.length; i++) {
    const clamped = Math.max(-1, Math.min(1, samples[i]));
    pcm[i] = Math.trunc(clamped * INT16_MAX);
  }

  const wav = new WaveFile();
  wav.fromScratch(1, sampleRate, '16', pcm);
  return wav.toBuffer();
}

function sampleRateOf(wav: InstanceType<typeof WaveFile>): number | null {
  const fmt = wav.fmt;
  return 'sampleRate' in fmt && typeof fmt.sampleRate === 'number' ? fmt.sampleRate : null;
}

/**
 * Decode a WAV file into mono float32 samples at 16 kHz.
 * Multi-channel audio is averaged down to one channel.
 */
export function decodeWav(bytes: Uint8Array): Float32Array {
  let wav: InstanceType<typeof WaveFile>;
  try {
    wav = new WaveFile(bytes);
  } catch (error) {
    throw new PipelineError(
      ErrorType.AUDIO_DECODE_ERROR,
      `Invalid WAV data: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  wav.toBitDepth('32f');
  // Resampling is lossy; 16 kHz input passes through as is
  if (sampleRateOf(wav) !== TARGET_SAMPLE_RATE) {
    wav.toSampleRate(TARGET_SAMPLE_RATE);
  }

  const raw: unknown = wav.getSamples(false, Float32Array);
  const candidates: unknown[] = Array.isArray(raw) ? raw : [raw];
  const channels: Float32Array[] = [];
  for (const candidate of candidates) {
    if (!(candidate instanceof Float32Array)) {
      throw new PipelineError(ErrorType.AUDIO_DECODE_ERROR, 'Unexpected sample layout in WAV data');
    }
    channels.push(candidate);
  }

  if (channels.length === 0) {
    return new Float32Array(0);
  }
  if (channels.length === 1) {
    return channels[0];
  }

  const frameCount = Math.min(...channels.map(channel => channel.length));
  const mono = new Float32Array(frameCount);
  for (let frame = 0; frame < frameCount; frame++) {
    let sum = 0;
    for (const channel of channels) {
      sum += channel[frame];
    }
    mono[frame] = sum / channels.length;
  }
  return mono;
}

/**
 * Interpret a little-endian float32 byte payload as samples
 */
export function float32FromBytes(bytes: Uint8Array): Float32Array {
  const count = Math.floor(bytes.byteLength / 4);
  const view = new DataView(bytes.buffer, bytes.byteOffset, count * 4);
  const samples = new Float32Array(count);
  for (let i = 0; i < count; i++) {
    samples[i] = view.getFloat32(i * 4, true);
  }
  return samples;
}
