import { describe, it, expect } from 'vitest';
import { VADService } from './VADService.js';
import { LabeledAudioChunk } from '../types/index.js';

const CHUNK = 1600;

function chunk(timestamp: number, amplitude: number, speaker = 'You'): LabeledAudioChunk {
  return { samples: new Float32Array(CHUNK).fill(amplitude), timestamp, speaker };
}

const speech = (t: number, speaker?: string) => chunk(t, 0.1, speaker);
const silence = (t: number, speaker?: string) => chunk(t, 0, speaker);

describe('VADService', () => {
  it('should pass speech above the threshold', () => {
    const vad = new VADService({ thresholdDB: -50 });
    const input = speech(0);

    expect(vad.filter(input)).toBe(input);
  });

  it('should drop silence when nothing was spoken yet', () => {
    const vad = new VADService();
    expect(vad.filter(silence(0))).toBeNull();
  });

  it('should hold the gate open after speech and close it at the window edge', () => {
    const vad = new VADService({ holdOpenWindowSeconds: 0.8 });

    expect(vad.filter(speech(0))).not.toBeNull();
    expect(vad.filter(silence(0.5))).not.toBeNull();
    expect(vad.filter(silence(0.75))).not.toBeNull();
    expect(vad.filter(silence(1.0))).toBeNull();
  });

  it('should measure the window from the last speech, not the last passed chunk', () => {
    const vad = new VADService({ holdOpenWindowSeconds: 0.8 });

    vad.filter(speech(0));
    vad.filter(silence(0.7));

    expect(vad.filter(silence(0.85))).toBeNull();
  });

  it('should share hold-open state across speakers', () => {
    const vad = new VADService({ holdOpenWindowSeconds: 0.8 });

    vad.filter(speech(0, 'You'));

    expect(vad.filter(silence(0.3, 'Others'))).not.toBeNull();
  });

  it('should treat a quiet signal as silence below a raised threshold', () => {
    const vad = new VADService({ thresholdDB: -50 });
    const quiet = chunk(0, 0.01); // -40 dB

    expect(vad.filter(quiet)).not.toBeNull();

    vad.reset();
    vad.setThreshold(-30);
    expect(vad.getThresholdDB()).toBe(-30);
    expect(vad.filter(chunk(5, 0.01))).toBeNull();
  });

  it('should forget speech and counters on reset', () => {
    const vad = new VADService();
    vad.filter(speech(0));
    vad.filter(silence(10));

    expect(vad.getStats()).toEqual({ processed: 2, passed: 1, filtered: 1 });

    vad.reset();

    expect(vad.getStats()).toEqual({ processed: 0, passed: 0, filtered: 0 });
    expect(vad.filter(silence(0.1))).toBeNull();
  });

  it('should use the documented defaults', () => {
    const vad = new VADService();
    expect(vad.getThresholdDB()).toBe(-50);
    expect(vad.getHoldOpenWindowSeconds()).toBe(0.8);
  });
});
