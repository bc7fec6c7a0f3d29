#!/usr/bin/env node

import fs from 'fs';
import { createApp, startServer } from './api/server.js';
import { createServices } from './bootstrap.js';
import { loadConfig } from './config/index.js';
import { WhisperService } from './services/WhisperService.js';
import { TARGET_SAMPLE_RATE, TranscriptSegment } from './types/index.js';
import { decodeWav, durationOf } from './utils/audio.js';

// 100ms chunks, the size capture devices usually deliver
const FILE_CHUNK_SAMPLES = TARGET_SAMPLE_RATE / 10;

async function main() {
  const args = process.argv.slice(2);

  if (args[0] === '--transcribe' && args[1]) {
    await transcribeFile(args[1]);
  } else if (args[0] === '--diarize' && args[1]) {
    await diarizeFile(args[1]);
  } else if (args[0] === '--help') {
    console.log('Usage:');
    console.log('  live-transcribe                       - Start API server');
    console.log('  live-transcribe --transcribe <file>   - Stream a WAV file through the live pipeline');
    console.log('  live-transcribe --diarize <file>      - Diarize a WAV file');
    console.log(`Whisper models (WHISPER_MODEL): ${WhisperService.getAvailableModels().join(', ')}`);
    return;
  } else {
    // Default: start server
    const config = loadConfig();
    const services = createServices(config);
    await startServer(createApp(services), config.port);
  }
}

function formatSegment(segment: TranscriptSegment): string {
  const language = segment.detectedLanguage ? ` (${segment.detectedLanguage})` : '';
  return `[${segment.startTime.toFixed(2)}-${segment.endTime.toFixed(2)}] ${segment.speaker}${language}: ${segment.text}`;
}

async function transcribeFile(filePath: string) {
  const config = loadConfig();
  const { manager } = createServices(config);
  const samples = decodeWav(fs.readFileSync(filePath));

  console.log(`Transcribing: ${filePath} (${durationOf(samples.length).toFixed(1)}s)`);
  manager.on('segment', (segment: TranscriptSegment) => console.log(formatSegment(segment)));

  manager.startSession();
  for (let offset = 0; offset < samples.length; offset += FILE_CHUNK_SAMPLES) {
    manager.pushChunk('microphone', samples.subarray(offset, offset + FILE_CHUNK_SAMPLES));
  }

  const session = await manager.finishSession();
  console.log(`Done: ${session?.segments.length ?? 0} segments`);
}

async function diarizeFile(filePath: string) {
  const config = loadConfig();
  const { diarization } = createServices(config);

  if (!diarization.isAvailable) {
    console.log('Diarization is not configured (set DIARIZATION_URL)');
  }

  const result = await diarization.diarizeWav(fs.readFileSync(filePath));
  console.log(`Speakers: ${result.speakerCount}`);
  for (const segment of result.segments) {
    console.log(`[${segment.start.toFixed(2)}-${segment.end.toFixed(2)}] ${segment.speakerLabel}`);
  }
}

main().catch(error => {
  console.error(error);
  process.exitCode = 1;
});
