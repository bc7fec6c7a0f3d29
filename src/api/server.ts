import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import { Server } from 'http';
import { TranscriptionManager } from '../services/TranscriptionManager.js';
import { DiarizationService } from '../services/DiarizationService.js';
import { PipelineError, ErrorType } from '../errors.js';
import { AudioSource, TranscriptSegment, TranscriptionSession } from '../types/index.js';
import { float32FromBytes } from '../utils/audio.js';

export interface AppServices {
  manager: TranscriptionManager;
  diarization: DiarizationService;
}

// WAV uploads are kept in memory and decoded directly
const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: 100 * 1024 * 1024 // 100MB limit
  }
});

function isAudioSource(value: string): value is AudioSource {
  return value === 'microphone' || value === 'systemAudio';
}

function errorStatus(error: unknown): number {
  if (error instanceof PipelineError) {
    switch (error.type) {
      case ErrorType.AUDIO_DECODE_ERROR:
      case ErrorType.INVALID_CONFIG:
        return 400;
      case ErrorType.MODEL_NOT_AVAILABLE:
        return 503;
      default:
        return 502;
    }
  }
  return 500;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/**
 * Build the HTTP API around a manager and a diarization service
 */
export function createApp({ manager, diarization }: AppServices): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  /**
   * Health check endpoint
   */
  app.get('/health', (req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.get('/api/pipeline/status', (req: Request, res: Response) => {
    res.json(manager.getStatus());
  });

  app.put('/api/pipeline/language', (req: Request, res: Response) => {
    const language: unknown = req.body?.language;
    if (language !== undefined && language !== null && typeof language !== 'string') {
      res.status(400).json({ error: 'language must be a string or null' });
      return;
    }
    const hint = typeof language === 'string' && language.trim() !== '' ? language.trim() : undefined;
    manager.setLanguageHint(hint);
    res.json({ languageHint: hint ?? null });
  });

  app.post('/api/sessions/start', (req: Request, res: Response) => {
    const session = manager.startSession();
    res.status(201).json(session);
  });

  app.post('/api/sessions/finish', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = await manager.finishSession();
      if (!session) {
        res.status(400).json({ error: 'No session in progress' });
        return;
      }
      res.json(session);
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/sessions/stop', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = await manager.stopSession();
      if (!session) {
        res.status(400).json({ error: 'No session in progress' });
        return;
      }
      res.json(session);
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/sessions', (req: Request, res: Response) => {
    res.json(manager.getAllSessions());
  });

  app.get('/api/sessions/:sessionId', (req: Request, res: Response) => {
    const session = manager.getSession(req.params.sessionId);
    if (!session) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }
    res.json(session);
  });

  /**
   * Raw little-endian float32 samples at 16 kHz
   */
  app.post(
    '/api/audio/:source',
    express.raw({ type: () => true, limit: '10mb' }),
    (req: Request, res: Response) => {
      const { source } = req.params;
      if (!isAudioSource(source)) {
        res.status(400).json({ error: `Unknown audio source: ${source}` });
        return;
      }
      if (!Buffer.isBuffer(req.body) || req.body.length === 0 || req.body.length % 4 !== 0) {
        res.status(400).json({ error: 'Body must be a non-empty float32 sample buffer' });
        return;
      }

      let timestamp: number | undefined;
      if (typeof req.query.timestamp === 'string') {
        timestamp = Number(req.query.timestamp);
        if (!Number.isFinite(timestamp)) {
          res.status(400).json({ error: 'timestamp must be a number' });
          return;
        }
      }

      const samples = float32FromBytes(req.body);
      if (!manager.pushChunk(source, samples, timestamp)) {
        res.status(409).json({ error: 'No session is accepting audio' });
        return;
      }
      res.status(202).json({ accepted: samples.length });
    }
  );

  /**
   * Live transcript as server-sent events
   */
  app.get('/api/transcripts/stream', (req: Request, res: Response) => {
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.flushHeaders();

    const onSegment = (segment: TranscriptSegment, sessionId: string) => {
      res.write(`event: segment\ndata: ${JSON.stringify({ sessionId, ...segment })}\n\n`);
    };
    const onSession = (session: TranscriptionSession) => {
      res.write(`event: session\ndata: ${JSON.stringify({ id: session.id, status: session.status })}\n\n`);
    };

    manager.on('segment', onSegment);
    manager.on('session', onSession);
    res.on('close', () => {
      manager.off('segment', onSegment);
      manager.off('session', onSession);
    });
  });

  app.post('/api/diarize', upload.single('audio'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.file) {
        res.status(400).json({ error: 'No audio file provided' });
        return;
      }
      const result = await diarization.diarizeWav(req.file.buffer);
      res.json({ speakerCount: result.speakerCount, segments: result.segments });
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/diarization/speaker', (req: Request, res: Response) => {
    const time = typeof req.query.time === 'string' ? Number(req.query.time) : NaN;
    if (!Number.isFinite(time)) {
      res.status(400).json({ error: 'time must be a number' });
      return;
    }
    res.json({ time, speakerLabel: diarization.speakerLabelAt(time) });
  });

  app.post('/api/diarization/rename', (req: Request, res: Response) => {
    const oldLabel: unknown = req.body?.oldLabel;
    const newLabel: unknown = req.body?.newLabel;
    if (typeof oldLabel !== 'string' || typeof newLabel !== 'string' || newLabel.trim() === '') {
      res.status(400).json({ error: 'oldLabel and newLabel are required' });
      return;
    }
    if (!diarization.getCachedResult()) {
      res.status(404).json({ error: 'No diarization result available' });
      return;
    }
    diarization.renameSpeaker(oldLabel, newLabel.trim());
    res.json({ segments: diarization.getCachedResult()?.segments ?? [] });
  });

  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    console.error(`${req.method} ${req.path} failed:`, error);
    res.status(errorStatus(error)).json({ error: errorMessage(error) });
  });

  return app;
}

/**
 * Start listening; resolves once the port is bound
 */
export function startServer(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      console.log(`Transcription server running on port ${port}`);
      console.log(`Health check: http://localhost:${port}/health`);
      resolve(server);
    });
    server.on('error', reject);
  });
}
