// ============================================================================
// Mission API Routes
// ============================================================================

import * as path from 'path';
import { Router, type Response } from 'express';
import type { LoadResult } from '@missionreplay/shared';
import { InvalidParameterError, MissionError, NoMissionError, UnknownFieldError, toErrorBody } from '../errors.js';
import type { MissionSession } from './session.js';

function statusFor(err: unknown): number {
  if (err instanceof UnknownFieldError) return 404;
  if (err instanceof InvalidParameterError) return 400;
  if (err instanceof NoMissionError) return 409;
  if (err instanceof MissionError) return 400;
  return 500;
}

export function sendError(res: Response, err: unknown): void {
  const status = statusFor(err);
  if (status === 500) console.error('🛰️ Mission API error:', err);
  res.status(status).json({ error: toErrorBody(err) });
}

function bodyField(body: unknown, key: string): unknown {
  return typeof body === 'object' && body !== null ? Reflect.get(body, key) : undefined;
}

function bodyNumber(body: unknown, key: string): number {
  const v = bodyField(body, key);
  if (typeof v === 'number') return v;
  if (typeof v === 'string' && v.trim() !== '') return Number(v);
  throw new InvalidParameterError(key, `Body field "${key}" must be a number`);
}

function queryNumber(raw: unknown, fallback: number): number {
  if (raw === undefined || raw === '') return fallback;
  return typeof raw === 'string' ? Number(raw) : NaN;
}

/** Resolves a requested mission file inside `missionDir`; anything outside it is refused. */
export function resolveMissionPath(missionDir: string, requested: string): string {
  const root = path.resolve(missionDir);
  const full = path.resolve(root, requested);
  const rel = path.relative(root, full);
  if (rel === '' || rel === '..' || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
    throw new InvalidParameterError('path', 'Mission files must be inside the mission directory');
  }
  return full;
}

export interface MissionRouterOptions {
  defaultThresholdDb: number;
  missionDir: string;
}

export function createMissionRouter(session: MissionSession, options: MissionRouterOptions): Router {
  const router = Router();
  const { defaultThresholdDb, missionDir } = options;

  // Load a mission from a file in the mission directory or from uploaded CSV text
  router.post('/mission/load', async (req, res) => {
    try {
      const filePath = bodyField(req.body, 'path');
      const csv = bodyField(req.body, 'csv');
      let result: LoadResult;
      if (typeof filePath === 'string' && filePath !== '') {
        result = await session.loadFile(resolveMissionPath(missionDir, filePath));
      } else if (typeof csv === 'string') {
        const name = bodyField(req.body, 'name');
        result = session.loadText(csv, typeof name === 'string' && name !== '' ? name : 'upload.csv');
      } else {
        throw new InvalidParameterError('path', 'Provide either "path" or "csv"');
      }
      res.status(result.ok ? 200 : 400).json(result);
    } catch (e) {
      sendError(res, e);
    }
  });

  router.get('/mission', (_req, res) => {
    try {
      const { summary, report } = session.requireMission();
      res.json({ mission: summary, report });
    } catch (e) {
      sendError(res, e);
    }
  });

  router.get('/mission/subsystems', (_req, res) => {
    try {
      res.json(session.requireMission().registry.descriptors);
    } catch (e) {
      sendError(res, e);
    }
  });

  // Chart series, optionally thinned to every n-th sample
  router.get('/mission/series/:field', (req, res) => {
    try {
      const { store } = session.requireMission();
      const every = queryNumber(req.query.every, 1);
      res.json({ field: req.params.field, points: store.downsample(req.params.field, every) });
    } catch (e) {
      sendError(res, e);
    }
  });

  router.get('/mission/stats/:field', (req, res) => {
    try {
      res.json(session.requireMission().store.numericSummary(req.params.field));
    } catch (e) {
      sendError(res, e);
    }
  });

  // --- Links & outages ---

  router.get('/links', (_req, res) => {
    try {
      res.json(session.requireMission().registry.links());
    } catch (e) {
      sendError(res, e);
    }
  });

  router.get('/links/summary', (req, res) => {
    try {
      const threshold = queryNumber(req.query.threshold, defaultThresholdDb);
      res.json(session.requireMission().analyzer.summarizeAll(threshold));
    } catch (e) {
      sendError(res, e);
    }
  });

  router.get('/links/export', (req, res) => {
    try {
      const { analyzer } = session.requireMission();
      const threshold = queryNumber(req.query.threshold, defaultThresholdDb);
      if (req.query.format === 'csv') {
        res.type('text/csv').send(analyzer.exportCsv(threshold));
      } else {
        res.type('application/json').send(analyzer.exportJson(threshold));
      }
    } catch (e) {
      sendError(res, e);
    }
  });

  router.get('/links/:linkId/outages', (req, res) => {
    try {
      const threshold = queryNumber(req.query.threshold, defaultThresholdDb);
      const { analyzer } = session.requireMission();
      res.json({
        intervals: analyzer.computeOutages(req.params.linkId, threshold),
        summary: analyzer.summarize(req.params.linkId, threshold),
      });
    } catch (e) {
      sendError(res, e);
    }
  });

  router.get('/links/:linkId/track', (req, res) => {
    try {
      const threshold = queryNumber(req.query.threshold, defaultThresholdDb);
      res.json(session.requireMission().analyzer.trackSegments(req.params.linkId, threshold));
    } catch (e) {
      sendError(res, e);
    }
  });

  // --- Playback ---

  router.get('/playback', (_req, res) => {
    try {
      res.json(session.requireMission().engine.snapshot());
    } catch (e) {
      sendError(res, e);
    }
  });

  router.post('/playback/play', (_req, res) => {
    try {
      res.json(session.requireMission().engine.play());
    } catch (e) {
      sendError(res, e);
    }
  });

  router.post('/playback/pause', (_req, res) => {
    try {
      res.json(session.requireMission().engine.pause());
    } catch (e) {
      sendError(res, e);
    }
  });

  router.post('/playback/stop', (_req, res) => {
    try {
      res.json(session.requireMission().engine.stop());
    } catch (e) {
      sendError(res, e);
    }
  });

  router.post('/playback/seek', (req, res) => {
    try {
      const { engine } = session.requireMission();
      res.json(engine.seek(bodyNumber(req.body, 'time')));
    } catch (e) {
      sendError(res, e);
    }
  });

  router.post('/playback/speed', (req, res) => {
    try {
      const { engine } = session.requireMission();
      res.json(engine.setSpeed(bodyNumber(req.body, 'multiplier')));
    } catch (e) {
      sendError(res, e);
    }
  });

  router.post('/playback/link', (req, res) => {
    try {
      const { engine } = session.requireMission();
      const linkId = bodyField(req.body, 'linkId');
      if (linkId !== null && typeof linkId !== 'string') {
        throw new InvalidParameterError('linkId', 'Body field "linkId" must be a string or null');
      }
      const threshold = bodyField(req.body, 'threshold') === undefined ? defaultThresholdDb : bodyNumber(req.body, 'threshold');
      res.json(engine.selectLink(linkId, threshold));
    } catch (e) {
      sendError(res, e);
    }
  });

  return router;
}
