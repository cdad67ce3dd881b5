import express from 'express';
import cors from 'cors';
import { createMissionRouter } from './mission/api.js';
import type { MissionSession } from './mission/session.js';
import type { AppConfig } from './config.js';

export function createApp(session: MissionSession, config: AppConfig): express.Express {
  const app = express();
  app.use(cors());
  // Uploaded CSV text travels in the JSON body.
  app.use(express.json({ limit: '50mb' }));

  app.get('/api/health', (_req, res) => {
    const mission = session.current();
    res.json({
      name: 'Mission Replay',
      version: '0.1.0',
      uptime: process.uptime(),
      status: 'operational',
      mission: mission ? mission.summary.name : null,
    });
  });

  app.use('/api', createMissionRouter(session, {
    defaultThresholdDb: config.defaultThresholdDb,
    missionDir: config.missionDir,
  }));
  return app;
}
