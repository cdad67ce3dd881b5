import * as path from 'path';
import request from 'supertest';
import { createApp } from '../../app.js';
import { loadConfig } from '../../config.js';
import { SAMPLE_MISSION_CSV, SAMPLE_MISSION_PATH, at } from '../../__tests__/fixtures.js';
import { resolveMissionPath } from '../api.js';
import { MissionSession } from '../session.js';

const MISSION_DIR = path.dirname(SAMPLE_MISSION_PATH);

describe('mission API', () => {
  let session: MissionSession;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    session = new MissionSession();
    app = createApp(session, loadConfig({ MISSION_DIR }));
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  async function loadSample() {
    await request(app).post('/api/mission/load').send({ csv: SAMPLE_MISSION_CSV, name: 'sample.csv' }).expect(200);
  }

  it('reports health', async () => {
    const res = await request(app).get('/api/health').expect(200);
    expect(res.body).toMatchObject({ name: 'Mission Replay', status: 'operational', mission: null });
  });

  it('answers 500 with a generic body and logs the underlying error', async () => {
    const failure = new Error('read /var/lib/missions/m1.csv: EIO');
    jest.spyOn(session, 'requireMission').mockImplementation(() => {
      throw failure;
    });

    const res = await request(app).get('/api/mission').expect(500);
    expect(res.body).toEqual({ error: { code: 'internal_error', message: 'Internal error' } });
    expect(console.error).toHaveBeenCalledWith('🛰️ Mission API error:', failure);
  });

  it('answers 409 before a mission is loaded', async () => {
    const res = await request(app).get('/api/mission').expect(409);
    expect(res.body).toEqual({ error: { code: 'no_mission', message: 'No mission is loaded' } });
  });

  it('loads uploaded CSV text and describes the mission', async () => {
    const load = await request(app)
      .post('/api/mission/load')
      .send({ csv: SAMPLE_MISSION_CSV, name: 'sample.csv' })
      .expect(200);
    expect(load.body).toMatchObject({ ok: true, mission: { name: 'sample.csv', recordCount: 5 } });

    const mission = await request(app).get('/api/mission').expect(200);
    expect(mission.body.report.detectedLinks).toEqual(['GEO', 'LEO_SATCOM']);

    const subsystems = await request(app).get('/api/mission/subsystems').expect(200);
    expect(subsystems.body.map((d: { id: string }) => d.id)).toEqual(['COMM_GEO', 'COMM_LEO_SATCOM', 'EPS', 'PL']);
  });

  it('answers 400 with the schema error for a broken upload', async () => {
    const res = await request(app).post('/api/mission/load').send({ csv: 'Timestamp\n2024-05-01T12:00:00Z\n' }).expect(400);
    expect(res.body).toEqual({
      ok: false,
      error: {
        code: 'missing_required_field',
        message: 'Data is missing required column: POS_Latitude_deg',
        field: 'POS_Latitude_deg',
      },
    });
  });

  it('loads a file from the mission directory', async () => {
    const res = await request(app).post('/api/mission/load').send({ path: 'sample_mission.csv' }).expect(200);
    expect(res.body).toMatchObject({ ok: true, mission: { name: 'sample_mission.csv', recordCount: 5 } });
  });

  it('refuses paths outside the mission directory without reading them', async () => {
    for (const requested of ['/etc/passwd', '../package.json', '../../../../etc/hostname', '.']) {
      const res = await request(app).post('/api/mission/load').send({ path: requested }).expect(400);
      expect(res.body).toEqual({
        error: { code: 'invalid_parameter', message: 'Mission files must be inside the mission directory', field: 'path' },
      });
    }
    expect(session.current()).toBeNull();
  });

  it('answers 400 when neither a path nor CSV text is given', async () => {
    const res = await request(app).post('/api/mission/load').send({}).expect(400);
    expect(res.body.error.code).toBe('invalid_parameter');
  });

  it('serves thinned series and field statistics', async () => {
    await loadSample();
    const series = await request(app).get('/api/mission/series/EPS_Battery_V?every=2').expect(200);
    expect(series.body.points).toEqual([
      { timestamp: at(0), value: { kind: 'measured', value: 28.1 } },
      { timestamp: at(2), value: { kind: 'redacted' } },
      { timestamp: at(4), value: { kind: 'measured', value: 27.8 } },
    ]);

    const stats = await request(app).get('/api/mission/stats/PL_Camera_Temp_C').expect(200);
    expect(stats.body).toEqual({ field: 'PL_Camera_Temp_C', min: 20, max: 24, mean: 22, measured: 5, redacted: 0 });

    const unknown = await request(app).get('/api/mission/series/GNC_Yaw').expect(404);
    expect(unknown.body.error.code).toBe('unknown_field');

    await request(app).get('/api/mission/series/EPS_Battery_V?every=zero').expect(400);
  });

  it('serves outages per link and rejects bad links and thresholds', async () => {
    await loadSample();
    const res = await request(app).get('/api/links/LEO_SATCOM/outages?threshold=3').expect(200);
    expect(res.body.intervals).toEqual([
      { linkId: 'LEO_SATCOM', startTime: at(1), endTime: at(2), lastSampleTime: at(2), sampleCount: 2 },
    ]);
    expect(res.body.summary.count).toBe(1);

    const unknown = await request(app).get('/api/links/NOPE/outages').expect(404);
    expect(unknown.body.error.code).toBe('unknown_link');

    await request(app).get('/api/links/GEO/outages?threshold=-1').expect(400);
  });

  it('exports outages as CSV', async () => {
    await loadSample();
    const res = await request(app).get('/api/links/export?format=csv&threshold=3').expect(200);
    expect(res.headers['content-type']).toMatch(/^text\/csv/);
    expect(res.text).toBe(
      'link_id,start_time,end_time,ongoing,duration_s,samples\n' +
      'GEO,2024-05-01T12:00:03.000Z,2024-05-01T12:00:03.000Z,false,0,1\n' +
      'LEO_SATCOM,2024-05-01T12:00:01.000Z,2024-05-01T12:00:02.000Z,false,1,2\n',
    );
  });

  it('drives playback', async () => {
    await loadSample();
    await request(app).post('/api/playback/speed').send({ multiplier: 10 }).expect(200);
    const play = await request(app).post('/api/playback/play').expect(200);
    expect(play.body.state).toMatchObject({ status: 'playing', speedMultiplier: 10 });

    const seek = await request(app).post('/api/playback/seek').send({ time: at(2) }).expect(200);
    expect(seek.body.state).toMatchObject({ currentTime: at(2), cursorIndex: 2 });
    expect(seek.body.linkStatus).toEqual({ linkId: 'GEO', thresholdDb: 3, marginDb: 10, inOutage: false });

    const link = await request(app).post('/api/playback/link').send({ linkId: 'LEO_SATCOM', threshold: 2 }).expect(200);
    expect(link.body.linkStatus).toEqual({ linkId: 'LEO_SATCOM', thresholdDb: 2, marginDb: 1.5, inOutage: true });

    const paused = await request(app).post('/api/playback/pause').expect(200);
    expect(paused.body.state.status).toBe('paused');

    const stopped = await request(app).post('/api/playback/stop').expect(200);
    expect(stopped.body.state).toMatchObject({ status: 'stopped', currentTime: at(0), cursorIndex: 0 });
  });

  it('rejects a non-numeric seek time without moving', async () => {
    await loadSample();
    const res = await request(app).post('/api/playback/seek').send({ time: 'soon' }).expect(400);
    expect(res.body.error.code).toBe('invalid_parameter');

    const snapshot = await request(app).get('/api/playback').expect(200);
    expect(snapshot.body.state.currentTime).toBe(at(0));
  });
});

describe('resolveMissionPath', () => {
  it('resolves names inside the directory', () => {
    expect(resolveMissionPath('/srv/missions', 'flights/m1.csv')).toBe(path.resolve('/srv/missions/flights/m1.csv'));
    expect(resolveMissionPath('/srv/missions', 'a/../m2.csv')).toBe(path.resolve('/srv/missions/m2.csv'));
  });

  it('refuses the directory itself and anything that escapes it', () => {
    expect(() => resolveMissionPath('/srv/missions', '')).toThrow('Mission files must be inside the mission directory');
    expect(() => resolveMissionPath('/srv/missions', '../secrets.csv')).toThrow('Mission files must be inside the mission directory');
    expect(() => resolveMissionPath('/srv/missions', '/srv/missions-old/m.csv')).toThrow('Mission files must be inside the mission directory');
  });
});
