export * from './telemetry.js';
export * from './subsystems.js';
export * from './outages.js';
export * from './playback.js';
export * from './mission.js';
