export * from './stations.js';
export * from './session.js';
export * from './rtcm.js';
export * from './statistics.js';
export * from './alerts.js';
export * from './monitor.js';
