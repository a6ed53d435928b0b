export { TunnelProcess, spawnTunnelProcess, MAX_CAPTURED_LENGTH } from './tunnel-process.js';
export { RunLock, LOCK_FILE_NAME, readHolder, isAlive } from './run-lock.js';
export type { IRunLock } from './run-lock.js';
