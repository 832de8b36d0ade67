/**
 * Job Module Exports
 */

export * from './types.js';
export { Job, JobRunner, type JobRunnerOptions } from './job.js';
export { nodeSpawner, type ProcessSpawner, type SpawnedProcess, type SpawnOptions } from './spawner.js';
