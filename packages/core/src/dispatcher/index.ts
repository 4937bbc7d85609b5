export { runJob, exitCodeFor } from './run-job.js';
export type { RunJobOptions } from './run-job.js';
