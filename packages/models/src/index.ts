export * from './types/index.js';
export { TaskAction, TaskStatus, TaskErrorCodes, SagaState } from './enums/task.js';
export type { TaskErrorCode } from './enums/task.js';
