export * from './SecretSchema.js';
export * from './TaskUpdateSchema.js';
export * from './IamTokenSchema.js';
