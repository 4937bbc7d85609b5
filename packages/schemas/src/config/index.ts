export * from './CommonJobConfigSchema.js';
export * from './ParameterSpecSchema.js';
