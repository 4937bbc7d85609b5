export { loadCommonConfig } from './common-config.js';
export type { CommonJobConfig, Environment } from './common-config.js';
export {
  parseParameterDeclarations,
  readParameters,
  inputEnvironmentKey,
  outputPayloadKey,
  ParameterValues,
} from './parameters.js';
export type { ParameterSpecs } from './parameters.js';
