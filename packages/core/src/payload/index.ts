export { validatePayload, MAX_STRING_OUTPUT_LENGTH } from './validate-payload.js';
