export { ConfigSchema } from './config.js';
