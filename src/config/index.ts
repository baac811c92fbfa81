export { ConfigManager } from './config.js';
export type { TablesmithConfig } from './config.js';
