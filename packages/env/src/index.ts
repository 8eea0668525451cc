export { getConfig, loadConfig, type AppConfig } from './config.js';
