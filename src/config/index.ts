export { loadConfig, configPath, formatIssues, CONFIG_DIR, CONFIG_FILE } from './loader.js';
