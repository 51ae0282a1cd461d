/**
 * Configuration & Environment Management
 *
 * Settings for entry points: bind address, environment and logging.
 */

export { Config, ConfigError, type ConfigOptions, loadConfig } from './config.ts';
