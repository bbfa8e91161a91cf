/**
 * Configuration & Environment Management
 *
 * Keeps settings out of code and lets each environment override them.
 */

export { Config, loadConfig, type AppSettings, type ConfigOptions } from './config.ts';
