import { type AppConfig, loadConfig } from './config/loader.js';
import { MappingEngine } from './mapping/engine.js';

export interface CliOptions {
  configPath: string;
  debug: boolean;
  test: boolean;
  help: boolean;
}

export function parseArgs(args: string[]): CliOptions {
  const positional = args.filter((arg) => !arg.startsWith('-'));
  return {
    configPath: positional[0] ?? './config.yml',
    debug: args.includes('--debug') || args.includes('-D'),
    test: args.includes('--test'),
    help: args.includes('--help') || args.includes('-h'),
  };
}

export function printUsage(): void {
  console.log(`
Usage: mqtt2influx [config-file] [options]

Arguments:
  config-file   Path to YAML configuration file (default: ./config.yml)

Options:
  -D, --debug   Log every message and write
  --test        Validate the configuration and exit
  -h, --help    Show this help

Examples:
  mqtt2influx                     # Uses ./config.yml
  mqtt2influx /etc/mqtt2influx.yml --debug`);
}

/** Loads the file and compiles every point; throws ConfigError on any problem. */
export function checkConfig(path: string): AppConfig {
  const config = loadConfig(path);
  new MappingEngine().addPoints(config.points);
  return config;
}
