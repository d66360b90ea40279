export * from './commands.js';
export * from './runCli.js';
