export * from './providers';
export { ConsoleLogger, createLogger, silentLogger, mask } from './core/logger';
export type { Logger } from './core/logger';
export { runCommand } from './core/command';
export type { CommandRunner, CommandResult, CommandOptions } from './core/command';
