import { createLogger, type Logger } from '@dirconf/logger';
import type { DirconfConfig } from './config';
import { consoleOutput, type Output } from './output';

/**
 * What a command runs against
 */
export interface CommandContext {
  cwd: string;
  output: Output;
  logger: Logger;
}

export function createCommandContext(config: DirconfConfig, overrides: Partial<CommandContext> = {}): CommandContext {
  return {
    cwd: overrides.cwd ?? process.cwd(),
    output: overrides.output ?? consoleOutput,
    logger:
      overrides.logger ??
      createLogger({ environment: config.environment ?? 'production', minLevel: config.logLevel }),
  };
}
