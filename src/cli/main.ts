import { ConfigError } from '../errors';
import type { CommandIO } from './suggestCommand';

const consoleIO: CommandIO = {
  out: line => console.log(line),
  err: line => console.error(line)
};

/**
 * Entry point for the `tears` binary. The command module is loaded lazily
 * because loading it reads the environment, which can fail with `ConfigError`.
 */
export async function main(argv: string[], io: CommandIO = consoleIO): Promise<number> {
  try {
    const { runSuggest } = await import('./suggestCommand');
    return runSuggest(argv, io);
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    io.err(error.message);
    return 1;
  }
}
