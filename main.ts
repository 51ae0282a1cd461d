/**
 * Girder Application Entry Point
 *
 * Boot sequence: configuration, logging, handler, listen.
 */

import { Logger, Server, loadConfig, setLogger } from './framework/mod.ts';
import { GreetingHandler } from './src/handlers/greeting.ts';

async function main(): Promise<void> {
  // 1. Load configuration
  const config = await loadConfig();

  // 2. Install the process-wide logger before anything logs
  const logger = new Logger({
    level: config.get('logLevel'),
    format: config.get('logFormat'),
    context: { env: config.get('env') },
  });
  setLogger(logger);

  // 3. Build the handler and serve it; this does not return while running
  const server = Server.around(new GreetingHandler());
  await server.listen(config.get('host'), config.get('port'), { logger });
}

main().catch((error: unknown) => {
  const err = error instanceof Error ? error : new Error(String(error));
  new Logger({ format: 'pretty' }).error('Failed to start Girder', err);
  process.exit(1);
});
