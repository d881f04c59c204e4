#!/usr/bin/env node
import { CLIParser } from './cli/CLIParser';
import { getLogger, initLogger } from './common/Logger';
import { ApplicationBuilder } from './factory/ApplicationFactory';
import { shutdownApplication, startApplication } from './server/Lifecycle';

const log = getLogger('main');

async function main(): Promise<void> {
  // Default level until the configured one is known, so config errors are reported.
  initLogger();

  const parser = new CLIParser();
  const options = parser.parse();

  if (options.help) {
    CLIParser.printHelp();
    return;
  }

  initLogger({ level: options.config.logLevel });

  const app = new ApplicationBuilder(options.config).build();

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) {
      log.warn({ signal }, 'Shutdown already in progress');
      return;
    }
    shuttingDown = true;
    log.info({ signal }, 'Received shutdown signal');

    shutdownApplication(app).then(
      (exitCode) => process.exit(exitCode),
      (err: unknown) => {
        log.error({ err }, 'Shutdown failed');
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await startApplication(app);
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'Fatal error');
  process.exit(1);
});
