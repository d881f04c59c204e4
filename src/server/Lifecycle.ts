import { TIMEOUTS } from '../common/Config';
import { withDeadline } from '../common/Deadline';
import { getLogger } from '../common/Logger';
import { Application } from '../factory/ApplicationFactory';

const log = getLogger('lifecycle');

/**
 * Connect to the store, probe it, then start serving. A failed probe is
 * fatal: the store connection is dropped and the HTTP listener never opens.
 */
export async function startApplication(app: Application, probeTimeoutMs: number = TIMEOUTS.startupProbe): Promise<void> {
  try {
    await withDeadline('store startup probe', probeTimeoutMs, undefined, async () => {
      await app.store.connect();
      await app.store.ping();
    });
  } catch (err) {
    await app.store.close();
    throw err;
  }

  log.info({ address: app.config.storeAddress }, 'Connected to store');
  if (app.config.storePassword.length > 0) {
    log.info('Store password authentication enabled');
  }
  if (app.config.authToken.length > 0) {
    log.info('Token authentication enabled');
  } else {
    log.warn('No AUTH_TOKEN configured - API is unsecured');
  }

  await app.httpServer.start();
}

/**
 * Drain the HTTP server, then close the store. Resolves the process exit
 * code: 0 after a clean drain, 1 when the grace period had to cut
 * connections.
 */
export async function shutdownApplication(app: Application): Promise<number> {
  log.info('Shutting down gracefully');

  const { forced } = await app.httpServer.stop();
  await app.store.close();

  log.info({ forced }, 'Shutdown complete');
  return forced ? 1 : 0;
}
