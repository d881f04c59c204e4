/**
 * Application Builder - assembles the store adapter and the HTTP server
 * from one immutable configuration.
 *
 * A prebuilt store can be supplied with withStore(), which is how tests run
 * the whole stack against an in-process store.
 */

import { ServiceConfig, TIMEOUTS } from '../common/Config';
import { IKeyValueStore } from '../interfaces/Store';
import { HTTPServer, HTTPServerOptions } from '../server/HTTPServer';
import { RedisStore, createRedisClient } from '../store/RedisStore';

export interface Application {
  readonly config: ServiceConfig;
  readonly store: IKeyValueStore;
  readonly httpServer: HTTPServer;
}

export class ApplicationBuilder {
  private readonly config: ServiceConfig;
  private store: IKeyValueStore | null = null;
  private serverOverrides: Partial<Pick<HTTPServerOptions, 'transportTimeouts' | 'handlerTimeouts'>> = {};

  constructor(config: ServiceConfig) {
    this.config = config;
  }

  withStore(store: IKeyValueStore): ApplicationBuilder {
    this.store = store;
    return this;
  }

  withTimeouts(overrides: Partial<Pick<HTTPServerOptions, 'transportTimeouts' | 'handlerTimeouts'>>): ApplicationBuilder {
    this.serverOverrides = overrides;
    return this;
  }

  buildStore(): IKeyValueStore {
    if (this.store) {
      return this.store;
    }

    const client = createRedisClient({
      address: this.config.storeAddress,
      password: this.config.storePassword,
      connectTimeoutMs: TIMEOUTS.startupProbe,
    });
    return new RedisStore(client);
  }

  buildHTTPServer(store: IKeyValueStore): HTTPServer {
    return new HTTPServer(store, {
      port: this.config.port,
      host: this.config.host,
      authToken: this.config.authToken,
      bodyLimit: this.config.bodyLimit,
      ...this.serverOverrides,
    });
  }

  build(): Application {
    const store = this.buildStore();
    return { config: this.config, store, httpServer: this.buildHTTPServer(store) };
  }
}
