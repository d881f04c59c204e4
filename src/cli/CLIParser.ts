import { DEFAULT_CONFIG, ServiceConfig, isLogLevel, resolveConfig } from '../common/Config';
import { ConfigError } from '../common/Errors';

export interface CLIOptions {
  readonly config: ServiceConfig;
  readonly help: boolean;
}

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Builds the service configuration. Precedence, lowest first: defaults,
 * environment variables, command-line flags.
 */
export class CLIParser {
  private readonly args: string[];
  private readonly env: Environment;

  constructor(args: string[] = process.argv.slice(2), env: Environment = process.env) {
    this.args = args;
    this.env = env;
  }

  public parse(): CLIOptions {
    if (this.hasFlag('--help') || this.hasFlag('-h')) {
      return { config: DEFAULT_CONFIG, help: true };
    }

    const logLevel = this.getString('--log-level') ?? this.env['LOG_LEVEL'];
    if (logLevel !== undefined && logLevel !== '' && !isLogLevel(logLevel)) {
      throw new ConfigError(`Invalid log level: ${logLevel}`);
    }

    const config = resolveConfig({
      port: this.getNumber('--port') ?? this.envNumber('PORT') ?? DEFAULT_CONFIG.port,
      host: this.getString('--host') ?? this.envString('HOST') ?? DEFAULT_CONFIG.host,
      storeAddress: this.getString('--store-address') ?? this.envString('VALKEY_ADDRESS') ?? DEFAULT_CONFIG.storeAddress,
      // Empty is meaningful for the two secrets, so only an unset variable falls back.
      storePassword: this.getString('--store-password') ?? this.env['VALKEY_PASSWORD'] ?? DEFAULT_CONFIG.storePassword,
      authToken: this.getString('--auth-token') ?? this.env['AUTH_TOKEN'] ?? DEFAULT_CONFIG.authToken,
      logLevel: logLevel !== undefined && isLogLevel(logLevel) ? logLevel : DEFAULT_CONFIG.logLevel,
      bodyLimit: this.getString('--body-limit') ?? this.envString('BODY_LIMIT') ?? DEFAULT_CONFIG.bodyLimit,
    });

    return { config, help: false };
  }

  private envString(name: string): string | undefined {
    const value = this.env[name];
    return value === undefined || value === '' ? undefined : value;
  }

  private envNumber(name: string): number | undefined {
    const value = this.envString(name);
    return value === undefined ? undefined : parseInteger(name, value);
  }

  private getString(flag: string): string | undefined {
    const inline = this.args.find(arg => arg.startsWith(`${flag}=`));
    if (inline !== undefined) {
      return inline.slice(flag.length + 1);
    }

    const flagIndex = this.args.indexOf(flag);
    if (flagIndex !== -1 && flagIndex + 1 < this.args.length) {
      return this.args[flagIndex + 1];
    }

    return undefined;
  }

  private getNumber(flag: string): number | undefined {
    const str = this.getString(flag);
    if (!str) return undefined;
    return parseInteger(flag, str);
  }

  private hasFlag(flag: string): boolean {
    return this.args.includes(flag);
  }

  public static printHelp(): void {
    console.log(`
kv-http-gateway

Usage: node dist/index.js [options]

Options:
  --help, -h                Show this help message

Server Options:
  --port=PORT               HTTP port (env PORT, default: 8080)
  --host=HOST               Bind address (env HOST, default: 0.0.0.0)
  --auth-token=TOKEN        Shared secret for /keys routes (env AUTH_TOKEN, default: none)
  --body-limit=SIZE         Largest request body (env BODY_LIMIT, default: 1mb)
  --log-level=LEVEL         fatal, error, warn, info, debug, trace, silent (env LOG_LEVEL, default: info)

Store Options:
  --store-address=HOST:PORT Valkey/Redis address (env VALKEY_ADDRESS, default: localhost:6379)
  --store-password=PASS     Store password (env VALKEY_PASSWORD, default: none)

Examples:
  # Open access against a local store
  node dist/index.js

  # Token-protected, store on another host
  AUTH_TOKEN=change-me node dist/index.js --store-address=10.0.0.5:6379
`);
  }
}

function parseInteger(source: string, value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ConfigError(`Invalid number for ${source}: ${value}`);
  }
  return Number.parseInt(value, 10);
}
