import type { Dispatcher } from "undici";
import { TokenCache } from "./auth/token-cache";
import { AzureBackend } from "./backends/azure";
import { createCommandRunner } from "./backends/azure/cli";
import { AzCliTokenIssuer } from "./backends/azure/token-issuer";
import type { CloudBackend, CommandRunner } from "./backends/types";
import { TtlCache } from "./cache/ttl-cache";
import type { VaultnavConfig } from "./config";
import { ResourceFetchers } from "./fetchers";
import { createLogger, LogChannel, type LoggerBundle } from "./logging";
import { Orchestrator } from "./orchestrator/orchestrator";

export interface AppOverrides {
  run?: CommandRunner;
  dispatcher?: Dispatcher;
  backend?: CloudBackend;
  now?: () => number;
}

export interface App {
  config: VaultnavConfig;
  logger: LoggerBundle;
  run: CommandRunner;
  cache: TtlCache;
  tokens: TokenCache;
  backend: CloudBackend;
  fetchers: ResourceFetchers;
  orchestrator: Orchestrator;
}

/** Wire one process's worth of services. Nothing here is a module singleton. */
export function createApp(
  config: VaultnavConfig,
  logger: LoggerBundle = createLogger({ level: config.logLevel, pretty: config.prettyLogs }),
  overrides: AppOverrides = {}
): App {
  const run = overrides.run ?? createCommandRunner(config.azPath);
  const now = overrides.now ?? Date.now;

  const cache = new TtlCache({ defaultTtlMs: config.cacheTtlMs, now });
  const tokens = new TokenCache(new AzCliTokenIssuer(run, now), {
    refreshMarginMs: config.tokenRefreshMarginMs,
    now,
    logger: logger.channel(LogChannel.auth),
  });
  const backend =
    overrides.backend ??
    new AzureBackend({
      run,
      tokens,
      armEndpoint: config.armEndpoint,
      vaultDnsSuffix: config.vaultDnsSuffix,
      dispatcher: overrides.dispatcher,
      logger: logger.channel(LogChannel.azure),
    });
  const fetchers = new ResourceFetchers(cache, backend, logger.channel(LogChannel.fetch));
  const orchestrator = new Orchestrator({
    fetchers,
    tokenCache: tokens,
    concurrency: config.concurrency,
    logger: logger.channel(LogChannel.orchestrator),
    loaderLogger: logger.channel(LogChannel.loader),
  });

  return { config, logger, run, cache, tokens, backend, fetchers, orchestrator };
}
