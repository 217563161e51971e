/**
 * Service wiring. Everything the routes use is built here from one
 * database handle, the configuration and a transport.
 */

import type { RelayConfig } from "./config.js";
import type { Database } from "./db/index.js";
import type { Clock } from "./lib/time.js";
import { createRepositories, type Repositories } from "./repositories/index.js";
import { AnalyticsAggregator } from "./services/analytics.js";
import { AuditLog } from "./services/audit.js";
import { DeepLinkResolver } from "./services/deepLink.js";
import { IdentityRegistry } from "./services/identity.js";
import { RateLimiter } from "./services/rateLimiter.js";
import { MessageRelay } from "./services/relay.js";
import { ReplyTokenStore } from "./services/replyTokens.js";
import type { Classifier } from "./services/sentiment.js";
import type { Transport } from "./services/transport.js";

export interface RelayContext {
  config: RelayConfig;
  repositories: Repositories;
  identity: IdentityRegistry;
  replyTokens: ReplyTokenStore;
  deepLinks: DeepLinkResolver;
  limiter: RateLimiter;
  audit: AuditLog;
  relay: MessageRelay;
  analytics: AnalyticsAggregator;
}

export interface ContextOptions {
  clock?: Clock;
  classifier?: Classifier;
}

export function createContext(
  db: Database,
  config: RelayConfig,
  transport: Transport,
  options: ContextOptions = {}
): RelayContext {
  const { clock } = options;
  const repositories = createRepositories(db);
  const identity = new IdentityRegistry(repositories.users, undefined, clock);
  const replyTokens = new ReplyTokenStore(repositories.replyTokens, clock);
  const audit = new AuditLog(
    repositories.alerts,
    repositories.modLog,
    transport,
    config.adminChannel,
    clock
  );
  const limiter = new RateLimiter(repositories.rateLimits, config.rateLimit, audit, clock);

  const relay = new MessageRelay({
    messages: repositories.messages,
    identity,
    replyTokens,
    limiter,
    audit,
    transport,
    settings: {
      moderationEnabled: config.moderationEnabled,
      deliverOnApprove: config.deliverOnApprove,
      operatorExternalId: config.operatorExternalId,
      adminChannel: config.adminChannel,
      publishChannel: config.publishChannel,
    },
    classifier: options.classifier,
    clock,
  });

  return {
    config,
    repositories,
    identity,
    replyTokens,
    deepLinks: new DeepLinkResolver(identity, replyTokens, config.operatorExternalId),
    limiter,
    audit,
    relay,
    analytics: new AnalyticsAggregator(db, clock),
  };
}
