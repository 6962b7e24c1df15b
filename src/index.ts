import { buildApp } from './app.js';
import { config } from './config/env.js';
import { EmailValidationService } from './services/email-validation.service.js';
import { NodeDnsResolver } from './services/dns-resolver.service.js';
import { ListLoaderService } from './services/list-loader.service.js';
import { createGracefulShutdown } from './services/graceful-shutdown.service.js';
import { logger } from './services/logger.service.js';

const start = async () => {
  const loader = new ListLoaderService({
    blocklistPath: config.blocklistPath,
    allowlistPath: config.allowlistPath,
  });

  const validationService = await EmailValidationService.create({
    loader,
    includePackagedBlocklist: config.includePackagedBlocklist,
    cacheEnabled: config.mxCacheEnabled,
    resolver: new NodeDnsResolver({
      timeoutMs: config.dnsTimeoutMs,
      tries: config.dnsTries,
      servers: config.dnsServers,
    }),
  });

  const fastify = await buildApp({
    validationService,
    maxBatchSize: config.maxBatchSize,
    checkMxByDefault: config.checkMxByDefault,
    fastifyLogger: { level: config.logLevel },
  });

  const shutdown = createGracefulShutdown({
    timeout: config.shutdownTimeoutMs,
    forceTimeout: config.forceShutdownTimeoutMs,
    onShutdownStart: () => fastify.close(),
  });
  shutdown.registerHandlers();

  const address = await fastify.listen({ port: config.port, host: config.host });
  logger.serverStarted({
    address,
    blocklistCount: validationService.getBlocklistCount(),
    allowlistCount: validationService.getAllowlistCount(),
  });
};

start().catch((error: unknown) => {
  logger.error('Server failed to start', { error });
  process.exit(1);
});
