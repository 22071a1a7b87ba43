/**
 * backend/src/index.ts
 *
 * WHY:
 * - Process entrypoint: config → app → listen, plus signal handling.
 *
 * RULES:
 * - On shutdown, registrations still in flight are logged (count + dedup fingerprints)
 *   before connections close; they may leave partial state behind.
 */

import { buildConfig } from './app/config';
import { buildApp } from './app/build-app';
import { logger } from './shared/logger/logger';

async function main(): Promise<void> {
  const config = buildConfig();
  const { app, deps, close } = await buildApp(config);

  await app.listen({ port: config.port, host: '0.0.0.0' });

  logger.info('server.listening', {
    port: config.port,
    env: config.nodeEnv,
    service: config.serviceName,
    guardDriver: config.registration.guardDriver,
    tenantServiceUrl: config.downstream.tenantServiceUrl,
    usersServiceUrl: config.downstream.usersServiceUrl,
  });

  const shutdown = async (signal: string) => {
    const inFlight = await deps.registration.registrationService.inFlight();
    logger.info('server.shutdown', {
      signal,
      inFlightRegistrations: inFlight.count,
      inFlightKeys: inFlight.keys,
    });
    await close();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      logger.error('server.shutdown_failed', { signal, err });
      process.exit(1);
    });
  };

  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));
}

void main().catch((err: unknown) => {
  logger.error('server.fatal_startup_error', { err });
  process.exit(1);
});
