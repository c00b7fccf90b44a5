// src/config/coordinator.config.ts
import { registerAs } from '@nestjs/config';

export default registerAs('coordinator', () => ({
  // Loop cadence
  pollIntervalMs: parseInt(process.env.QUEUE_POLL_INTERVAL_MS || '1000', 10),
  errorBackoffMs: parseInt(process.env.QUEUE_ERROR_BACKOFF_MS || '5000', 10),

  // Retry strategy: the Nth counted failure with N >= maxAttempts is terminal
  maxAttempts: parseInt(process.env.QUEUE_MAX_ATTEMPTS || '3', 10),

  // Storage reclamation cadence
  cleanupIntervalMs:
    parseInt(process.env.CLEANUP_INTERVAL_HOURS || '24', 10) * 60 * 60 * 1000,

  // Bounded join when the application shuts down
  stopTimeoutMs: parseInt(process.env.COORDINATOR_STOP_TIMEOUT_MS || '10000', 10),

  autoStart: process.env.COORDINATOR_AUTOSTART !== 'false',
}));
