import type { ProgressSink, ProgressSinkFactory } from '../../core/ports.js';
import type { Logger } from 'pino';

/**
 * Reports transfers through the logger: start and finish at info, and a
 * debug line each time another `stepBytes` have arrived.
 */
export const createLoggerProgress = (
  logger: Logger,
  stepBytes: number = 8 * 1024 * 1024
): ProgressSinkFactory => {
  const log = logger.child({ component: 'Transfer' });

  return (): ProgressSink => {
    let label = '';
    let total: number | null = null;
    let received = 0;
    let reported = 0;
    const startedAt = Date.now();

    return {
      onStart(name, totalSize) {
        label = name;
        total = totalSize;
        log.info({ file: label, totalSize }, 'Transfer started');
      },
      onProgress(bytes) {
        received += bytes;
        if (received - reported >= stepBytes) {
          reported = received;
          log.debug({ file: label, received, totalSize: total }, 'Transfer progress');
        }
      },
      onFinish() {
        log.info({ file: label, received, durationMs: Date.now() - startedAt }, 'Transfer finished');
      },
    };
  };
};
