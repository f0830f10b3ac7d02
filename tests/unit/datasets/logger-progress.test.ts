import pinoLib from 'pino';
import { describe, expect, it } from 'vitest';

import { createLoggerProgress } from '@/modules/datasets/shell/progress/logger-progress.js';

const captureLogger = () => {
  const lines: Record<string, unknown>[] = [];
  const logger = pinoLib(
    { level: 'debug' },
    {
      write(message: string) {
        const parsed: unknown = JSON.parse(message);
        if (typeof parsed === 'object' && parsed !== null) {
          lines.push({ ...parsed });
        }
      },
    }
  );
  return { logger, lines };
};

describe('logger progress', () => {
  it('logs start, every step and finish', () => {
    const { logger, lines } = captureLogger();
    const sink = createLoggerProgress(logger, 10)();

    sink.onStart('data/a.csv', 25);
    sink.onProgress(4);
    sink.onProgress(8);
    sink.onProgress(5);
    sink.onProgress(8);
    sink.onFinish();

    expect(lines.map((line) => line['msg'])).toEqual([
      'Transfer started',
      'Transfer progress',
      'Transfer progress',
      'Transfer finished',
    ]);
    expect(lines[1]).toMatchObject({ component: 'Transfer', file: 'data/a.csv', received: 12, totalSize: 25 });
    expect(lines[2]).toMatchObject({ received: 25 });
    expect(lines[3]).toMatchObject({ file: 'data/a.csv', received: 25 });
  });
});
