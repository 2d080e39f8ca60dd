import { Producer } from 'kafkajs';
import { RUN_COMPLETED_TOPIC, publishRunResult } from '@/modules/runPublisher';
import { RunResult } from '@/interfaces/runResult';
import { logger } from '@/logger';

jest.mock('@/logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const result: RunResult = {
  runId: 'run-1',
  status: 'success',
  ok: true,
  fatal: false,
  startedAt: '2026-01-01T06:00:00.000Z',
  finishedAt: '2026-01-01T06:00:02.000Z',
  cities: {
    London: {
      status: 'success',
      observedAt: '2026-01-01T00:00:00.000Z',
      temperature: 6.95,
      attempts: 1,
    },
  },
  summary: { total: 1, succeeded: 1, failed: 0, skipped: 0, inserted: 1, duplicates: 0 },
};

describe('runPublisher (unit)', () => {
  /**
   * Purpose:
   * Verifies event publishing:
   * - One message keyed by run id
   * - Payload carries the full run result and trigger
   */
  it('publishes the run result to the completed topic', async () => {
    jest.spyOn(Date, 'now').mockReturnValue(1_767_247_202_000);
    const send = jest.fn().mockResolvedValue([]);
    const producer = { send } as unknown as Producer;

    await publishRunResult(producer, result, 'daily');

    expect(send).toHaveBeenCalledWith({
      topic: RUN_COMPLETED_TOPIC,
      messages: [
        {
          key: 'run-1',
          value: JSON.stringify({ trigger: 'daily', payload: result, timestamp: 1_767_247_202_000 }),
        },
      ],
    });
    expect(logger.info).toHaveBeenCalledWith(
      { runId: 'run-1', status: 'success' },
      'Run result published'
    );
  });

  it('propagates producer failures to the caller', async () => {
    const producer = {
      send: jest.fn().mockRejectedValue(new Error('leader not available')),
    } as unknown as Producer;

    await expect(publishRunResult(producer, result, 'daily')).rejects.toThrow(
      'leader not available'
    );
    expect(logger.info).not.toHaveBeenCalled();
  });
});
