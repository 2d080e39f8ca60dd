import { Producer } from 'kafkajs';
import { RunResult } from '../interfaces/runResult';
import { logger } from '../logger';

export const RUN_COMPLETED_TOPIC = 'weather.etl.event.completed';

export async function publishRunResult(
  producer: Producer,
  result: RunResult,
  trigger: string
): Promise<void> {
  await producer.send({
    topic: RUN_COMPLETED_TOPIC,
    messages: [
      {
        key: result.runId,
        value: JSON.stringify({
          trigger,
          payload: result,
          timestamp: Date.now(),
        }),
      },
    ],
  });

  logger.info({ runId: result.runId, status: result.status }, 'Run result published');
}
