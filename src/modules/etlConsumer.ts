import { Consumer } from 'kafkajs';
import { logger } from '../logger';

export const RUN_COMMAND_TOPIC = 'weather.etl.command.run';

export type EtlConsumerDeps = {
  consumer: Consumer;
  onRunCommand: (trigger: string) => Promise<void>;
  fromBeginning?: boolean;
};

export async function initEtlConsumer({
  consumer,
  onRunCommand,
  fromBeginning = false,
}: EtlConsumerDeps) {
  await consumer.subscribe({
    topic: RUN_COMMAND_TOPIC,
    fromBeginning,
  });

  await consumer.run({
    eachMessage: async ({ topic, message }) => {
      const value = message.value?.toString();

      try {
        logger.debug({ topic, value }, 'Received run command');
        await onRunCommand(triggerOf(value));
      } catch (err) {
        logger.error(
          { err, topic, value },
          'Unhandled error while processing run command'
        );
      }
    },
  });

  logger.info('Kafka consumer started (weather ETL)');
}

// Commands look like {"trigger":"daily"}; anything else counts as "scheduler".
export function triggerOf(value: string | undefined): string {
  if (!value) return 'scheduler';

  try {
    const parsed: unknown = JSON.parse(value);
    if (
      typeof parsed === 'object' &&
      parsed !== null &&
      'trigger' in parsed &&
      typeof parsed.trigger === 'string' &&
      parsed.trigger.length > 0
    ) {
      return parsed.trigger;
    }
  } catch {
    logger.warn({ value }, 'Run command is not JSON, using default trigger');
  }

  return 'scheduler';
}

export async function stopEtlConsumer(consumer: Consumer) {
  try {
    await consumer.disconnect();
    logger.info('Kafka consumer disconnected');
  } catch (err) {
    logger.warn({ err }, 'Error disconnecting Kafka consumer');
  }
}
