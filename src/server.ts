import { Kafka, logLevel, Producer } from 'kafkajs';
import { loadConfig } from './config';
import { logger } from './logger';
import { initEtlConsumer, stopEtlConsumer } from './modules/etlConsumer';
import { publishRunResult } from './modules/runPublisher';
import { createWeatherEtl } from './modules/weatherEtl';

// -------------------------------------------------
// Config
// -------------------------------------------------
const config = loadConfig();
const brokerAddress = config.kafkaBrokerAddress;

if (!brokerAddress) {
    logger.fatal('KAFKA_BROKER_ADDRESS is required by the ETL service');
    process.exit(2);
}

const etl = createWeatherEtl(config);

// -------------------------------------------------
// Kafka setup
// -------------------------------------------------
const kafka = new Kafka({
    clientId: 'weather-etl-service',
    brokers: [brokerAddress],
    logLevel: logLevel.NOTHING,
    connectionTimeout: 10_000,
    authenticationTimeout: 10_000,
});

const producer: Producer = kafka.producer({
    idempotent: true,
    retry: {
        initialRetryTime: 300,
        retries: 20,
        factor: 0.2,
        multiplier: 2,
        maxRetryTime: 30_000,
    },
    maxInFlightRequests: 1,
});

const consumer = kafka.consumer({ groupId: 'weather-etl-group' });

let kafkaAvailable = false;
let kafkaDownLogged = false;
let kafkaStarting = false;
let isShuttingDown = false;

producer.on(producer.events.CONNECT, () => {
    kafkaAvailable = true;
    if (kafkaDownLogged) {
        logger.info('Kafka connection restored');
        kafkaDownLogged = false;
    } else {
        logger.info('Kafka producer connected');
    }
});

producer.on(producer.events.DISCONNECT, () => {
    kafkaAvailable = false;
    if (!kafkaDownLogged) {
        kafkaDownLogged = true;
        logger.warn('Kafka producer disconnected');
    }
});

// -------------------------------------------------
// Run handling (one run at a time)
// -------------------------------------------------
let activeRun: AbortController | undefined;

async function handleRunCommand(trigger: string) {
    if (activeRun) {
        logger.warn({ trigger }, 'Weather ETL run already in progress, command ignored');
        return;
    }

    const controller = new AbortController();
    activeRun = controller;

    try {
        const result = await etl.run(controller.signal);

        if (!kafkaAvailable) {
            logger.warn({ runId: result.runId }, 'Kafka unavailable, run result not published');
            return;
        }
        await publishRunResult(producer, result, trigger);
    } finally {
        activeRun = undefined;
    }
}

async function initKafkaSafely() {
    if (kafkaStarting) return;
    kafkaStarting = true;

    for (;;) {
        try {
            await producer.connect();
            await consumer.connect();

            await initEtlConsumer({ consumer, onRunCommand: handleRunCommand });

            logger.info('Kafka connected (weather ETL service)');
            return;
        } catch (err) {
            if (!kafkaDownLogged) {
                kafkaDownLogged = true;
                logger.warn({ err }, 'Kafka unavailable, retrying every 10s');
            }
            await new Promise((res) => setTimeout(res, 10_000));
        }
    }
}

async function start() {
    await etl.prepare();
    await initKafkaSafely();
}

start().catch((err) => {
    logger.fatal({ err }, 'Weather ETL service failed to start');
    process.exit(1);
});

// -------------------------------------------------
// Shutdown
// -------------------------------------------------
async function shutdown(signal: string) {
    if (isShuttingDown) return;
    isShuttingDown = true;

    logger.info(`Received ${signal}. Shutting down...`);

    activeRun?.abort(signal);

    try {
        await stopEtlConsumer(consumer);
        await producer.disconnect();
        await etl.close();

        setTimeout(() => process.exit(0), 2000);
    } catch (err) {
        logger.error({ err }, 'Shutdown error');
        process.exit(1);
    }
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
