import type { CompressionCodec, LogLevel, ZonekeeperConfig } from "../src/types/index.js";

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "silent"];
const CODECS: readonly CompressionCodec[] = ["gzip", "snappy", "lz4", "none"];

function oneOf<T extends string>(allowed: readonly T[], value: string | undefined, fallback: T): T {
  return allowed.find((candidate) => candidate === value) ?? fallback;
}

function int(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? "", 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Build the configuration from an environment.
 * Every value can be overridden via ZONEKEEPER_* variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ZonekeeperConfig {
  const minIntervalMs = int(env.ZONEKEEPER_POLL_MIN_INTERVAL_MS, 3_000);

  return {
    polling: {
      createTimeoutMs: int(env.ZONEKEEPER_CREATE_TIMEOUT_MS, 10 * 60_000),
      updateTimeoutMs: int(env.ZONEKEEPER_UPDATE_TIMEOUT_MS, 10 * 60_000),
      deleteTimeoutMs: int(env.ZONEKEEPER_DELETE_TIMEOUT_MS, 10 * 60_000),
      delayMs: int(env.ZONEKEEPER_POLL_DELAY_MS, 5_000),
      minIntervalMs,
      maxIntervalMs: int(env.ZONEKEEPER_POLL_MAX_INTERVAL_MS, Math.max(minIntervalMs, 10_000)),
    },

    skipStatusCheck: (env.ZONEKEEPER_SKIP_STATUS_CHECK ?? "false") === "true",

    events: {
      enabled: (env.ZONEKEEPER_EVENTS_ENABLED ?? "false") === "true",
      kafka: {
        brokers: (env.ZONEKEEPER_KAFKA_BROKERS ?? "localhost:9092").split(","),
        clientId: env.ZONEKEEPER_KAFKA_CLIENT_ID ?? "zonekeeper",
        topicPrefix: env.ZONEKEEPER_KAFKA_TOPIC_PREFIX ?? "zonekeeper",
        producer: {
          batchSize: int(env.ZONEKEEPER_KAFKA_BATCH_SIZE, 50),
          lingerMs: int(env.ZONEKEEPER_KAFKA_LINGER_MS, 500),
          maxBuffered: int(env.ZONEKEEPER_KAFKA_MAX_BUFFERED, 10_000),
          compression: oneOf(CODECS, env.ZONEKEEPER_KAFKA_COMPRESSION, "gzip"),
        },
      },
    },

    observability: {
      serviceName: env.ZONEKEEPER_SERVICE_NAME ?? "zonekeeper",
      traceEndpoint: env.ZONEKEEPER_OTLP_TRACES_ENDPOINT,
      metricsEndpoint: env.ZONEKEEPER_OTLP_METRICS_ENDPOINT,
      metricsInterval: int(env.ZONEKEEPER_METRICS_INTERVAL_MS, 15_000),
    },

    logLevel: oneOf(LOG_LEVELS, env.ZONEKEEPER_LOG_LEVEL, "info"),
  };
}

/**
 * Default Zonekeeper configuration, read from the process environment.
 */
export const defaultConfig: ZonekeeperConfig = loadConfig();
