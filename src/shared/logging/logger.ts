import pino from 'pino';
import { config } from '../config/env';

/** Correlation fields attached to research log lines. */
export type LogBindings = {
  /** One pipeline run. */
  runId?: string;
  /** One tool-call loop; defaults to the worker's agent id. */
  traceId?: string;
  /** `subagent_<index>` for research workers. */
  agentId?: string;
};

export const logger = pino({
  level: config.LOG_LEVEL,
  base: {
    env: config.NODE_ENV,
    service: 'deep-research',
    model: config.CHAT_MODEL,
  },
  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
  },
  // Credentials of the generation and search services, wherever a request or client config is logged.
  redact: {
    paths: [
      'apiKey',
      '*.apiKey',
      'headers.Authorization',
      'headers["x-api-key"]',
      '*.headers.Authorization',
      '*.headers["x-api-key"]',
      'LLM_API_KEY',
      'PARALLEL_API_KEY',
      '*.LLM_API_KEY',
      '*.PARALLEL_API_KEY',
    ],
    censor: '[redacted]',
  },
  transport:
    config.NODE_ENV === 'test'
      ? undefined
      : {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname,env,service',
            messageFormat: '{if agentId}[{agentId}] {end}{msg}',
          },
        },
});

export const childLogger = (bindings: LogBindings) => logger.child(bindings);
