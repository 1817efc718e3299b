import { createServer, type Server } from "node:http";
import express, { type ErrorRequestHandler, type Express } from "express";
import type { BridgeConfig } from "./config/index.js";
import {
  CompositeOutcomeSink,
  DeliveryPipeline,
  FileOutcomeSink,
  HttpSink,
  LoggingOutcomeSink,
  type OutcomeSink
} from "./features/delivery/index.js";
import { registerStatusRoutes } from "./features/status/routes.js";
import { createMqttClient, type MqttClientLike } from "./features/subscription/mqtt-client.js";
import { MqttSubscription } from "./features/subscription/mqtt-subscription.js";
import { createLogger, type LoggerLike } from "./logger.js";

export interface BuildBridgeAppOptions {
  config: BridgeConfig;
  logger?: LoggerLike;
  fetch?: typeof globalThis.fetch;
  outcomeSink?: OutcomeSink;
  mqttClient?: MqttClientLike;
  now?: () => Date;
  random?: () => number;
}

export interface BridgeApp {
  readonly app: Express;
  readonly server: Server;
  readonly log: LoggerLike;
  readonly pipeline: DeliveryPipeline;
  readonly subscription: MqttSubscription;
  start(): Promise<void>;
  close(): Promise<void>;
}

function createOutcomeSink(config: BridgeConfig, log: LoggerLike): OutcomeSink {
  const logging = new LoggingOutcomeSink(log);
  if (!config.deadLetterFile) {
    return logging;
  }
  return new CompositeOutcomeSink([logging, new FileOutcomeSink(config.deadLetterFile)]);
}

export function buildBridgeApp(options: BuildBridgeAppOptions): BridgeApp {
  const { config } = options;
  const log = options.logger ?? createLogger(config.logLevel);
  const now = options.now ?? (() => new Date());

  const pipeline = new DeliveryPipeline(
    {
      queueCapacity: config.queueCapacity,
      overflowPolicy: config.overflowPolicy,
      deliveryWorkers: config.deliveryWorkers,
      retryWorkers: config.retryWorkers,
      shutdownPolicy: config.shutdownPolicy,
      retry: {
        maxAttempts: config.maxAttempts,
        baseDelayMs: config.backoffBaseMs,
        multiplier: config.backoffMultiplier,
        maxDelayMs: config.backoffMaxMs,
        jitter: config.backoffJitter,
        retryableStatuses: config.retryableStatuses
      }
    },
    {
      sink: new HttpSink({
        url: config.sinkUrl,
        timeoutMs: config.requestTimeoutMs,
        headers: config.sinkHeaders,
        ...(options.fetch ? { fetch: options.fetch } : {})
      }),
      outcomeSink: options.outcomeSink ?? createOutcomeSink(config, log),
      logger: log,
      now,
      ...(options.random ? { random: options.random } : {})
    }
  );

  const subscription = new MqttSubscription({
    client: options.mqttClient ?? createMqttClient(config),
    adapter: pipeline.adapter,
    logger: log,
    topic: config.mqttTopic,
    qos: config.mqttQos,
    now
  });

  const app = express();
  app.disable("x-powered-by");

  registerStatusRoutes(app, {
    now,
    isSubscribed: () => subscription.isConnected,
    isStopping: () => pipeline.isStopping,
    snapshot: () => pipeline.snapshot()
  });

  app.use((_req, res) => {
    res.status(404).json({
      code: "NOT_FOUND",
      message: "Route not found"
    });
  });

  const defaultErrorHandler: ErrorRequestHandler = (error, _req, res, _next) => {
    log.error({ err: error }, "Status request failed");
    res.status(500).json({
      code: "INTERNAL_SERVER_ERROR",
      message: "Unexpected server error"
    });
  };
  app.use(defaultErrorHandler);

  const server = createServer(app);
  let isListening = false;
  let started = false;

  async function listen(host: string, port: number): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => {
        server.off("error", onError);
        reject(error);
      };

      server.on("error", onError);
      server.listen(port, host, () => {
        server.off("error", onError);
        resolve();
      });
    });
    isListening = true;
  }

  return {
    app,
    server,
    log,
    pipeline,
    subscription,
    async start(): Promise<void> {
      if (started) {
        return;
      }
      started = true;

      if (config.statusPort !== undefined) {
        await listen(config.statusHost, config.statusPort);
        log.info(
          { host: config.statusHost, port: config.statusPort },
          "Status server listening"
        );
      }

      pipeline.start();
      subscription.start();
      log.info(
        {
          broker: `${config.mqttBroker}:${config.mqttPort}`,
          topic: config.mqttTopic,
          sinkUrl: config.sinkUrl
        },
        "Connecting to MQTT broker"
      );
    },
    async close(): Promise<void> {
      await subscription.stop();
      await pipeline.shutdown();

      if (isListening) {
        await new Promise<void>((resolve, reject) => {
          server.close((error) => {
            if (error) {
              reject(error);
              return;
            }
            resolve();
          });
        });
        isListening = false;
      }
    }
  };
}
