import type { Qos } from "@mqtt-relay/contracts";
import type { LoggerLike } from "../../logger.js";
import type { InboundAdapter } from "../delivery/inbound-adapter.js";
import type { InboundPacket, MqttClientLike } from "./mqtt-client.js";

export interface MqttSubscriptionOptions {
  client: MqttClientLike;
  adapter: InboundAdapter;
  logger: LoggerLike;
  topic: string;
  qos: Qos;
  now?: () => Date;
}

/**
 * Feeds broker messages into the inbound adapter. The adapter stays paused while the
 * client is disconnected; the client reconnects by itself and resubscribes on connect.
 */
export class MqttSubscription {
  private connected = false;
  private started = false;
  private readonly now: () => Date;

  constructor(private readonly options: MqttSubscriptionOptions) {
    this.now = options.now ?? (() => new Date());
  }

  get isConnected(): boolean {
    return this.connected;
  }

  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;

    const { client, adapter, logger, topic } = this.options;
    adapter.pause();

    client.onConnect(() => {
      this.connected = true;
      adapter.resume();
      logger.info({ topic }, "Connected to MQTT broker");
      void this.subscribe();
    });

    client.onConnectionLost((reason) => {
      if (!this.connected) {
        return;
      }
      this.connected = false;
      adapter.pause();
      logger.warn({ reason }, "MQTT connection lost; pausing intake until reconnect");
    });

    client.onError((error) => {
      logger.error({ err: error }, "MQTT client error");
    });

    client.setMessageHandler((packet) => this.handle(packet));
    client.connect();
  }

  /** Ends the client before the adapter so nothing is acknowledged and then dropped. */
  async stop(): Promise<void> {
    this.connected = false;
    await this.options.client.end();
    this.options.adapter.stop();
    this.options.logger.info("MQTT subscription closed");
  }

  private async subscribe(): Promise<void> {
    const { client, logger, topic, qos } = this.options;
    try {
      await client.subscribe(topic, qos);
      logger.info({ topic, qos }, "Subscribed to topic");
    } catch (error) {
      logger.error({ err: error, topic }, "Failed to subscribe to topic");
    }
  }

  private async handle(packet: InboundPacket): Promise<void> {
    try {
      const result = await this.options.adapter.onMessage(
        packet.topic,
        packet.payload,
        packet.qos,
        this.now()
      );
      if (result.status === "rejected") {
        this.options.logger.warn(
          { topic: packet.topic, reason: result.reason },
          "Inbound message not admitted"
        );
      }
    } catch (error) {
      this.options.logger.error({ err: error, topic: packet.topic }, "Failed to admit message");
    }
  }
}
