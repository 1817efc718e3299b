import type { Qos } from "@mqtt-relay/contracts";
import { connect, type IClientOptions, type MqttClient } from "mqtt";
import type { BridgeConfig } from "../../config/index.js";

export interface InboundPacket {
  topic: string;
  payload: Uint8Array;
  qos: number;
}

export type ConnectionLossReason = "close" | "offline";

/** The slice of an MQTT client the subscription needs. */
export interface MqttClientLike {
  /** Opens the connection; listeners must be registered first. */
  connect(): void;
  onConnect(listener: () => void): void;
  onConnectionLost(listener: (reason: ConnectionLossReason) => void): void;
  onError(listener: (error: Error) => void): void;
  /**
   * Installs the publish handler. The client reads no further packets until the
   * returned promise settles.
   */
  setMessageHandler(handler: (packet: InboundPacket) => Promise<void>): void;
  subscribe(topic: string, qos: Qos): Promise<void>;
  end(): Promise<void>;
}

const KEEPALIVE_SECONDS = 60;
const RECONNECT_PERIOD_MS = 5_000;

export function buildMqttClientOptions(config: BridgeConfig): IClientOptions {
  const options: IClientOptions = {
    clientId: config.mqttClientId,
    keepalive: KEEPALIVE_SECONDS,
    reconnectPeriod: RECONNECT_PERIOD_MS,
    clean: true,
    manualConnect: true
  };

  if (config.mqttUsername && config.mqttPassword) {
    options.username = config.mqttUsername;
    options.password = config.mqttPassword;
  }

  return options;
}

export function wrapMqttClient(client: MqttClient): MqttClientLike {
  return {
    connect() {
      client.connect();
    },
    onConnect(listener) {
      client.on("connect", () => listener());
    },
    onConnectionLost(listener) {
      client.on("close", () => listener("close"));
      client.on("offline", () => listener("offline"));
    },
    onError(listener) {
      client.on("error", (error) => listener(error));
    },
    setMessageHandler(handler) {
      client.handleMessage = (packet, callback) => {
        const payload =
          typeof packet.payload === "string" ? Buffer.from(packet.payload) : packet.payload;
        handler({ topic: packet.topic, payload, qos: packet.qos }).then(
          () => callback(),
          (error: unknown) => callback(error instanceof Error ? error : new Error(String(error)))
        );
      };
    },
    async subscribe(topic, qos) {
      await client.subscribeAsync(topic, { qos });
    },
    async end() {
      await client.endAsync(true);
    }
  };
}

/** Creates the client without connecting; `MqttClientLike.connect()` opens the socket. */
export function createMqttClient(config: BridgeConfig): MqttClientLike {
  return wrapMqttClient(
    connect(`mqtt://${config.mqttBroker}:${config.mqttPort}`, buildMqttClientOptions(config))
  );
}
