export type FakeQos = 0 | 1 | 2;

export interface FakeInboundPacket {
  topic: string;
  payload: Uint8Array;
  qos: number;
}

export type FakeConnectionLossReason = "close" | "offline";

/**
 * In-process stand-in for the bridge's MQTT client. Tests drive broker events with
 * the `emit*` methods and push publishes through `deliver`.
 */
export class FakeMqttClient {
  readonly subscriptions: Array<{ topic: string; qos: FakeQos }> = [];
  connectCalls = 0;
  ended = false;
  subscribeError: Error | undefined;
  private readonly connectListeners: Array<() => void> = [];
  private readonly lostListeners: Array<(reason: FakeConnectionLossReason) => void> = [];
  private readonly errorListeners: Array<(error: Error) => void> = [];
  private messageHandler: ((packet: FakeInboundPacket) => Promise<void>) | undefined;

  connect(): void {
    this.connectCalls += 1;
  }

  onConnect(listener: () => void): void {
    this.connectListeners.push(listener);
  }

  onConnectionLost(listener: (reason: FakeConnectionLossReason) => void): void {
    this.lostListeners.push(listener);
  }

  onError(listener: (error: Error) => void): void {
    this.errorListeners.push(listener);
  }

  setMessageHandler(handler: (packet: FakeInboundPacket) => Promise<void>): void {
    this.messageHandler = handler;
  }

  async subscribe(topic: string, qos: FakeQos): Promise<void> {
    if (this.subscribeError) {
      throw this.subscribeError;
    }
    this.subscriptions.push({ topic, qos });
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  emitConnect(): void {
    for (const listener of this.connectListeners) {
      listener();
    }
  }

  emitConnectionLost(reason: FakeConnectionLossReason): void {
    for (const listener of this.lostListeners) {
      listener(reason);
    }
  }

  emitError(error: Error): void {
    for (const listener of this.errorListeners) {
      listener(error);
    }
  }

  deliver(packet: FakeInboundPacket): Promise<void> {
    if (!this.messageHandler) {
      throw new Error("No message handler installed");
    }
    return this.messageHandler(packet);
  }
}
