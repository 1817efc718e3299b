export interface InboundMessageFixture {
  topic: string;
  payload: Uint8Array;
  qos: 0 | 1 | 2;
  receivedAt: Date;
}

export interface PublishPacketFixture {
  cmd: "publish";
  topic: string;
  payload: Buffer;
  qos: 0 | 1 | 2;
  dup: boolean;
  retain: boolean;
}

export function encodeJson(value: unknown): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(value));
}

export function createInboundMessageFixture(
  overrides: Partial<InboundMessageFixture> = {}
): InboundMessageFixture {
  return {
    topic: "data/sensor",
    payload: encodeJson({ t: 25.4 }),
    qos: 1,
    receivedAt: new Date("2026-02-25T00:00:00.000Z"),
    ...overrides
  };
}

export function createPublishPacketFixture(
  overrides: Partial<PublishPacketFixture> = {}
): PublishPacketFixture {
  const message = createInboundMessageFixture();
  return {
    cmd: "publish",
    topic: message.topic,
    payload: Buffer.from(message.payload),
    qos: message.qos,
    dup: false,
    retain: false,
    ...overrides
  };
}
