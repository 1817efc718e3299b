import { describe, expect, it, vi } from "vitest";
import { FakeMqttClient } from "./mqtt.js";

describe("FakeMqttClient", () => {
  it("routes emitted events to registered listeners", () => {
    const client = new FakeMqttClient();
    const onConnect = vi.fn();
    const onLost = vi.fn();
    client.onConnect(onConnect);
    client.onConnectionLost(onLost);

    client.emitConnect();
    client.emitConnectionLost("close");

    expect(onConnect).toHaveBeenCalledTimes(1);
    expect(onLost).toHaveBeenCalledWith("close");
  });

  it("refuses deliveries before a handler is installed", () => {
    const client = new FakeMqttClient();
    expect(() => client.deliver({ topic: "t", payload: new Uint8Array(), qos: 0 })).toThrow(
      "No message handler installed"
    );
  });

  it("records subscriptions and can fail them", async () => {
    const client = new FakeMqttClient();
    await client.subscribe("data/sensor", 1);
    client.subscribeError = new Error("not authorized");

    await expect(client.subscribe("data/other", 0)).rejects.toThrow("not authorized");
    expect(client.subscriptions).toEqual([{ topic: "data/sensor", qos: 1 }]);
  });
});
