import { describe, expect, it } from "vitest";
import { BroadcastChannel } from "../src/index";

function sendAll(channel: BroadcastChannel<string>, count: number): void {
  for (let i = 0; i < count; i++) {
    channel.send(`e${i}`);
  }
}

describe("BroadcastChannel", () => {
  it("delivers every value to a receiver that keeps up", () => {
    const channel = new BroadcastChannel<string>(2);
    const receiver = channel.subscribe();
    const received: string[] = [];

    for (let i = 0; i < 5; i++) {
      channel.send(`e${i}`);
      const result = receiver.tryRecv();
      if (result.kind === "value") received.push(result.value);
    }

    expect(received).toEqual(["e0", "e1", "e2", "e3", "e4"]);
    expect(receiver.tryRecv()).toEqual({ kind: "empty" });
  });

  it("tells a slow receiver how many values it missed, then resumes with retained ones", () => {
    const channel = new BroadcastChannel<string>(2);
    const slow = channel.subscribe();

    sendAll(channel, 5);

    expect(slow.tryRecv()).toEqual({ kind: "lagged", skipped: 3 });
    expect(slow.tryRecv()).toEqual({ kind: "value", value: "e3" });
    expect(slow.tryRecv()).toEqual({ kind: "value", value: "e4" });
    expect(slow.tryRecv()).toEqual({ kind: "empty" });

    channel.send("e5");
    expect(slow.tryRecv()).toEqual({ kind: "value", value: "e5" });
  });

  it("starts new receivers at the next value", () => {
    const channel = new BroadcastChannel<string>(4);
    channel.send("before");
    const receiver = channel.subscribe();
    channel.send("after");

    expect(receiver.tryRecv()).toEqual({ kind: "value", value: "after" });
  });

  it("wakes a waiting receiver on send", async () => {
    const channel = new BroadcastChannel<number>(4);
    const receiver = channel.subscribe();

    const pending = receiver.recv();
    channel.send(7);

    await expect(pending).resolves.toEqual({ kind: "value", value: 7 });
  });

  it("counts live receivers and forgets closed ones", () => {
    const channel = new BroadcastChannel<string>(4);
    const first = channel.subscribe();
    channel.subscribe();

    expect(channel.send("a")).toBe(2);
    first.close();
    expect(channel.send("b")).toBe(1);
    expect(first.tryRecv()).toEqual({ kind: "closed" });
  });

  it("resolves a pending recv with closed when the receiver is closed", async () => {
    const channel = new BroadcastChannel<string>(4);
    const receiver = channel.subscribe();

    const pending = receiver.recv();
    receiver.close();

    await expect(pending).resolves.toEqual({ kind: "closed" });
  });

  it("lets receivers drain retained values after the channel closes", async () => {
    const channel = new BroadcastChannel<string>(4);
    const receiver = channel.subscribe();
    channel.send("last");

    channel.close();

    expect(await receiver.recv()).toEqual({ kind: "value", value: "last" });
    expect(await receiver.recv()).toEqual({ kind: "closed" });
    expect(() => channel.send("late")).toThrow("Cannot send on a closed broadcast channel");
    expect(channel.subscribe().tryRecv()).toEqual({ kind: "closed" });
  });

  it("rejects a capacity below one", () => {
    expect(() => new BroadcastChannel<string>(0)).toThrow("Broadcast capacity must be a positive integer, got 0");
  });
});
