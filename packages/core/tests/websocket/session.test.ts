import { describe, it, expect, vi } from "vitest";
import { WebSocketSession } from "../../src/websocket/session";
import { FakeChannel } from "../fixtures/channel";

describe("WebSocketSession", () => {
  it("sends text and JSON through the channel", async () => {
    const channel = new FakeChannel();
    const session = new WebSocketSession(channel, vi.fn().mockResolvedValue(undefined));

    await session.send("hello");
    await session.sendJson({ type: "ping" });

    expect(channel.sent).toEqual(["hello", '{"type":"ping"}']);
  });

  it("delivers incoming messages while open", () => {
    const channel = new FakeChannel();
    const session = new WebSocketSession(channel, vi.fn().mockResolvedValue(undefined));
    const received: string[] = [];
    session.onMessage((data) => received.push(data));

    channel.receive("one");
    channel.disconnect();
    channel.receive("two");

    expect(received).toEqual(["one"]);
  });

  it("releases the scope once when the handler closes the session", async () => {
    // Arrange
    const channel = new FakeChannel();
    const release = vi.fn().mockResolvedValue(undefined);
    const session = new WebSocketSession(channel, release);
    const onClose = vi.fn();
    session.onClose(onClose);

    // Act
    await session.close(4000, "done");
    await session.close();

    // Assert
    expect(channel.closedWith).toEqual({ code: 4000, reason: "done" });
    expect(release).toHaveBeenCalledOnce();
    expect(onClose).toHaveBeenCalledWith(4000, "done");
    expect(session.closed).toBe(true);
  });

  it("releases the scope when the peer disconnects", () => {
    const channel = new FakeChannel();
    const release = vi.fn().mockResolvedValue(undefined);
    const session = new WebSocketSession(channel, release);

    channel.disconnect(1001);

    expect(release).toHaveBeenCalledOnce();
    expect(session.closed).toBe(true);
    expect(channel.closedWith).toBeNull();
  });

  it("refuses to send after closing", async () => {
    const session = new WebSocketSession(new FakeChannel(), vi.fn().mockResolvedValue(undefined));
    await session.close();

    await expect(session.send("late")).rejects.toThrow("WebSocket session is closed");
  });

  it("logs a release failure after a peer disconnect", async () => {
    // Arrange
    const channel = new FakeChannel();
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), child: vi.fn(), withContext: vi.fn() };
    new WebSocketSession(channel, () => Promise.reject(new Error("pool closed")), logger);

    // Act
    channel.disconnect();
    await vi.waitFor(() => expect(logger.error).toHaveBeenCalled());

    // Assert
    expect(logger.error).toHaveBeenCalledWith("Failed to release WebSocket session", {
      error: "Error: pool closed",
    });
  });
});
