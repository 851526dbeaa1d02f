import { afterEach, describe, expect, test, vi } from "vitest";
import type http from "node:http";
import { ReloadChannel, type ClientConnection } from "../../src/reload/reload-channel.ts";
import type { ReloadMessage } from "../../src/reload/protocol.ts";
import { createChangeTrigger } from "../../src/trigger/change-trigger.ts";
import { startTriggerServer } from "../../src/trigger/trigger-server.ts";
import { closeHttp, rawRequest } from "../helpers.ts";

const servers: http.Server[] = [];

afterEach(async () => {
  await Promise.all(servers.splice(0).map(closeHttp));
});

function recordingConnection(id: number): ClientConnection & { received: ReloadMessage[] } {
  const received: ReloadMessage[] = [];
  return {
    id,
    received,
    push(message) {
      received.push(message);
      return true;
    },
    close() {},
  };
}

async function setup() {
  const trigger = vi.fn((_reason?: string) => ({ delivered: 2, failed: 1 }));
  const triggerServer = await startTriggerServer({ port: 0, trigger });
  servers.push(triggerServer.server);
  return { trigger, ...triggerServer };
}

describe("trigger server", () => {
  test("binds to loopback and reports its reload URL", async () => {
    const { port, url, server } = await setup();
    expect(url).toBe(`http://127.0.0.1:${port}/reload`);
    expect(server.address()).toMatchObject({ address: "127.0.0.1", port });
  });

  test("POST /reload broadcasts once and returns the counts", async () => {
    const { trigger, url } = await setup();
    const res = await fetch(url, { method: "POST", body: "ignored" });

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("application/json; charset=utf-8");
    expect(await res.json()).toEqual({ delivered: 2, failed: 1 });
    expect(trigger).toHaveBeenCalledTimes(1);
    expect(trigger).toHaveBeenCalledWith("POST /reload");
  });

  test("POST / is accepted too", async () => {
    const { trigger, port } = await setup();
    const res = await rawRequest(port, "/", { method: "POST" });
    expect(res.status).toBe(200);
    expect(trigger).toHaveBeenCalledWith("POST /");
  });

  test("other methods get 405", async () => {
    const { trigger, port } = await setup();
    const res = await rawRequest(port, "/reload");
    expect(res.status).toBe(405);
    expect(res.headers.allow).toBe("POST");
    expect(trigger).not.toHaveBeenCalled();
  });

  test("other paths get 404", async () => {
    const { trigger, port } = await setup();
    const res = await rawRequest(port, "/elsewhere", { method: "POST" });
    expect(res.status).toBe(404);
    expect(trigger).not.toHaveBeenCalled();
  });
});

describe("change trigger", () => {
  test("broadcasts one reload to the channel", () => {
    const channel = new ReloadChannel();
    const first = recordingConnection(1001);
    const second = recordingConnection(1002);
    channel.register(first);
    channel.register(second);

    const trigger = createChangeTrigger(channel);
    expect(trigger("index.html")).toEqual({ delivered: 2, failed: 0 });
    expect(trigger()).toEqual({ delivered: 2, failed: 0 });
    expect(first.received).toEqual([{ type: "reload" }, { type: "reload" }]);
    expect(second.received).toEqual([{ type: "reload" }, { type: "reload" }]);
  });

  test("with nobody connected it delivers nothing", () => {
    expect(createChangeTrigger(new ReloadChannel())()).toEqual({ delivered: 0, failed: 0 });
  });
});
