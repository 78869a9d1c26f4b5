import { describe, expect, test } from "vitest";
import { FakeTools } from "../../src/mcp-client/fake";
import { RemoteMCPClient } from "../../src/mcp-client/remote";
import type { RemoteMCPClientOptions } from "../../src/mcp-client/remote";
import { MockSdkClient, MockTransport } from "../sdk-mocks";
import type { MockClientOptions } from "../sdk-mocks";

const URL_TEXT = "https://weather.example.test/mcp";

function setup(
  clientOptions: MockClientOptions = {},
  config: { url?: string; headers?: Record<string, string> } = {},
  failClose = false
) {
  const clients: MockSdkClient[] = [];
  const transports: MockTransport[] = [];
  const options: RemoteMCPClientOptions = {
    clientFactory: () => {
      const client = new MockSdkClient(clientOptions);
      clients.push(client);
      return client;
    },
    streamableTransportFactory: (url, headers) => {
      const transport = new MockTransport("streamable", { url: url.href, headers }, failClose);
      transports.push(transport);
      return transport;
    },
    sseTransportFactory: (url, headers) => {
      const transport = new MockTransport("sse", { url: url.href, headers }, failClose);
      transports.push(transport);
      return transport;
    },
  };
  const remote = new RemoteMCPClient(
    { name: "weather", type: "remote", url: config.url ?? URL_TEXT, headers: config.headers },
    options
  );
  return { remote, clients, transports };
}

describe("RemoteMCPClient", () => {
  describe("connect", () => {
    test("throws when the URL is empty", async () => {
      const { remote } = setup({}, { url: "" });
      await expect(remote.connect()).rejects.toThrow("Remote MCP server weather has no URL");
    });

    test("uses streamable HTTP when it connects", async () => {
      const { remote, transports } = setup();

      await remote.connect();

      expect(remote.getTransportType()).toBe("streamable-http");
      expect(transports.map(t => t.kind)).toEqual(["streamable"]);
    });

    test("falls back to SSE on a fresh client", async () => {
      const { remote, clients, transports } = setup({ failOn: ["streamable"] });

      await remote.connect();

      expect(remote.getTransportType()).toBe("sse");
      expect(clients).toHaveLength(2);
      expect(clients[1]?.connectedTo).toEqual([transports[1]]);
      expect(transports[0]?.closed).toBe(1);
    });

    test("passes headers, adding Accept for SSE", async () => {
      const headers = { Authorization: "Bearer test-token" };
      const { remote, transports } = setup({ failOn: ["streamable"] }, { headers });

      await remote.connect();

      expect(transports.map(t => t.options)).toEqual([
        { url: URL_TEXT, headers },
        { url: URL_TEXT, headers: { Accept: "text/event-stream", Authorization: "Bearer test-token" } },
      ]);
    });

    test("rethrows the SSE failure and closes both transports", async () => {
      const { remote, transports } = setup({ failOn: ["streamable", "sse"] });

      await expect(remote.connect()).rejects.toThrow("sse refused");

      expect(remote.getTransportType()).toBeNull();
      expect(transports.map(t => t.closed)).toEqual([1, 1]);
    });

    test("a failing close does not mask the fallback", async () => {
      const { remote } = setup({ failOn: ["streamable"] }, {}, true);

      await remote.connect();
      expect(remote.getTransportType()).toBe("sse");
    });
  });

  describe("operations", () => {
    test("listTools() returns the server's tools", async () => {
      const { remote } = setup({ tools: FakeTools.weather });
      await remote.connect();

      expect((await remote.listTools()).map(t => t.name)).toEqual(["get_forecast", "get_alerts"]);
    });

    test("callTool() forwards name and arguments", async () => {
      const { remote, clients } = setup({ callResult: { content: [{ type: "text", text: "sunny" }] } });
      await remote.connect();

      const result = await remote.callTool("get_forecast", { location: "Paris" });

      expect(result).toEqual({ content: [{ type: "text", text: "sunny" }] });
      expect(clients[0]?.requests).toEqual([{ name: "get_forecast", arguments: { location: "Paris" } }]);
    });
  });

  describe("close", () => {
    test("closes the transport once", async () => {
      const { remote, transports } = setup();
      await remote.connect();

      await remote.close();
      await remote.close();

      expect(transports[0]?.closed).toBe(1);
      expect(remote.getTransportType()).toBeNull();
    });

    test("is safe without connect", async () => {
      const { remote } = setup();
      await expect(remote.close()).resolves.toBeUndefined();
    });
  });
});
