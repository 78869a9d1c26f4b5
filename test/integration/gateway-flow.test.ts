import { describe, expect, test, vi } from "vitest";
import { Gateway } from "../../src/gateway/gateway";
import type { GatewayOptions } from "../../src/gateway/gateway";
import { FakeToolHandlers, FakeTools } from "../../src/mcp-client/fake";
import { MemoryStorage } from "../../src/storage/memory";
import { FakeTransport, createMemoryLogger, testSettings } from "../helpers";
import type { RecordedCall } from "../helpers";

async function respond(call: RecordedCall) {
  if (call.server === "weather") {
    return FakeToolHandlers.weather(call.tool, call.args);
  }
  return { content: [{ type: "text", text: `${call.server}:${call.tool}` }] };
}

function createGateway(overrides: Partial<GatewayOptions> = {}) {
  const transport = new FakeTransport(
    { weather: FakeTools.weather, time: FakeTools.time, calculator: FakeTools.calculator },
    respond
  );
  const logger = createMemoryLogger();
  const storage = new MemoryStorage();
  const gateway = new Gateway({
    settings: testSettings(),
    storage,
    transport,
    logger,
    sleep: async () => {},
    ...overrides,
  });
  return { gateway, transport, logger, storage };
}

const weatherInput = { name: "weather", transport: "http", url: "https://weather.example.test/mcp" };
const timeInput = { name: "time", transport: "stdio", command: "time-server", loadingMode: "eager" };

describe("Gateway: search-driven activation", () => {
  test("a deferred tool becomes callable after a search finds it", async () => {
    const { gateway } = createGateway();

    const registered = await gateway.registerServer(weatherInput);
    expect(registered.success).toBe(true);
    if (registered.success) {
      expect(registered.data.toolCount).toBe(2);
      expect(registered.data.server.status).toBe("active");
    }
    expect(gateway.capabilities.size).toBe(0);

    expect(await gateway.callTool("weather__get_forecast", { location: "Paris" })).toEqual({
      success: false,
      error: { code: "not_found", message: "Tool 'weather__get_forecast' is not active; search for it first" },
    });

    const found = await gateway.search("forecast");
    expect(found.success).toBe(true);
    if (found.success) {
      expect(found.data.tool_references).toEqual([{ type: "tool_reference", tool_name: "weather__get_forecast" }]);
      expect(found.data.activated).toEqual(["weather__get_forecast"]);
      expect(found.data.total_matches).toBe(1);
      expect(found.data.search_type).toBe("bm25");
      expect(found.data.tools[0]?.signature).toBe("get_forecast(location, days?)");
      expect(found.data.tools[0]?.description).toBe("Get the weather forecast for a location");
    }

    expect(await gateway.callTool("weather__get_forecast", { location: "Paris" })).toEqual({
      success: true,
      data: { content: [{ type: "text", text: '{"location":"Paris","forecast":"sunny"}' }] },
    });
  });

  test("hits from a server removed mid-search are left out", async () => {
    const { gateway } = createGateway();
    await gateway.registerServer(weatherInput);
    const activate = gateway.tracker.activate.bind(gateway.tracker);
    vi.spyOn(gateway.tracker, "activate").mockImplementationOnce(async names => {
      await gateway.removeServer("weather");
      return activate(names);
    });

    const found = await gateway.search("forecast");

    expect(found).toEqual({
      success: true,
      data: {
        tool_references: [],
        tools: [],
        total_matches: 0,
        query: "forecast",
        search_type: "bm25",
        activated: [],
      },
    });
    expect(gateway.capabilities.size).toBe(0);
  });

  test("searching again does not re-activate", async () => {
    const { gateway } = createGateway();
    await gateway.registerServer(weatherInput);

    await gateway.search("forecast");
    const again = await gateway.search("forecast");

    expect(again.success && again.data.activated).toEqual([]);
    expect(gateway.capabilities.list().map(c => c.name)).toEqual(["weather__get_forecast"]);
  });

  test("eager servers are callable right after registration", async () => {
    const { gateway } = createGateway();

    await gateway.registerServer(timeInput);

    expect(gateway.capabilities.list().map(c => c.name)).toEqual(["time__convert_time", "time__get_current_time"]);
    const result = await gateway.callTool("time__get_current_time", { timezone: "UTC" });
    expect(result.success).toBe(true);
  });

  test("regex search orders matches by name", async () => {
    const { gateway } = createGateway();
    await gateway.registerServer(weatherInput);
    await gateway.registerServer({ ...timeInput, loadingMode: "deferred" });

    const found = await gateway.search("^time__", { mode: "regex" });

    expect(found.success).toBe(true);
    if (found.success) {
      expect(found.data.tool_references.map(r => r.tool_name)).toEqual(["time__convert_time", "time__get_current_time"]);
      expect(found.data.tools.map(t => t.score)).toEqual([1, 1]);
    }
  });

  test("an invalid pattern is reported", async () => {
    const { gateway } = createGateway();
    const result = await gateway.search("([", { mode: "regex" });
    expect(result.success ? "ok" : result.error.code).toBe("invalid_pattern");
  });

  test("activation goes through the capability handler with the caller's auth", async () => {
    const { gateway, transport } = createGateway();
    await gateway.registerServer(weatherInput);
    await gateway.search("forecast");

    const handler = gateway.capabilities.get("weather__get_forecast")?.handler;
    const result = await handler?.({ location: "Oslo" }, { authHeader: "Bearer caller" });

    expect(result?.success).toBe(true);
    expect(transport.calls).toEqual([
      {
        server: "weather",
        tool: "get_forecast",
        args: { location: "Oslo" },
        headers: { Authorization: "Bearer caller" },
      },
    ]);
  });

  test("emits tool:activated once per tool", async () => {
    const { gateway } = createGateway();
    const activated: string[] = [];
    gateway.on("tool:activated", (name: string) => activated.push(name));
    await gateway.registerServer(weatherInput);

    await Promise.all([gateway.search("forecast"), gateway.search("forecast")]);

    expect(activated).toEqual(["weather__get_forecast"]);
  });
});

describe("Gateway: server lifecycle", () => {
  test("rejects invalid registrations", async () => {
    const { gateway } = createGateway();

    expect(await gateway.registerServer({ ...weatherInput, name: "bad__name" })).toEqual({
      success: false,
      error: {
        code: "invalid_request",
        message: 'Invalid server registration: name: Server name must not contain "__"',
        details: { issues: ['name: Server name must not contain "__"'] },
      },
    });
  });

  test("duplicate names need overwrite", async () => {
    const { gateway, transport } = createGateway();
    await gateway.registerServer(weatherInput);

    const duplicate = await gateway.registerServer(weatherInput);
    expect(duplicate.success ? "ok" : duplicate.error.code).toBe("already_exists");

    const replaced = await gateway.registerServer(weatherInput, { overwrite: true });
    expect(replaced.success).toBe(true);
    expect(transport.disconnected).toEqual(["weather"]);
  });

  test("a failed discovery keeps the registration with status error", async () => {
    const { gateway } = createGateway();
    const failures: Array<[string, string]> = [];
    gateway.on("server:error", (name: string, message: string) => failures.push([name, message]));

    await gateway.registerServer(weatherInput);
    const result = await gateway.registerServer({ name: "offline", transport: "http", url: "https://offline.example.test/mcp" });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.server.status).toBe("error");
      expect(result.data.server.errorMessage).toBe("Cannot reach offline: connection refused");
      expect(result.data.toolCount).toBe(0);
    }
    expect(failures).toEqual([["offline", "Cannot reach offline: connection refused"]]);

    const status = await gateway.getStatus();
    expect(status.success).toBe(true);
    if (status.success) {
      expect(status.data.servers).toMatchObject({ total: 2, active: 1, failed: 1, unknown: 0 });
      expect(status.data.health).toEqual({ status: "degraded", message: "1 server(s) failed discovery" });
    }
  });

  test("status of an empty gateway", async () => {
    const { gateway } = createGateway();
    const status = await gateway.getStatus();

    expect(status.success && status.data.health).toEqual({ status: "unknown", message: "No servers registered" });
  });

  test("removing a server withdraws everything derived from it", async () => {
    const { gateway, transport } = createGateway();
    await gateway.registerServer(weatherInput);
    await gateway.registerServer(timeInput);
    await gateway.search("forecast");

    expect(await gateway.removeServer("weather")).toEqual({
      success: true,
      data: { name: "weather", removedTools: 2 },
    });

    expect(gateway.index.names().filter(n => n.startsWith("weather__"))).toEqual([]);
    expect(gateway.capabilities.list().map(c => c.name)).toEqual(["time__convert_time", "time__get_current_time"]);
    expect(gateway.cache.keys().filter(k => k.startsWith("weather__"))).toEqual([]);
    expect(transport.disconnected).toEqual(["weather"]);

    expect(await gateway.callTool("weather__get_forecast", {})).toEqual({
      success: false,
      error: { code: "not_found", message: "Server 'weather' not found" },
    });
    const found = await gateway.search("forecast");
    expect(found.success && found.data.total_matches).toBe(0);

    const again = await gateway.removeServer("weather");
    expect(again.success ? "ok" : again.error.code).toBe("not_found");
  });

  test("refreshing a server replaces its tool set", async () => {
    const { gateway, transport } = createGateway();
    await gateway.registerServer({ ...weatherInput, loadingMode: "eager" });

    transport.setTools("weather", FakeTools.weather.filter(tool => tool.name === "get_alerts"));
    const refreshed = await gateway.refreshServer("weather");

    expect(refreshed.success && refreshed.data.toolCount).toBe(1);
    expect(gateway.index.has("weather__get_forecast")).toBe(false);
    expect(gateway.capabilities.list().map(c => c.name)).toEqual(["weather__get_alerts"]);
  });

  test("registerConfiguredServers() registers enabled entries only", async () => {
    const { gateway } = createGateway();

    const results = await gateway.registerConfiguredServers({
      weather: { transport: "http", url: "https://weather.example.test/mcp", enabled: true },
      time: { transport: "stdio", command: "time-server", args: [], enabled: false },
    });

    expect(Object.keys(results)).toEqual(["weather"]);
    expect(results.weather?.success).toBe(true);
  });
});

describe("Gateway: restore", () => {
  test("rebuilds index and activation state from storage", async () => {
    const first = createGateway();
    await first.gateway.registerServer(weatherInput);
    await first.gateway.registerServer(timeInput);

    const { gateway } = createGateway({ storage: first.storage });
    const restored = await gateway.restore();

    expect(restored).toEqual({ success: true, data: { servers: 2, tools: 4, active: 2 } });
    expect(gateway.capabilities.list().map(c => c.name)).toEqual(["time__convert_time", "time__get_current_time"]);
    expect(gateway.tracker.getState("weather__get_forecast")).toBe("dormant");

    const found = await gateway.search("forecast");
    expect(found.success && found.data.activated).toEqual(["weather__get_forecast"]);
  });

  test("rebuildIndex() reports malformed stored metadata", async () => {
    const { gateway, storage } = createGateway();
    await gateway.registerServer(weatherInput);
    await storage.set("toolgate:meta:weather__broken", "[]");

    const rebuilt = await gateway.rebuildIndex();

    expect(rebuilt.success).toBe(true);
    if (rebuilt.success) {
      expect(rebuilt.data.indexed).toBe(2);
      expect(rebuilt.data.skipped.storage.map(s => s.key)).toEqual(["toolgate:meta:weather__broken"]);
    }
  });
});

describe("Gateway: rate limiting and metrics", () => {
  test("limits search and call per caller", async () => {
    const { gateway } = createGateway({
      settings: testSettings({ rateLimit: { requestsPerMinute: 2 } }),
      now: () => 1000,
    });
    await gateway.registerServer(timeInput);

    await gateway.search("time", { caller: "agent" });
    await gateway.callTool("time__get_current_time", {}, { caller: "agent" });

    expect(await gateway.search("time", { caller: "agent" })).toEqual({
      success: false,
      error: {
        code: "rate_limited",
        message: "Rate limit exceeded; retry in 60000ms",
        details: { retryAfterMs: 60000 },
      },
    });
    const other = await gateway.search("time", { caller: "other-agent" });
    expect(other.success).toBe(true);
  });

  test("performance report counts searches, calls and activations", async () => {
    const { gateway } = createGateway();
    await gateway.registerServer(weatherInput);
    await gateway.search("forecast");
    await gateway.callTool("weather__get_forecast", { location: "Paris" });

    const perf = gateway.getPerformance();

    expect(perf.success).toBe(true);
    if (perf.success) {
      expect(perf.data.searches.bm25?.count).toBe(1);
      expect(perf.data.executions?.count).toBe(1);
      expect(perf.data.activations).toBe(1);
      expect(perf.data.indexing.toolCount).toBe(2);
      expect(perf.data.servers.map(s => s.name)).toEqual(["weather"]);
      expect(perf.data.config.retryAttempts).toBe(2);
    }
  });

  test("close() shuts down transport and storage", async () => {
    const { gateway, transport, storage } = createGateway();
    await gateway.registerServer(weatherInput);

    await gateway.close();

    expect(transport.closed).toBe(true);
    expect(storage.size).toBe(0);
  });
});
