import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { afterEach, describe, expect, it } from "vitest";
import { AppDI } from "../../src/config/AppDI.ts";
import { describeSetupError, setupDependencyInjection } from "../../src/config/bootstrap.ts";
import { FakeSearchRepository } from "../helpers/fakes.ts";
import { jsonResponse, stubFetch } from "../helpers/fetchStub.ts";
import { callTool } from "../helpers/mcpClient.ts";

describe("setupDependencyInjection", () => {
  let client: Client | undefined;

  afterEach(async () => {
    await client?.close();
    client = undefined;
  });

  it("should fail before any tool exists when the key is missing", () => {
    const result = setupDependencyInjection({});

    expect(result.isErr()).toBe(true);
    expect(describeSetupError(result._unsafeUnwrapErr())).toBe(
      "Invalid environment configuration: EXA_API_KEY: EXA_API_KEY environment variable is required. Get your key from https://exa.ai/",
    );
  });

  it("should serve the five tools over a transport", async () => {
    const requests = stubFetch(() =>
      jsonResponse({
        results: [{ id: "r1", url: "https://example.com/solar", title: "Solar", score: 0.5 }],
      })
    );
    const { di } = setupDependencyInjection({ EXA_API_KEY: "test-api-key" })._unsafeUnwrap();
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

    const started = await di.startMcpServer(serverTransport);
    expect(started.isOk()).toBe(true);

    const connected = new Client({ name: "test-client", version: "0.0.0" });
    client = connected;
    await connected.connect(clientTransport);

    const { tools } = await connected.listTools();
    expect(tools.map((tool) => tool.name)).toEqual([
      "search_web_semantic",
      "extract_page_content",
      "find_similar_pages",
      "search_recent_content",
      "search_by_example_text",
    ]);

    const output = await callTool(connected, "search_web_semantic", { query: "solar panels" });
    expect(output.text).toBe(
      [
        "Semantic search results for: 'solar panels'",
        "",
        "Found 1 result:",
        "",
        "1. Solar",
        "   URL: https://example.com/solar",
        "   Relevance Score: 0.500",
      ].join("\n"),
    );
    expect(requests[0]?.url).toBe("https://api.exa.ai/search");
    expect(requests[0]?.headers.get("x-api-key")).toBe("test-api-key");
  });

  it("should fail every tool with an upstream error when the provider is unreachable", async () => {
    const requests = stubFetch(() => {
      throw new TypeError("fetch failed");
    });
    const { di } = setupDependencyInjection({ EXA_API_KEY: "test-api-key" })._unsafeUnwrap();
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    expect((await di.startMcpServer(serverTransport)).isOk()).toBe(true);

    const connected = new Client({ name: "test-client", version: "0.0.0" });
    client = connected;
    await connected.connect(clientTransport);

    const calls: Array<[string, Record<string, unknown>]> = [
      ["search_web_semantic", { query: "solar panels" }],
      ["extract_page_content", { url: "https://example.com/a" }],
      ["find_similar_pages", { url: "https://example.com/a" }],
      ["search_recent_content", { query: "solar panels" }],
      ["search_by_example_text", { text: "solar panels" }],
    ];

    for (const [name, args] of calls) {
      expect(await callTool(connected, name, args)).toEqual({
        isError: true,
        text: "Upstream error (network): fetch failed",
      });
    }
    expect(requests.map((request) => new URL(request.url).pathname)).toEqual([
      "/search",
      "/contents",
      "/findSimilar",
      "/search",
      "/search",
    ]);
  });
});

describe("AppDI", () => {
  it("should refuse services before initialization", () => {
    const di = new AppDI();

    expect(di.isInitialized()).toBe(false);
    expect(di.getSearchService()._unsafeUnwrapErr().type).toBe("not_initialized");
    expect(di.createMcpServer().isErr()).toBe(true);
  });

  it("should refuse a second initialization", () => {
    const di = new AppDI();
    expect(di.initialize({ search: new FakeSearchRepository() }).isOk()).toBe(true);

    const second = di.initialize({ search: new FakeSearchRepository() });

    expect(second._unsafeUnwrapErr().type).toBe("already_initialized");
  });

  it("should reuse the same service instance", () => {
    const di = new AppDI();
    di.initialize({ search: new FakeSearchRepository() });

    expect(di.getSearchService()._unsafeUnwrap()).toBe(di.getSearchService()._unsafeUnwrap());
  });
});
