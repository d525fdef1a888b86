import { AxiosError, AxiosHeaders, type AxiosResponse } from "axios";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { exponentialBackoff } from "../../src/rpc/backoff.js";
import { createEndpoint } from "../../src/rpc/endpoint.js";
import { RpcTransport } from "../../src/rpc/transport.js";
import { createTestLogger } from "../helpers/logger.js";

const { post } = vi.hoisted(() => ({
  post: vi.fn<(url: string, body: unknown, config?: unknown) => Promise<AxiosResponse>>(),
}));

vi.mock("axios", async (importOriginal) => {
  const actual = await importOriginal<typeof import("axios")>();
  return {
    ...actual,
    default: { ...actual.default, post },
  };
});

function httpResponse(data: unknown, status = 200): AxiosResponse {
  return {
    data,
    status,
    statusText: status === 200 ? "OK" : "Error",
    headers: {},
    config: { headers: new AxiosHeaders() },
  };
}

describe("RpcTransport", () => {
  const sleep = vi.fn(async (_ms: number) => {});
  const endpoint = createEndpoint({
    url: "https://rpc.example.org",
    timeoutMs: 5000,
    maxRetries: 3,
    retryDelayMs: 1000,
  });
  let logger = createTestLogger();

  const createTransport = () => new RpcTransport(endpoint, { sleep, logger });

  beforeEach(() => {
    vi.clearAllMocks();
    post.mockReset();
    logger = createTestLogger();
  });

  describe("execute", () => {
    it("posts a JSON-RPC request and classifies the result", async () => {
      post.mockResolvedValueOnce(httpResponse({ jsonrpc: "2.0", id: 1, result: "0x64" }));

      const response = await createTransport().execute({ id: 1, method: "eth_blockNumber", params: [] });

      expect(response).toEqual({ kind: "result", id: 1, result: "0x64" });
      expect(post).toHaveBeenCalledWith(
        "https://rpc.example.org",
        { jsonrpc: "2.0", id: 1, method: "eth_blockNumber", params: [] },
        { timeout: 5000, headers: { "Content-Type": "application/json" } },
      );
    });

    it("retries failed attempts with the endpoint delay", async () => {
      post
        .mockRejectedValueOnce(new Error("socket hang up"))
        .mockResolvedValueOnce(httpResponse({ jsonrpc: "2.0", id: 1, result: "0x1" }));

      const response = await createTransport().execute({ id: 1, method: "eth_blockNumber", params: [] });

      expect(response).toEqual({ kind: "result", id: 1, result: "0x1" });
      expect(post).toHaveBeenCalledTimes(2);
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep).toHaveBeenCalledWith(1000);
      expect(logger.warn).toHaveBeenCalledWith(
        { attempt: 1, maxAttempts: 3, error: "socket hang up" },
        "RPC call eth_blockNumber failed (attempt 1/3)",
      );
    });

    it("returns Unavailable once every attempt has failed", async () => {
      post.mockRejectedValue(new Error("ECONNREFUSED"));

      const response = await createTransport().execute({ id: 1, method: "eth_blockNumber", params: [] });

      expect(response).toEqual({
        kind: "unavailable",
        reason: "RPC call eth_blockNumber failed after 3 attempts: ECONNREFUSED",
      });
      expect(post).toHaveBeenCalledTimes(3);
      expect(sleep).toHaveBeenCalledTimes(2);
      expect(logger.warn).toHaveBeenCalledTimes(3);
      expect(logger.error).toHaveBeenCalledTimes(1);
    });

    it("reports the status code of non-2xx responses", async () => {
      const failure = new AxiosError(
        "Request failed with status code 503",
        "ERR_BAD_RESPONSE",
        undefined,
        undefined,
        httpResponse("Service Unavailable", 503),
      );
      post.mockRejectedValue(failure);

      const response = await createTransport().execute({ id: 1, method: "eth_blockNumber", params: [] });

      expect(response).toEqual({
        kind: "unavailable",
        reason: "RPC call eth_blockNumber failed after 3 attempts: HTTP 503",
      });
    });

    it("retries bodies that are not JSON-RPC envelopes", async () => {
      post
        .mockResolvedValueOnce(httpResponse("<html>bad gateway</html>"))
        .mockResolvedValueOnce(httpResponse({ jsonrpc: "2.0", id: 1, result: "0x2" }));

      const response = await createTransport().execute({ id: 1, method: "eth_blockNumber", params: [] });

      expect(response).toEqual({ kind: "result", id: 1, result: "0x2" });
      expect(post).toHaveBeenCalledTimes(2);
    });

    it("returns JSON-RPC errors without retrying", async () => {
      post.mockResolvedValueOnce(
        httpResponse({ jsonrpc: "2.0", id: 1, error: { code: -32000, message: "header not found" } }),
      );

      const response = await createTransport().execute({
        id: 1,
        method: "eth_getBlockByNumber",
        params: ["0x10", false],
      });

      expect(response).toEqual({ kind: "error", id: 1, error: { code: -32000, message: "header not found" } });
      expect(post).toHaveBeenCalledTimes(1);
    });

    it("keeps a null result as a present result", async () => {
      post.mockResolvedValueOnce(httpResponse({ jsonrpc: "2.0", id: 1, result: null }));

      const response = await createTransport().execute({
        id: 1,
        method: "eth_getBlockByNumber",
        params: ["0xffffff", false],
      });

      expect(response).toEqual({ kind: "result", id: 1, result: null });
    });

    it("flags a mismatched response id as an anomaly", async () => {
      post.mockResolvedValueOnce(httpResponse({ jsonrpc: "2.0", id: 9, result: "0x1" }));

      const response = await createTransport().execute({ id: 1, method: "eth_blockNumber", params: [] });

      expect(response).toEqual({
        kind: "anomaly",
        id: 1,
        reason: "response id 9 does not match request id 1",
      });
    });

    it("flags responses carrying both or neither of result and error", async () => {
      post
        .mockResolvedValueOnce(httpResponse({ jsonrpc: "2.0", id: 1, result: "0x1", error: { code: 1, message: "x" } }))
        .mockResolvedValueOnce(httpResponse({ jsonrpc: "2.0", id: 1 }));
      const transport = createTransport();

      const both = await transport.execute({ id: 1, method: "eth_blockNumber", params: [] });
      const neither = await transport.execute({ id: 1, method: "eth_blockNumber", params: [] });

      expect(both).toEqual({ kind: "anomaly", id: 1, reason: "response carries both result and error" });
      expect(neither).toEqual({ kind: "anomaly", id: 1, reason: "response carries neither result nor error" });
    });

    it("spaces attempts with an injected backoff", async () => {
      post.mockRejectedValue(new Error("timeout of 5000ms exceeded"));
      const transport = new RpcTransport(createEndpoint({ url: "https://rpc.example.org", maxRetries: 4 }), {
        backoff: exponentialBackoff({ initialMs: 100, maxMs: 300 }),
        sleep,
        logger,
      });

      await transport.execute({ id: 1, method: "eth_blockNumber", params: [] });

      expect(sleep.mock.calls).toEqual([[100], [200], [300]]);
    });
  });

  describe("executeBatch", () => {
    const requests = [
      { id: 0, method: "eth_call", params: [{ to: "0x01", data: "0x18160ddd" }, "0x4"] },
      { id: 1, method: "eth_call", params: [{ to: "0x02", data: "0x18160ddd" }, "0x4"] },
    ];

    it("sends one array payload and returns responses in server order", async () => {
      post.mockResolvedValueOnce(
        httpResponse([
          { jsonrpc: "2.0", id: 1, result: "0x02" },
          { jsonrpc: "2.0", id: 0, result: "0x01" },
        ]),
      );

      const responses = await createTransport().executeBatch(requests);

      expect(responses).toEqual([
        { kind: "result", id: 1, result: "0x02" },
        { kind: "result", id: 0, result: "0x01" },
      ]);
      expect(post).toHaveBeenCalledTimes(1);
      expect(post.mock.calls[0][1]).toEqual([
        { jsonrpc: "2.0", id: 0, method: "eth_call", params: [{ to: "0x01", data: "0x18160ddd" }, "0x4"] },
        { jsonrpc: "2.0", id: 1, method: "eth_call", params: [{ to: "0x02", data: "0x18160ddd" }, "0x4"] },
      ]);
    });

    it("drops malformed entries and entries without an integer id", async () => {
      post.mockResolvedValueOnce(
        httpResponse([
          { jsonrpc: "2.0", id: 0, result: "0x01" },
          { jsonrpc: "2.0", id: "1", result: "0x02" },
          "garbage",
          { jsonrpc: "2.0", id: null, error: { code: -32600, message: "invalid request" } },
        ]),
      );

      const responses = await createTransport().executeBatch(requests);

      expect(responses).toEqual([{ kind: "result", id: 0, result: "0x01" }]);
      expect(logger.warn).toHaveBeenCalledTimes(3);
    });

    it("retries a non-array body and gives up after the budget", async () => {
      post.mockResolvedValue(httpResponse({ jsonrpc: "2.0", id: null, error: { code: -32600, message: "batch too large" } }));

      const responses = await createTransport().executeBatch(requests);

      expect(responses).toEqual({
        kind: "unavailable",
        reason: "Batch RPC call (2 requests) failed after 3 attempts: Batch response is not an array",
      });
      expect(post).toHaveBeenCalledTimes(3);
    });

    it("skips the network for an empty batch", async () => {
      expect(await createTransport().executeBatch([])).toEqual([]);
      expect(post).not.toHaveBeenCalled();
    });
  });
});
