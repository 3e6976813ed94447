/**
 * CLI command tests against a fake blob server
 */

import type { FetchFn } from "@blobshare/blob-client";
import { describe, expect, it, vi } from "vitest";
import type { CliConfig } from "../src/config.ts";
import { runParseConfig, runShare, type CommandIO } from "../src/run.ts";

// ============================================================================
// Fake Server
// ============================================================================

const SERVER = "https://blobs.example.com";

const json = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });

interface FakeServerOptions {
  shareRoot?: string;
  uiRoot?: string;
  failSigning?: boolean;
}

/**
 * Fetch answering discovery, uploads and signing
 */
function createFakeServer(options: FakeServerOptions = {}) {
  const uploaded: string[] = [];
  const fetchFn = vi.fn<FetchFn>(async (url, init) => {
    const route = `${init?.method ?? "GET"} ${url}`;

    if (route === `GET ${SERVER}/`) {
      return json({
        blobRoot: "/bs/",
        shareRoot: options.shareRoot ?? "/share/",
        uiRoot: options.uiRoot ?? "/ui/",
        signing: { publicKeyBlobRef: "sha1-0123", signHandler: "/sig/sign" },
      });
    }

    if (route === `POST ${SERVER}/bs/camli/upload` && init?.body instanceof FormData) {
      const received: Array<{ blobRef: string; size: number }> = [];
      for (const [name] of init.body.entries()) {
        uploaded.push(name);
        received.push({ blobRef: name, size: 0 });
      }
      return json({ received });
    }

    if (route === `POST ${SERVER}/sig/sign` && init?.body instanceof URLSearchParams) {
      if (options.failSigning) {
        return new Response("no key", { status: 500 });
      }
      const unsigned = (init.body.get("json") ?? "").trimEnd();
      return new Response(`${unsigned.slice(0, -1)},"camliSig":"test-signature"}\n`);
    }

    return new Response("not found", { status: 404 });
  });
  return { fetchFn, uploaded };
}

function createIO() {
  const out: string[] = [];
  const err: string[] = [];
  const io: CommandIO = {
    out: (line) => out.push(line),
    err: (line) => err.push(line),
  };
  return { io, out, err };
}

const config: CliConfig = {
  server: SERVER,
  auth: { type: "token", token: "test-token" },
  uiRoot: "/ui/",
  maxSetMembers: 10_000,
  hash: "sha224",
};

// ============================================================================
// Tests
// ============================================================================

describe("runShare", () => {
  it("should print the absolute URL of a shared file", async () => {
    const { fetchFn, uploaded } = createFakeServer();
    const { io, out, err } = createIO();

    const code = await runShare(["sha1-aaa"], config, io, fetchFn);

    expect(code).toBe(0);
    expect(err).toEqual([]);
    expect(out).toHaveLength(1);
    expect(out[0]).toMatch(/^https:\/\/blobs\.example\.com\/share\/sha1-aaa\?via=sha224-[0-9a-f]{56}&assemble=1$/);
    expect(uploaded).toHaveLength(1);
  });

  it("should authenticate every request", async () => {
    const { fetchFn } = createFakeServer();

    await runShare(["sha1-aaa/"], config, createIO().io, fetchFn);

    for (const [, init] of fetchFn.mock.calls) {
      expect(new Headers(init?.headers).get("Authorization")).toBe("Token test-token");
    }
  });

  it("should upload set, directory and claim for several items", async () => {
    const { fetchFn, uploaded } = createFakeServer();
    const { io, out } = createIO();

    const code = await runShare(["sha1-aaa", "sha1-bbb/"], config, io, fetchFn);

    expect(code).toBe(0);
    expect(uploaded).toHaveLength(3);
    expect(out[0]).toBe(`${SERVER}/share/${uploaded[2]}`);
  });

  it("should report share failures", async () => {
    const { fetchFn, uploaded } = createFakeServer({ failSigning: true });
    const { io, out, err } = createIO();

    const code = await runShare(["sha1-aaa"], config, io, fetchFn);

    expect(code).toBe(1);
    expect(out).toEqual([]);
    expect(err).toEqual(["[CLI] Could not get signed share claim: Failed to sign: 500"]);
    expect(uploaded).toEqual([]);
  });

  it("should report invalid items without contacting the server", async () => {
    const { fetchFn } = createFakeServer();
    const { io, err } = createIO();

    const code = await runShare(["not-a-ref!"], config, io, fetchFn);

    expect(code).toBe(1);
    expect(err).toEqual(['[CLI] Cannot share "not-a-ref!", not a valid blobRef']);
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it("should take the UI root from the server when none is configured", async () => {
    const { fetchFn } = createFakeServer({ uiRoot: "/app/" });
    const { io, out, err } = createIO();

    const code = await runShare(["sha1-aaa/"], { ...config, uiRoot: undefined }, io, fetchFn);

    expect(code).toBe(0);
    expect(err).toEqual([]);
    expect(out[0]).toMatch(/^https:\/\/blobs\.example\.com\/share\/sha224-[0-9a-f]{56}$/);
    expect(fetchFn.mock.calls.filter(([, init]) => init?.method === undefined)).toHaveLength(1);
  });

  it("should fall back to the default UI root when the server names none", async () => {
    const { fetchFn } = createFakeServer({ uiRoot: "" });
    const { io, out } = createIO();

    const code = await runShare(["sha1-aaa/"], { ...config, uiRoot: undefined }, io, fetchFn);

    expect(code).toBe(0);
    expect(out[0]).toMatch(/^https:\/\/blobs\.example\.com\/share\/sha224-[0-9a-f]{56}$/);
  });

  it("should report a failed UI root lookup", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response("unavailable", { status: 503 }));
    const { io, err } = createIO();

    const code = await runShare(["sha1-aaa"], { ...config, uiRoot: undefined }, io, fetchFn);

    expect(code).toBe(1);
    expect(err).toEqual(["[CLI] Failed to discover server: 503"]);
  });

  it("should authenticate with the web UI config token", async () => {
    const { fetchFn } = createFakeServer();
    const { io, out } = createIO();
    const uiConfig = JSON.stringify({ shareRoot: "/share/", authToken: "ui-token", uiRoot: "/app/" });

    const code = await runShare(["sha1-aaa"], { ...config, auth: { type: "none" }, uiConfig }, io, fetchFn);

    expect(code).toBe(0);
    expect(out[0]).toMatch(/^https:\/\/blobs\.example\.com\/share\/sha1-aaa\?via=sha224-[0-9a-f]{56}&assemble=1$/);
    expect(fetchFn).toHaveBeenCalled();
    for (const [, init] of fetchFn.mock.calls) {
      expect(new Headers(init?.headers).get("Authorization")).toBe("Token ui-token");
    }
  });

  it("should refuse a web UI config without share handler", async () => {
    const { fetchFn } = createFakeServer();
    const { io, err } = createIO();
    const uiConfig = JSON.stringify({ authToken: "ui-token", uiRoot: "/app/" });

    const code = await runShare(["sha1-aaa"], { ...config, uiConfig }, io, fetchFn);

    expect(code).toBe(1);
    expect(err).toEqual(["[CLI] Server has no share handler"]);
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it("should reject a web UI config that is not JSON", async () => {
    const { io, err } = createIO();

    const code = await runShare(["sha1-aaa"], { ...config, uiConfig: "{" }, io);

    expect(code).toBe(1);
    expect(err).toEqual(["[CLI] Config is not valid JSON"]);
  });

  it("should require a server", async () => {
    const { io, err } = createIO();

    const code = await runShare(["sha1-aaa"], { ...config, server: undefined }, io);

    expect(code).toBe(1);
    expect(err).toEqual(["[CLI] No server configured: pass --server or set BLOBSHARE_SERVER"]);
  });
});

describe("runParseConfig", () => {
  it("should print the sharing fields", () => {
    const { io, out } = createIO();

    const code = runParseConfig('{"shareRoot":"/share/","authToken":"test-token","uiRoot":"/ui/"}', io);

    expect(code).toBe(0);
    expect(out).toEqual(["shareRoot: /share/", "uiRoot: /ui/", "authToken: (set)"]);
  });

  it("should report a server without share handler", () => {
    const { io, err } = createIO();

    const code = runParseConfig('{"authToken":"","uiRoot":"/ui/"}', io);

    expect(code).toBe(1);
    expect(err).toEqual(["[CLI] Server has no share handler"]);
  });

  it("should reject invalid JSON", () => {
    const { io, err } = createIO();

    expect(runParseConfig("{", io)).toBe(1);
    expect(err).toEqual(["[CLI] Config is not valid JSON"]);
  });
});
