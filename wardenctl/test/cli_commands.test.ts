import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { list } from "../src/commands/list.js";
import { search } from "../src/commands/search.js";
import { info } from "../src/commands/info.js";
import { install } from "../src/commands/install.js";
import { update } from "../src/commands/update.js";
import { doctor } from "../src/commands/doctor.js";
import { history, verify } from "../src/commands/audit.js";
import { EXIT } from "../src/commands/exit-codes.js";
import type { CommonOptions } from "../src/commands/context.js";
import type { ProcessRunner } from "../src/installer/process.js";
import type { FetchLike } from "../src/types/http.js";
import { BUNDLED_REGISTRY_PATH } from "../src/paths.js";
import { captureStream } from "./fixtures.js";

const REMOTE = "https://registry.example.test/packages.json";

describe("wardenctl commands", () => {
  let tmpDir: string;
  let env: NodeJS.ProcessEnv;
  let runner: Mock<ProcessRunner>;
  let out: ReturnType<typeof captureStream>;
  let err: ReturnType<typeof captureStream>;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "warden-cli-"));
    env = {
      WARDEN_REGISTRY__CACHE_PATH: path.join(tmpDir, "cache", "packages.json"),
      WARDEN_AUDIT__DIR: path.join(tmpDir, "audit"),
    };
    runner = vi.fn<ProcessRunner>(async () => ({ kind: "exited", exitCode: 0, stdout: "Successfully installed\n", stderr: "", timedOut: false }));
    out = captureStream();
    err = captureStream();
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function opts(extra: Partial<CommonOptions> = {}): CommonOptions {
    return { processEnv: env, cwd: tmpDir, stdout: out.stream, stderr: err.stream, runner, ...extra };
  }

  function auditLines(): string[] {
    const file = path.join(tmpDir, "audit", "audit.jsonl");
    return fs.existsSync(file) ? fs.readFileSync(file, "utf8").trim().split("\n") : [];
  }

  describe("list / search / info", () => {
    it("lists the bundled registry", async () => {
      const res = await list(opts());

      expect(res.exitCode).toBe(EXIT.SUCCESS);
      expect(out.lines()).toHaveLength(6);
      expect(out.lines()[0]).toBe(
        "ledger-mcp [pip] trust=0.95 (compliant, verified) - MCP server exposing an append-only ledger of agent actions",
      );
      expect(out.lines()[4]).toBe("quick-shell [pip] trust=0.2 (non-compliant, unverified) - Unreviewed shell helper for agents");
      expect(err.text()).toBe("");
    });

    it("lists as jsonl", async () => {
      await list(opts({ format: "jsonl" }));
      const rows = out.lines().map((l) => JSON.parse(l));
      expect(rows.map((r) => r.name)).toEqual(["ledger-mcp", "intent-kit", "agent-mesh", "prompt-scrubber", "quick-shell", "vector-cache"]);
      expect(rows[2]).toMatchObject({ ecosystem: "npm", target: "@agent-mesh/client", trust_score: 0.82 });
    });

    it("searches names and descriptions", async () => {
      const res = await search("AGENT", opts({ format: "jsonl" }));
      expect(res.exitCode).toBe(EXIT.SUCCESS);
      expect(out.lines().map((l) => JSON.parse(l).name)).toEqual(["ledger-mcp", "intent-kit", "agent-mesh", "quick-shell"]);
    });

    it("exits 0 when nothing matches", async () => {
      const res = await search("zzz", opts());
      expect(res.exitCode).toBe(EXIT.SUCCESS);
      expect(out.text()).toBe("No packages match 'zzz'\n");
    });

    it("shows a record with its policy verdict", async () => {
      const res = await info("Quick-Shell", opts());
      expect(res.exitCode).toBe(EXIT.SUCCESS);
      expect(out.lines()).toContain("Policy:       deny (not compliant; not verified; trust score 0.2 below threshold 0.5)");
    });

    it("shows the MCP launch hint", async () => {
      await info("ledger-mcp", opts());
      expect(out.lines()).toContain("MCP server:   ledger-mcp --stdio");
      expect(out.lines()).toContain("Policy:       pass");
    });

    it("exits NOT_FOUND for an unknown package", async () => {
      const res = await info("Nope", opts());
      expect(res.exitCode).toBe(EXIT.NOT_FOUND);
      expect(err.text()).toBe("[error] Package 'nope' not found\n");
    });

    it("exits INVALID_ARGS on an invalid config", async () => {
      env.WARDEN_MIN_TRUST = "7";
      const res = await list(opts());
      expect(res.exitCode).toBe(EXIT.INVALID_ARGS);
      expect(err.text()).toMatch(/^\[error\] Config invalid: /);
    });
  });

  describe("install", () => {
    it("installs a passing package and audits it", async () => {
      const res = await install(["ledger-mcp"], opts());

      expect(res.exitCode).toBe(EXIT.SUCCESS);
      expect(runner).toHaveBeenCalledWith("python3", ["-m", "pip", "install", "ledger-mcp-server"], { timeoutMs: 600_000, cwd: tmpDir });
      expect(out.lines()).toEqual([
        "Installing ledger-mcp via pip: ledger-mcp-server",
        "ok ledger-mcp: Installed ledger-mcp (pip: ledger-mcp-server)",
        "  MCP server: ledger-mcp --stdio",
      ]);
      expect(auditLines()).toHaveLength(1);
      expect(JSON.parse(auditLines()[0])).toMatchObject({ seq: 1, package: "ledger-mcp", outcome: "installed", actor: "wardenctl" });
    });

    it("maps outcomes to exit codes", async () => {
      expect((await install(["quick-shell"], opts())).exitCode).toBe(EXIT.POLICY_DENIED);
      expect((await install(["vector-cache"], opts())).exitCode).toBe(EXIT.UNSUPPORTED_ECOSYSTEM);
      expect((await install(["ledger-mcp", "nope", "quick-shell"], opts())).exitCode).toBe(EXIT.NOT_FOUND);
      expect(auditLines()).toHaveLength(5);
    });

    it("reports installer output on failure", async () => {
      runner.mockImplementation(async () => ({ kind: "exited", exitCode: 1, stdout: "", stderr: "ERROR: boom\n", timedOut: false }));

      const res = await install(["intent-kit"], opts());

      expect(res.exitCode).toBe(EXIT.INSTALL_FAILED);
      expect(out.lines()).toContain("FAILED intent-kit: Install of intent-kit failed with exit code 1");
      expect(out.lines()).toContain("  | ERROR: boom");
    });

    it("rejects an out-of-range --min-trust", async () => {
      const res = await install(["ledger-mcp"], { ...opts(), minTrust: 1.5 });
      expect(res.exitCode).toBe(EXIT.INVALID_ARGS);
      expect(err.text()).toBe("[error] --min-trust must be within [0, 1], got 1.5\n");
      expect(auditLines()).toEqual([]);
    });

    it("records the actor and per-run threshold", async () => {
      const res = await install(["agent-mesh"], { ...opts({ format: "jsonl" }), minTrust: 0.9, actor: "ci-bot" });

      expect(res.exitCode).toBe(EXIT.POLICY_DENIED);
      const result = JSON.parse(out.lines()[out.lines().length - 1]);
      expect(result).toMatchObject({ package: "agent-mesh", outcome: "policy_denied", exit_code: 2, reasons: ["trust score 0.82 below threshold 0.9"] });
      expect(JSON.parse(auditLines()[0]).actor).toBe("ci-bot");
    });

    it("exits AUDIT_FAILED when the audit trail cannot be written", async () => {
      fs.writeFileSync(path.join(tmpDir, "blocker"), "");
      env.WARDEN_AUDIT__DIR = path.join(tmpDir, "blocker", "audit");

      const res = await install(["ledger-mcp"], opts());

      expect(res.exitCode).toBe(EXIT.AUDIT_FAILED);
      expect(runner).toHaveBeenCalledTimes(1);
      expect(err.text()).toMatch(/^\[error\] audit write failed: /);
    });
  });

  describe("update", () => {
    it("refreshes the cache from the remote registry", async () => {
      env.WARDEN_REGISTRY__REMOTE_URL = REMOTE;
      const doc = {
        schema_version: "1.0.0",
        packages: [{ name: "fresh-tool", description: "New", ecosystem: "npm", compliant: true, verified: true, trust_score: 0.7 }],
      };
      const fetchImpl = vi.fn<FetchLike>(async () => new Response(JSON.stringify(doc), { status: 200 }));
      const cachePath = path.join(tmpDir, "cache", "packages.json");

      const res = await update(opts({ fetchImpl }));

      expect(res.exitCode).toBe(EXIT.SUCCESS);
      expect(out.text()).toBe(`Registry updated from ${REMOTE}: 1 package(s) written to ${cachePath}\n`);

      const after = captureStream();
      await list({ ...opts(), stdout: after.stream });
      expect(after.lines()).toEqual(["fresh-tool [npm] trust=0.7 (compliant, verified) - New"]);
    });

    it("exits 1 without a remote URL", async () => {
      const res = await update(opts());
      expect(res.exitCode).toBe(1);
      expect(err.text()).toBe("[error] No registry.remote_url configured\n");
    });
  });

  describe("doctor", () => {
    it("passes when everything is in place", async () => {
      const res = await doctor({ ...opts(), which: () => "/usr/bin/stub" });

      expect(res.exitCode).toBe(EXIT.SUCCESS);
      expect(out.lines()).toEqual([
        "[ok] config: min_trust=0.5",
        "[ok] schemas: audit-record, config, registry",
        `[ok] registry: 6 package(s) from bundled (${BUNDLED_REGISTRY_PATH})`,
        "[ok] installer:pip: /usr/bin/stub",
        "[ok] installer:npm: /usr/bin/stub",
        `[ok] audit: ${path.join(tmpDir, "audit")} writable`,
        "[ok] intent: not configured (checks are skipped)",
      ]);
    });

    it("fails when an installer is missing", async () => {
      const res = await doctor({ ...opts(), which: (cmd) => (cmd === "npm" ? "/usr/bin/npm" : null) });
      expect(res.exitCode).toBe(1);
      expect(out.lines()).toContain("[fail] installer:pip: 'python3' not found on PATH");
    });

    it("probes the intent health URL", async () => {
      env.WARDEN_INTENT__ENDPOINT = "http://127.0.0.1:11434/api/generate";
      env.WARDEN_INTENT__HEALTH_URL = "http://127.0.0.1:11434/api/tags";
      const fetchImpl = vi.fn<FetchLike>(async () => new Response("", { status: 500 }));

      const res = await doctor({ ...opts({ fetchImpl }), which: () => "/usr/bin/stub" });

      expect(res.exitCode).toBe(1);
      expect(out.lines()).toContain("[fail] intent: http://127.0.0.1:11434/api/tags returned HTTP 500");
    });
  });

  describe("audit", () => {
    beforeEach(async () => {
      await install(["ledger-mcp"], opts());
      await install(["quick-shell"], opts());
      out = captureStream();
      err = captureStream();
    });

    it("prints history oldest first", async () => {
      const res = await history(opts({ format: "jsonl" }));
      expect(res.exitCode).toBe(EXIT.SUCCESS);
      expect(out.lines().map((l) => JSON.parse(l).package)).toEqual(["ledger-mcp", "quick-shell"]);
    });

    it("filters by outcome and shows the denial reasons", async () => {
      await history({ ...opts(), outcome: "policy_denied" });
      expect(out.lines()).toHaveLength(1);
      expect(out.lines()[0]).toMatch(
        /^#2 \S+ wardenctl quick-shell policy_denied \(not compliant; not verified; trust score 0\.2 below threshold 0\.5\)$/,
      );
    });

    it("keeps the most recent records with --limit", async () => {
      await history({ ...opts({ format: "jsonl" }), limit: 1 });
      expect(out.lines().map((l) => JSON.parse(l).seq)).toEqual([2]);
    });

    it("rejects an unknown outcome", async () => {
      const res = await history({ ...opts(), outcome: "exploded" });
      expect(res.exitCode).toBe(EXIT.INVALID_ARGS);
    });

    it("verifies the chain", async () => {
      const res = await verify(opts());
      expect(res.exitCode).toBe(EXIT.SUCCESS);
      expect(out.text()).toBe("Audit trail intact: 2 record(s)\n");
    });

    it("fails verification after tampering", async () => {
      const file = path.join(tmpDir, "audit", "audit.jsonl");
      fs.writeFileSync(file, fs.readFileSync(file, "utf8").replace('"actor":"wardenctl"', '"actor":"someone-else"'));

      const res = await verify(opts());

      expect(res.exitCode).toBe(1);
      expect(err.text()).toBe(`[error] seq 1: hash mismatch\n`);
      expect(out.text()).toBe("Audit trail broken: 1 problem(s) in 2 record(s)\n");
    });
  });
});
