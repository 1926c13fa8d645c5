import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { validate, validateAll } from "../src/commands/validate.js";
import { AuditTrail } from "../src/audit/trail.js";
import { JsonlAuditStore } from "../src/audit/store.js";
import { BUNDLED_REGISTRY_PATH, DEFAULT_CONFIG_DIR } from "../src/paths.js";
import { captureStream, entry } from "./fixtures.js";

describe("wardenctl validate", () => {
  let tmpDir: string;
  let env: NodeJS.ProcessEnv;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "warden-validate-"));
    env = { WARDEN_REGISTRY__CACHE_PATH: path.join(tmpDir, "no-cache.json") };
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function configDir(files: Record<string, string>): string {
    const dir = path.join(tmpDir, "config");
    fs.mkdirSync(dir, { recursive: true });
    for (const [name, content] of Object.entries(files)) fs.writeFileSync(path.join(dir, name), content);
    return dir;
  }

  function codes(res: Awaited<ReturnType<typeof validateAll>>): string[] {
    return res.ok ? [] : res.errors.map((e) => e.code);
  }

  it("accepts the bundled config and registry", async () => {
    const res = await validateAll({ processEnv: env, cwd: tmpDir });

    expect(res.ok).toBe(true);
    if (res.ok) {
      expect(res.checked).toEqual([
        path.join(DEFAULT_CONFIG_DIR, "base.yaml"),
        path.join(DEFAULT_CONFIG_DIR, "strict.yaml"),
        BUNDLED_REGISTRY_PATH,
      ]);
    }
  });

  it("fails when the config dir is missing", async () => {
    const res = await validateAll({ config: "definitely-not-here", processEnv: env, cwd: tmpDir });
    expect(codes(res)).toEqual(["CONFIG_DIR_MISSING"]);
  });

  it("reports an unparseable layer", async () => {
    const dir = configDir({ "base.yaml": "min_trust: [\n" });
    const res = await validateAll({ config: dir, processEnv: env, cwd: tmpDir });
    expect(codes(res)).toEqual(["CONFIG_PARSE_ERROR"]);
  });

  it("reports an invalid merged config", async () => {
    const dir = configDir({ "base.yaml": "min_trust: 3\n" });
    const res = await validateAll({ config: dir, processEnv: env, cwd: tmpDir });
    expect(codes(res)).toEqual(["CONFIG_INVALID"]);
  });

  it("validates an explicit registry document", async () => {
    const file = path.join(tmpDir, "registry.json");
    fs.writeFileSync(file, JSON.stringify({ schema_version: "1.0.0", packages: [{ name: "x" }] }));

    const res = await validateAll({ registry: file, processEnv: env, cwd: tmpDir });

    expect(codes(res)).toEqual(["REGISTRY_INVALID"]);
  });

  describe("audit trails", () => {
    let auditDir: string;

    beforeEach(() => {
      auditDir = path.join(tmpDir, "audit");
      const trail = new AuditTrail(new JsonlAuditStore(auditDir));
      trail.record(entry());
      trail.record(entry({ package: "shady", outcome: "policy_denied" }));
    });

    it("accepts an intact trail", async () => {
      const res = await validateAll({ audit: auditDir, processEnv: env, cwd: tmpDir });
      expect(res.ok).toBe(true);
    });

    it("reports a broken chain", async () => {
      const file = path.join(auditDir, "audit.jsonl");
      fs.writeFileSync(file, fs.readFileSync(file, "utf8").replace('"package":"shady"', '"package":"benign"'));

      const res = await validateAll({ audit: auditDir, processEnv: env, cwd: tmpDir });

      expect(codes(res)).toEqual(["AUDIT_CHAIN_BROKEN"]);
      if (!res.ok) expect(res.errors[0].message).toBe("seq 2: hash mismatch");
    });

    it("reports lines that are not audit records", async () => {
      fs.appendFileSync(path.join(auditDir, "audit.jsonl"), "garbage\n");
      const res = await validateAll({ audit: auditDir, processEnv: env, cwd: tmpDir });
      expect(codes(res)).toEqual(["AUDIT_RECORD_INVALID", "AUDIT_CHAIN_BROKEN"]);
    });

    it("reports a missing trail", async () => {
      const res = await validateAll({ audit: path.join(tmpDir, "elsewhere"), processEnv: env, cwd: tmpDir });
      expect(codes(res)).toEqual(["AUDIT_MISSING"]);
    });
  });

  describe("command", () => {
    it("prints OK and exits 0", async () => {
      const out = captureStream();
      const res = await validate({ processEnv: env, cwd: tmpDir, stdout: out.stream });
      expect(res.exitCode).toBe(0);
      expect(out.text()).toBe("OK\n");
    });

    it("prints every error and exits 1", async () => {
      const dir = configDir({ "base.yaml": "min_trust: 3\n" });
      const err = captureStream();

      const res = await validate({ config: dir, processEnv: env, cwd: tmpDir, stderr: err.stream });

      expect(res.exitCode).toBe(1);
      expect(err.lines()).toHaveLength(1);
      expect(err.lines()[0]).toMatch(/^\[error\] Config invalid: /);
    });
  });
});
