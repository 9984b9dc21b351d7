import { afterEach, describe, it, expect } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { run, type Output } from "../src/commands.js";

const INDEX_PATH = join(import.meta.dirname, "fixtures/index/spec-index.json");

const tempRoots: string[] = [];

function createTempDir(): string {
  const dir = mkdtempSync(join(tmpdir(), "trace-audit-cli-"));
  tempRoots.push(dir);
  return dir;
}

function writeJson(file: string, data: unknown): void {
  mkdirSync(dirname(file), { recursive: true });
  writeFileSync(file, JSON.stringify(data), "utf-8");
}

function capture(): Output & { text: () => string } {
  const chunks: string[] = [];
  return {
    write: (text: string) => {
      chunks.push(text);
    },
    text: () => chunks.join(""),
  };
}

function artifactAt(coverage: number) {
  return {
    items: [],
    forward: {},
    backward: {},
    metrics: { requirement: { total: 100, with_links: coverage, coverage_pct: coverage } },
  };
}

afterEach(() => {
  for (const dir of tempRoots.splice(0)) rmSync(dir, { recursive: true, force: true });
});

describe("check", () => {
  it("exits 1 when the artifact is missing", async () => {
    const root = createTempDir();
    expect(await run(["check", "--root", root], capture())).toBe(1);
  });

  it("exits 2 below the threshold", async () => {
    const root = createTempDir();
    writeJson(join(root, "build/traceability.json"), artifactAt(85));
    const out = capture();
    expect(await run(["check", "--root", root, "--min-req", "90"], out)).toBe(2);
    expect(out.text()).toBe("Requirement linkage coverage 85.00% < threshold 90.00%\n");
  });

  it("exits 0 at or above the threshold", async () => {
    const root = createTempDir();
    writeJson(join(root, "build/traceability.json"), artifactAt(92));
    expect(await run(["check", "--root", root], capture())).toBe(0);
  });

  it("takes the default minimum from the config file", async () => {
    const root = createTempDir();
    writeJson(join(root, "build/traceability.json"), artifactAt(85));
    writeFileSync(join(root, "trace-audit.yaml"), "minRequirementCoverage: 80\n", "utf-8");
    expect(await run(["check", "--root", root], capture())).toBe(0);
  });

  it("exits 1 for a blank minimum", async () => {
    const root = createTempDir();
    writeJson(join(root, "build/traceability.json"), artifactAt(10));
    expect(await run(["check", "--root", root, "--min-req", ""], capture())).toBe(1);
  });

  it("exits 1 for a minimum outside 0 to 100", async () => {
    const root = createTempDir();
    writeJson(join(root, "build/traceability.json"), artifactAt(92));
    expect(await run(["check", "--root", root, "--min-req", "120"], capture())).toBe(1);
    expect(await run(["check", "--root", root, "--min-req=-5"], capture())).toBe(1);
  });

  it("passes an artifact with extra metric entries", async () => {
    const root = createTempDir();
    const artifact = artifactAt(95);
    writeJson(join(root, "build/traceability.json"), {
      ...artifact,
      metrics: { ...artifact.metrics, generated: { note: "nightly" } },
    });
    expect(await run(["check", "--root", root, "--min-req", "90"], capture())).toBe(0);
  });

  it("exits 1 for a non-numeric minimum", async () => {
    const root = createTempDir();
    expect(await run(["check", "--root", root, "--min-req", "lots"], capture())).toBe(1);
  });
});

describe("graph", () => {
  it("writes the artifact from an index", async () => {
    const root = createTempDir();
    const out = join(root, "out/traceability.json");
    expect(await run(["graph", "--root", root, "--index", INDEX_PATH, "--out", out], capture())).toBe(0);
    const artifact = JSON.parse(readFileSync(out, "utf-8"));
    expect(artifact.metrics.requirement.coverage_pct).toBe(50);
    expect(await run(["check", "--root", root, "--artifact", out], capture())).toBe(2);
  });

  it("exits 1 when the index is missing", async () => {
    const root = createTempDir();
    expect(await run(["graph", "--root", root], capture())).toBe(1);
    expect(existsSync(join(root, "build/traceability.json"))).toBe(false);
  });

  it("exits 1 for a malformed index", async () => {
    const root = createTempDir();
    writeJson(join(root, "build/spec-index.json"), { items: "none" });
    expect(await run(["graph", "--root", root], capture())).toBe(1);
  });
});

describe("scan", () => {
  it("writes reports and exits 0 even with orphans", async () => {
    const root = createTempDir();
    writeFileSync(join(root, "qa.md"), "QA-SC-010 no requirement here\n", "utf-8");
    const out = capture();
    expect(await run(["scan", root], out)).toBe(0);
    expect(readFileSync(join(root, "reports/orphans.md"), "utf-8")).toContain(
      "## scenarios_no_req\n- QA-SC-010\n"
    );
    expect(out.text()).toContain("Orphans: 1\n");
  });
});

describe("run", () => {
  it("prints usage and exits 1 without a command", async () => {
    const out = capture();
    expect(await run([], out)).toBe(1);
    expect(out.text()).toContain("Usage: trace-audit <command>");
  });

  it("exits 1 for an unknown command", async () => {
    expect(await run(["frobnicate"], capture())).toBe(1);
  });

  it("exits 1 when the config file is invalid", async () => {
    const root = createTempDir();
    writeFileSync(join(root, "trace-audit.yaml"), "keyScheme: short\n", "utf-8");
    expect(await run(["check", "--root", root], capture())).toBe(1);
  });
});
