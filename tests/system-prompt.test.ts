import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { buildSystemPrompt, detectRuntime, loadContextFiles } from "../src/system-prompt.js";

test("lists registered tools with their summaries", () => {
  const prompt = buildSystemPrompt({
    workspaceDir: "/work",
    runtime: detectRuntime("anthropic", "test-model"),
    toolNames: ["read", "geotech_seepage", "custom_tool"],
    contextFiles: [],
  });
  const lines = prompt.split("\n");
  assert.ok(lines.includes("- read: Read file contents"));
  assert.ok(lines.includes("- geotech_seepage: Darcy velocity and flow rate, critical hydraulic gradient and piping check"));
  assert.ok(lines.includes("- custom_tool"));
  assert.ok(lines.includes("Your working directory is: /work"));
  assert.ok(lines.some((line) => line.startsWith("Runtime: ") && line.endsWith("| thinking=off")));
});

test("appends loaded context files", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "geoformula-ctx-"));
  fs.writeFileSync(path.join(dir, "CONTEXT.md"), "Site: test embankment\n");
  try {
    const contextFiles = loadContextFiles(dir);
    assert.deepEqual(contextFiles, [{ path: "CONTEXT.md", content: "Site: test embankment" }]);
    const prompt = buildSystemPrompt({
      workspaceDir: dir,
      runtime: detectRuntime("anthropic", "test-model"),
      toolNames: [],
      contextFiles,
      thinkingLevel: "on",
    });
    const lines = prompt.split("\n");
    assert.ok(lines.includes("## CONTEXT.md"));
    assert.ok(lines.includes("Site: test embankment"));
    assert.ok(lines.some((line) => line.startsWith("Runtime: ") && line.endsWith("| thinking=on")));
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});
