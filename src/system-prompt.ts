/**
 * System prompt builder for the geoformula agent: runtime details, project
 * context files and a summary line per registered tool.
 */
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

// ─── Context file loading ────────────────────────────────────────────────────

const CONTEXT_FILE_NAMES = [
  "CONTEXT.md",
  "INSTRUCTIONS.md",
  "INSTRUCTIONS.txt",
  ".geoformula/CONTEXT.md",
];

export type ContextFile = { path: string; content: string };

export function loadContextFiles(workspaceDir: string): ContextFile[] {
  const files: ContextFile[] = [];
  for (const name of CONTEXT_FILE_NAMES) {
    const filePath = path.join(workspaceDir, name);
    if (!fs.existsSync(filePath)) continue;
    const content = fs.readFileSync(filePath, "utf-8").trim();
    if (content) {
      files.push({ path: name, content });
    }
  }
  return files;
}

// ─── Runtime info ────────────────────────────────────────────────────────────

export type RuntimeInfo = {
  host: string;
  os: string;
  arch: string;
  node: string;
  shell: string;
  model: string;
  provider: string;
};

export function detectRuntime(provider: string, modelId: string): RuntimeInfo {
  return {
    host: os.hostname(),
    os: process.platform,
    arch: process.arch,
    node: process.version,
    shell: path.basename(process.env.SHELL ?? "bash"),
    model: modelId,
    provider,
  };
}

// ─── Tool summaries ──────────────────────────────────────────────────────────

const CORE_TOOL_SUMMARIES: Record<string, string> = {
  // Built-in
  read: "Read file contents",
  write: "Create or overwrite files",
  edit: "Make precise edits to files",
  bash: "Run shell commands",
  // Geotechnical
  geotech_earth_pressure: "Rankine/Coulomb/at-rest earth pressure coefficients, base pressures and wall forces",
  geotech_bearing_capacity: "Terzaghi factors Nc/Nq/Ngamma, ultimate and allowable bearing capacity (strip/square/circular)",
  geotech_settlement: "Layer settlement (av, Es, Cc, elastic), consolidation time factor, degree and time to degree",
  geotech_seepage: "Darcy velocity and flow rate, critical hydraulic gradient and piping check",
  geotech_soil_phase: "Void ratio/porosity, saturation, water content, densities and unit weights",
};

// ─── System prompt builder ───────────────────────────────────────────────────

export function buildSystemPrompt(params: {
  workspaceDir: string;
  runtime: RuntimeInfo;
  toolNames: string[];
  contextFiles: ContextFile[];
  thinkingLevel?: string;
  now?: Date;
}): string {
  const { workspaceDir, runtime, toolNames, contextFiles, thinkingLevel } = params;

  const toolLines = toolNames.map((name) => {
    const summary = CORE_TOOL_SUMMARIES[name];
    return summary ? `- ${name}: ${summary}` : `- ${name}`;
  });

  const userTimezone = Intl.DateTimeFormat().resolvedOptions().timeZone;
  const currentTime = (params.now ?? new Date()).toLocaleString("en-US", {
    timeZone: userTimezone,
    dateStyle: "full",
    timeStyle: "long",
  });

  const lines = [
    "You are geoformula, an assistant for geotechnical engineering calculations.",
    "You have tools for lateral earth pressure, shallow foundation bearing capacity, settlement and consolidation, seepage and piping, and soil phase relationships.",
    "Use the geotech_* tools for every number you report; do not estimate formula results by hand.",
    "Each tool computes one formula family for fully specified inputs. Sequence several calls when a design needs them, and state the units of every input and result.",
    "",
    "## Tooling",
    "Tool names are case-sensitive. Call tools exactly as listed.",
    toolLines.join("\n"),
    "",
    "## Errors",
    "A tool error means an input is outside its valid range (INVALID_INPUT) or the formula has no finite answer (DOMAIN_ERROR). Report it and ask for corrected inputs; never substitute a guessed value.",
    "",
    "## Workspace",
    `Your working directory is: ${workspaceDir}`,
    "",
    "## Current Date & Time",
    `Time zone: ${userTimezone}`,
    `Current time: ${currentTime}`,
    "",
  ];

  if (contextFiles.length > 0) {
    lines.push("# Project Context", "", "The following project context files have been loaded:", "");
    for (const file of contextFiles) {
      lines.push(`## ${file.path}`, "", file.content, "");
    }
  }

  const runtimeParts = [
    runtime.host ? `host=${runtime.host}` : "",
    runtime.os ? `os=${runtime.os} (${runtime.arch})` : "",
    runtime.node ? `node=${runtime.node}` : "",
    runtime.model ? `model=${runtime.provider}/${runtime.model}` : "",
    runtime.shell ? `shell=${runtime.shell}` : "",
    `thinking=${thinkingLevel ?? "off"}`,
  ].filter(Boolean);

  lines.push("## Runtime", `Runtime: ${runtimeParts.join(" | ")}`);

  return lines.join("\n");
}
