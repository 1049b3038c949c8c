#!/usr/bin/env node
/**
 * geoformula: terminal agent for geotechnical calculations.
 *
 * Opens a PI SDK session with the geotech_* tools registered and answers
 * questions in a REPL.
 */
import {
  ensureDirs,
  ensureApiKeyInEnv,
  resolveModelAndAuth,
  resolveSessionFile,
  applySystemPromptToSession,
  extractAssistantText,
  extractToolCalls,
  withSession,
  nextThinkingLevel,
  sdkThinkingLevel,
  type ThinkingLevel,
  DEFAULT_PROVIDER,
  DEFAULT_MODEL,
  AGENT_DIR,
  ENV_KEY_MAP,
} from "./shared.js";

import readline from "node:readline/promises";
import { stdin, stdout } from "node:process";
import {
  createAgentSession,
  SessionManager,
  SettingsManager,
} from "@mariozechner/pi-coding-agent";
import { streamSimple } from "@mariozechner/pi-ai";
import {
  buildSystemPrompt,
  detectRuntime,
  loadContextFiles,
} from "./system-prompt.js";
import { createAllToolDefinitions } from "./tools/index.js";
import { isGeotechError } from "./errors.js";

// ─── Custom tools ────────────────────────────────────────────────────────────

// Plain JSON-schema tool objects; the SDK's ToolDefinition expects TypeBox schemas.
function buildCustomTools(): any[] {
  return createAllToolDefinitions();
}

// ─── Output ──────────────────────────────────────────────────────────────────

const dim = (text: string) => `\x1b[2m${text}\x1b[0m`;
const red = (text: string) => `\x1b[31m${text}\x1b[0m`;

// ─── REPL ────────────────────────────────────────────────────────────────────

async function main() {
  ensureDirs();

  const provider = DEFAULT_PROVIDER;
  const modelId = DEFAULT_MODEL;
  const workspaceDir = process.cwd();
  let sessionId = `geo-${Date.now()}`;
  let sessionFile = resolveSessionFile(sessionId);
  let thinkingLevel: ThinkingLevel = "off";

  if (!ensureApiKeyInEnv(provider)) {
    const envKey = ENV_KEY_MAP[provider]?.[0] ?? `${provider.toUpperCase()}_API_KEY`;
    console.error(`No API key found for ${provider}.`);
    console.error(`Set ${envKey} in the environment or in .env.`);
    process.exit(1);
  }

  const { model, authStorage, modelRegistry } = resolveModelAndAuth(provider, modelId);

  const runtime = detectRuntime(provider, modelId);
  const contextFiles = loadContextFiles(workspaceDir);
  const customTools = buildCustomTools();
  const customToolNames = createAllToolDefinitions().map((t) => t.name);

  const builtInToolNames = ["read", "bash", "edit", "write"];
  const allToolNames = [...builtInToolNames, ...customToolNames];

  console.log(dim("┌ geoformula"));
  console.log(dim(`│ model: ${provider}/${modelId}`));
  console.log(dim(`│ workspace: ${workspaceDir}`));
  console.log(dim(`│ session: ${sessionId}`));
  console.log(
    dim(`│ context: ${contextFiles.length > 0 ? contextFiles.map((f) => f.path).join(", ") : "none"}`),
  );
  console.log(dim(`│ tools: ${customToolNames.join(", ")}`));
  console.log(dim("└ /new /think /model /status /quit"));
  console.log();

  const rl = readline.createInterface({ input: stdin, output: stdout });

  while (true) {
    let input: string;
    try {
      input = await rl.question("\x1b[1m> \x1b[0m");
    } catch {
      break; // EOF
    }

    const trimmed = input.trim();
    if (!trimmed) continue;

    // Slash commands
    if (trimmed === "/quit" || trimmed === "/exit") break;
    if (trimmed === "/new") {
      sessionId = `geo-${Date.now()}`;
      sessionFile = resolveSessionFile(sessionId);
      console.log(dim(`New session: ${sessionId}`) + "\n");
      continue;
    }
    if (trimmed.startsWith("/model")) {
      console.log(dim(`Current: ${provider}/${modelId}`));
      console.log(dim("Change via GEOFORMULA_PROVIDER and GEOFORMULA_MODEL env vars.") + "\n");
      continue;
    }
    if (trimmed === "/think" || trimmed.startsWith("/think ")) {
      thinkingLevel = nextThinkingLevel(thinkingLevel, trimmed.slice("/think".length));
      console.log(dim(`Thinking: ${thinkingLevel}`) + "\n");
      continue;
    }
    if (trimmed === "/status") {
      console.log(dim(`Model: ${provider}/${modelId}`));
      console.log(dim(`Session: ${sessionId}`));
      console.log(dim(`Thinking: ${thinkingLevel}`));
      console.log(dim(`Workspace: ${workspaceDir}`) + "\n");
      continue;
    }

    const startTime = Date.now();
    try {
      const sessionManager = SessionManager.open(sessionFile);
      const settingsManager = SettingsManager.create(workspaceDir, AGENT_DIR);

      const systemPrompt = buildSystemPrompt({
        workspaceDir,
        runtime,
        toolNames: allToolNames,
        contextFiles,
        thinkingLevel,
      });

      const createSession = async () => {
        const { session } = await createAgentSession({
          cwd: workspaceDir,
          agentDir: AGENT_DIR,
          authStorage,
          modelRegistry,
          model,
          thinkingLevel: sdkThinkingLevel(thinkingLevel),
          customTools,
          sessionManager,
          settingsManager,
        });
        return session;
      };

      await withSession(createSession, async (session) => {
        applySystemPromptToSession(session, systemPrompt);
        session.agent.streamFn = streamSimple;

        await session.prompt(trimmed);

        const agentError = session.agent.state.error;
        if (agentError) {
          console.error(red(`Agent error: ${agentError}`));
        }

        const toolCalls = extractToolCalls(session.messages);
        if (toolCalls.length > 0) {
          console.log(dim(`[tools: ${toolCalls.join(", ")}]`));
        }

        const text = session.getLastAssistantText() ?? extractAssistantText(session.messages);
        if (text) {
          console.log(text);
        }

        const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
        console.log(dim(`(${elapsed}s)`) + "\n");
      });
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      const prefix = isGeotechError(err) ? err.code : "Error";
      console.error(red(`${prefix}: ${message}`));
      if (err instanceof Error && err.cause) {
        console.error(dim(String(err.cause)));
      }
      console.log();
    }
  }

  rl.close();
  console.log(dim("Bye."));
  process.exit(0);
}

main().catch((err: unknown) => {
  console.error("Fatal:", err);
  process.exit(1);
});
