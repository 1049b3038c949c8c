/**
 * Shared setup code for the geoformula CLI (entry.ts): .env loading,
 * configuration, auth and model resolution.
 */
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import {
  AuthStorage,
  ModelRegistry,
  type createAgentSession,
} from "@mariozechner/pi-coding-agent";
import type { Api, Model } from "@mariozechner/pi-ai";
import type { AgentMessage } from "@mariozechner/pi-agent-core";

// ─── .env loading ────────────────────────────────────────────────────────────

export function loadDotEnv(envPath: string = path.join(process.cwd(), ".env")) {
  let content: string;
  try {
    content = fs.readFileSync(envPath, "utf-8");
  } catch {
    // No .env file
    return;
  }
  for (const [key, value] of parseDotEnv(content)) {
    if (!(key in process.env)) {
      process.env[key] = value;
    }
  }
}

export function parseDotEnv(content: string): Array<[string, string]> {
  const entries: Array<[string, string]> = [];
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eqIdx = trimmed.indexOf("=");
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    const value = trimmed.slice(eqIdx + 1).trim();
    if (key) entries.push([key, value]);
  }
  return entries;
}

// Load .env immediately so env vars are available for module-level constants
loadDotEnv();

// ─── Configuration ───────────────────────────────────────────────────────────

export const GEOFORMULA_HOME = path.join(os.homedir(), ".geoformula");
export const AGENT_ID = process.env.GEOFORMULA_AGENT ?? "main";
export const AGENT_DIR = path.join(GEOFORMULA_HOME, "agents", AGENT_ID, "agent");
export const MODELS_JSON = path.join(AGENT_DIR, "models.json");
export const AUTH_PROFILES_JSON = path.join(AGENT_DIR, "auth-profiles.json");
export const SESSION_DIR = path.join(GEOFORMULA_HOME, "state", "sessions");

export const DEFAULT_PROVIDER = process.env.GEOFORMULA_PROVIDER ?? "anthropic";
export const DEFAULT_MODEL = process.env.GEOFORMULA_MODEL ?? "claude-sonnet-4-20250514";

// ─── Ensure directories ─────────────────────────────────────────────────────

export function ensureDirs() {
  for (const dir of [GEOFORMULA_HOME, AGENT_DIR, SESSION_DIR]) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

// ─── Auth ────────────────────────────────────────────────────────────────────

export type AuthProfile = { type: string; provider: string; token?: string };
export type AuthProfiles = {
  profiles?: Record<string, AuthProfile>;
  lastGood?: Record<string, string>;
};

/** Picks the provider's token from auth-profiles.json content, preferring the last good profile. */
export function pickProfileToken(data: AuthProfiles, provider: string): string | undefined {
  const profiles = data.profiles ?? {};

  const lastGoodKey = data.lastGood?.[provider];
  const lastGood = lastGoodKey ? profiles[lastGoodKey] : undefined;
  if (lastGood?.token) {
    return lastGood.token;
  }

  for (const profile of Object.values(profiles)) {
    if (profile.provider === provider && profile.token) {
      return profile.token;
    }
  }
  return undefined;
}

function loadApiKeyFromProfiles(provider: string): string | undefined {
  let raw: string;
  try {
    raw = fs.readFileSync(AUTH_PROFILES_JSON, "utf-8");
  } catch {
    // No profiles written yet
    return undefined;
  }
  return pickProfileToken(parseAuthProfiles(raw), provider);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Reads auth-profiles.json content, keeping only well-formed profiles. */
export function parseAuthProfiles(raw: string): AuthProfiles {
  const data: unknown = JSON.parse(raw);
  if (!isRecord(data)) return {};

  const profiles: Record<string, AuthProfile> = {};
  if (isRecord(data.profiles)) {
    for (const [key, profile] of Object.entries(data.profiles)) {
      if (!isRecord(profile) || typeof profile.provider !== "string") continue;
      profiles[key] = {
        type: typeof profile.type === "string" ? profile.type : "api_key",
        provider: profile.provider,
        token: typeof profile.token === "string" ? profile.token : undefined,
      };
    }
  }

  const lastGood: Record<string, string> = {};
  if (isRecord(data.lastGood)) {
    for (const [provider, key] of Object.entries(data.lastGood)) {
      if (typeof key === "string") lastGood[provider] = key;
    }
  }

  return { profiles, lastGood };
}

export const ENV_KEY_MAP: Record<string, string[]> = {
  anthropic: ["ANTHROPIC_API_KEY"],
  openai: ["OPENAI_API_KEY"],
  google: ["GOOGLE_API_KEY", "GEMINI_API_KEY"],
  groq: ["GROQ_API_KEY"],
  xai: ["XAI_API_KEY"],
  mistral: ["MISTRAL_API_KEY"],
  openrouter: ["OPENROUTER_API_KEY"],
  cerebras: ["CEREBRAS_API_KEY"],
};

export function ensureApiKeyInEnv(provider: string): boolean {
  const envKeys = ENV_KEY_MAP[provider] ?? [`${provider.toUpperCase()}_API_KEY`];

  for (const envKey of envKeys) {
    if (process.env[envKey]) return true;
  }

  const apiKey = loadApiKeyFromProfiles(provider);
  if (apiKey && envKeys[0]) {
    process.env[envKeys[0]] = apiKey;
    return true;
  }

  return false;
}

// ─── Model resolution ────────────────────────────────────────────────────────

function resolveApiType(provider: string): string {
  const apiMap: Record<string, string> = {
    anthropic: "anthropic",
    openai: "openai-responses",
    google: "google",
    ollama: "ollama",
    groq: "openai",
    xai: "openai",
    mistral: "openai",
    openrouter: "openai",
    cerebras: "openai",
  };
  return apiMap[provider] ?? "openai";
}

export function resolveModelAndAuth(provider: string, modelId: string) {
  const authJsonPath = path.join(AGENT_DIR, "auth.json");
  const authStorage = new AuthStorage(authJsonPath);
  const modelRegistry = new ModelRegistry(authStorage, MODELS_JSON);

  let model = modelRegistry.find(provider, modelId) as Model<Api> | null;

  if (!model) {
    const apiType = resolveApiType(provider);
    model = {
      id: modelId,
      name: modelId,
      api: apiType,
      provider,
      input: ["text"],
      reasoning: true,
      cost: { input: 0, output: 0, cacheRead: 0, cacheWrite: 0 },
      contextWindow: 200_000,
      maxTokens: 64_000,
    } as Model<Api>;
  }

  return { model, authStorage, modelRegistry };
}

// ─── Session management ──────────────────────────────────────────────────────

export type AgentSession = Awaited<ReturnType<typeof createAgentSession>>["session"];

export function resolveSessionFile(sessionId: string): string {
  return path.join(SESSION_DIR, `${sessionId}.json`);
}

/** Runs `run` against a freshly created session and disposes it whether or not `run` throws. */
export async function withSession<S extends { dispose(): void }, T>(
  create: () => Promise<S>,
  run: (session: S) => Promise<T>,
): Promise<T> {
  const session = await create();
  try {
    return await run(session);
  } finally {
    session.dispose();
  }
}

// ─── Thinking level ──────────────────────────────────────────────────────────

export type ThinkingLevel = "off" | "on";

/** `/think on|off` sets the level; a bare `/think` or any other argument toggles it. */
export function nextThinkingLevel(current: ThinkingLevel, arg: string): ThinkingLevel {
  const normalized = arg.trim().toLowerCase();
  if (normalized === "off" || normalized === "on") return normalized;
  return current === "off" ? "on" : "off";
}

export function sdkThinkingLevel(level: ThinkingLevel) {
  return level === "off" ? ("off" as const) : ("medium" as const);
}

// ─── System prompt override ──────────────────────────────────────────────────

export function applySystemPromptToSession(session: AgentSession, systemPrompt: string) {
  session.agent.setSystemPrompt(systemPrompt);
  const mutable = session as unknown as {
    _baseSystemPrompt?: string;
    _rebuildSystemPrompt?: (toolNames: string[]) => string;
  };
  mutable._baseSystemPrompt = systemPrompt;
  mutable._rebuildSystemPrompt = () => systemPrompt;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

type ContentPart = { type: string; text?: unknown; name?: unknown };

function contentParts(msg: unknown, role: string): ContentPart[] | undefined {
  if (typeof msg !== "object" || msg === null) return undefined;
  if (!("role" in msg) || msg.role !== role || !("content" in msg)) return undefined;
  const content = msg.content;
  if (typeof content === "string") return [{ type: "text", text: content }];
  if (!Array.isArray(content)) return undefined;
  return content.filter(
    (part): part is ContentPart => typeof part === "object" && part !== null && typeof part.type === "string",
  );
}

export function extractAssistantText(messages: readonly AgentMessage[]): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    const parts = contentParts(messages[i], "assistant");
    if (!parts) continue;
    const text = parts
      .filter((part) => part.type === "text" && typeof part.text === "string")
      .map((part) => String(part.text))
      .join("");
    if (text) return text;
  }
  return "";
}

export function extractToolCalls(messages: readonly AgentMessage[]): string[] {
  const toolCalls: string[] = [];
  for (const msg of messages) {
    const parts = contentParts(msg, "assistant");
    if (!parts) continue;
    for (const part of parts) {
      if (part.type === "toolCall" || part.type === "tool_use") {
        toolCalls.push(typeof part.name === "string" ? part.name : "unknown");
      }
    }
  }
  return toolCalls;
}
