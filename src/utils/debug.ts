// Lightweight, opt-in debug logging utilities for the engine + tests

// Topics can be enabled via the BLOCKFIT_DEBUG environment variable:
// "true", "1", "on" for everything, or a comma list of topics
//   e.g. BLOCKFIT_DEBUG=board,tray,drag
// setDebugTopics() overrides the environment (tests, embedding hosts).

let overrideTopics: ReadonlyArray<string> | null = null;

function parseTopics(raw: string | undefined): ReadonlyArray<string> {
  if (raw === undefined) return [];
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "on") return ["*"];
  return v
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function readEnvTopics(): ReadonlyArray<string> {
  try {
    return parseTopics(process.env["BLOCKFIT_DEBUG"]);
  } catch {
    return [];
  }
}

export function setDebugTopics(topics: ReadonlyArray<string> | null): void {
  overrideTopics = topics;
}

export function isDebugEnabled(topic?: string): boolean {
  const topics = overrideTopics ?? readEnvTopics();
  if (topics.length === 0) return false;
  if (topics.includes("*")) return true;
  if (topic !== undefined) return topics.includes(topic);
  return true;
}

export function debugLog(topic: string, message: string, data?: unknown): void {
  if (!isDebugEnabled(topic)) return;
  if (data !== undefined) {
    console.warn(`[DBG:${topic}] ${message}`, data);
  } else {
    console.warn(`[DBG:${topic}] ${message}`);
  }
}
