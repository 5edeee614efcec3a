const SECRET_KEYS: readonly string[] = [
  "TELEGRAM_BOT_TOKEN",
  "TELEGRAM_API_HASH",
  "TELEGRAM_SESSION",
  "STT_API_KEY",
  "LLM_API_KEY",
];

export function redactConfigSnapshot(obj: unknown): unknown {
  // replaces known secret values anywhere in the tree; unset secrets stay unset
  const seen = new WeakSet<object>();

  function walk(v: unknown): unknown {
    if (v && typeof v === "object") {
      if (seen.has(v)) return v;
      seen.add(v);

      if (Array.isArray(v)) return v.map(walk);

      const out: Record<string, unknown> = {};
      for (const [k, val] of Object.entries(v)) {
        if (SECRET_KEYS.includes(k)) out[k] = val === undefined || val === "" ? val : "<redacted>";
        else out[k] = walk(val);
      }
      return out;
    }
    return v;
  }

  return walk(obj);
}
