import fs from "node:fs";
import os from "node:os";
import path from "node:path";

const DEPRECATED_KEYS = ["OPENROUTER_API_KEY", "OPENROUTER_MODEL", "DEEPINFRA_API_KEY", "FFMPEG_BIN"] as const;

const emptyDotenvPath = path.join(os.tmpdir(), "mediascribe-vitest-empty.env");
if (!fs.existsSync(emptyDotenvPath)) {
  fs.writeFileSync(emptyDotenvPath, "", "utf8");
}

process.env.DOTENV_CONFIG_PATH = emptyDotenvPath;
process.env.DOTENV_CONFIG_OVERRIDE = "false";

for (const key of DEPRECATED_KEYS) {
  if (process.env[key] !== undefined) {
    delete process.env[key];
  }
}

process.env.DATA_ROOT = path.join(os.tmpdir(), "mediascribe-vitest-data");
process.env.LOG_LEVEL = "error";
process.env.NODE_ENV = "test";
