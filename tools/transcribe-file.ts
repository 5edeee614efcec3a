#!/usr/bin/env node
/**
 * Offline transcription of a local media file.
 *
 * Runs the same pipeline the bot does (extract, window, transcribe,
 * reconstruct timestamps, format) and writes the transcript files.
 *
 * Usage:
 *   tsx tools/transcribe-file.ts --file <path> [options]
 *
 * Options:
 *   --label <name>               Base name for output files (default: file name)
 *   --outDir <path>              Where transcripts go (default: DATA_ROOT/transcripts)
 *   --summary brief|detailed     Also write a summary
 *   --help
 */

// Load .env before anything reads config
import dotenv from "dotenv";
dotenv.config();

import { existsSync, mkdirSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { basename, extname, join, resolve } from "node:path";
import { cfg } from "../src/config/env.js";
import { resolveDataDir, sanitizeSegment } from "../src/dataPaths.js";
import { describeError } from "../src/errors.js";
import type { SummaryKind } from "../src/llm/prompts/summaryPrompts.js";
import { NoopProgress } from "../src/pipeline/progress.js";
import { runPipeline } from "../src/pipeline/runPipeline.js";
import { createConfiguredChat, pipelineSettingsFromConfig } from "../src/pipeline/settings.js";
import { getSttProvider } from "../src/stt/provider.js";
import { summarize } from "../src/summary/summarize.js";
import { configureLogger, log } from "../src/utils/logger.js";

const toolLog = log.withScope("pipeline");

interface CliArgs {
  file?: string;
  label?: string;
  outDir?: string;
  summary?: SummaryKind;
  help: boolean;
}

function printHelp(): void {
  console.log(`
Offline transcription

Usage:
  tsx tools/transcribe-file.ts --file <path> [options]

Options:
  --file <path>               Video or audio file to transcribe
  --label <name>              Base name for output files (default: file name)
  --outDir <path>             Output directory (default: DATA_ROOT/transcripts)
  --summary brief|detailed    Also write a summary of the transcript
  --help                      Show this help

Example:
  tsx tools/transcribe-file.ts --file ./lecture.mp4 --summary brief
`);
}

function assignFlag(args: CliArgs, flag: string, value: string | undefined): void {
  if (value === undefined) {
    throw new Error(`Missing value for --${flag}`);
  }
  switch (flag) {
    case "file":
      args.file = value;
      break;
    case "label":
      args.label = value;
      break;
    case "outDir":
      args.outDir = value;
      break;
    case "summary":
      if (value !== "brief" && value !== "detailed") {
        throw new Error(`--summary must be brief or detailed, got "${value}"`);
      }
      args.summary = value;
      break;
    default:
      throw new Error(`Unknown flag --${flag}`);
  }
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--help") {
      args.help = true;
      continue;
    }

    // --flag=value
    const eq = arg.indexOf("=");
    if (arg.startsWith("--") && eq > 0) {
      assignFlag(args, arg.slice(2, eq), arg.slice(eq + 1));
      continue;
    }

    // --flag value
    if (arg.startsWith("--")) {
      assignFlag(args, arg.slice(2), argv[i + 1]);
      i++;
      continue;
    }

    throw new Error(`Unexpected argument: ${arg}`);
  }

  return args;
}

async function main(): Promise<number> {
  configureLogger(cfg.logging);
  const args = parseArgs(process.argv.slice(2));
  if (args.help || !args.file) {
    printHelp();
    return args.help ? 0 : 1;
  }

  const file = resolve(args.file);
  if (!existsSync(file)) {
    toolLog.error(`File not found: ${file}`);
    return 1;
  }

  const label = sanitizeSegment(args.label ?? basename(file, extname(file)));
  const outDir = args.outDir ? resolve(args.outDir) : resolveDataDir("transcripts");
  mkdirSync(outDir, { recursive: true });

  const chat = createConfiguredChat(cfg);
  const outcome = await runPipeline(
    { requesterId: "local", label, acquire: async () => file, removeSource: false },
    new NoopProgress(),
    {
      stt: await getSttProvider(),
      chat,
      audioDir: resolveDataDir("audio"),
      transcriptsDir: outDir,
      settings: pipelineSettingsFromConfig(cfg),
    }
  );

  if (!outcome.ok) {
    toolLog.error(`Transcription failed: ${outcome.userMessage}`);
    return 1;
  }

  console.log(`Transcript: ${outcome.transcript.formattedPath}`);
  console.log(`Raw:        ${outcome.transcript.rawPath}`);
  if (outcome.failedWindows > 0) {
    console.log(`Warning: ${outcome.failedWindows}/${outcome.windows} windows could not be transcribed`);
  }

  if (args.summary) {
    const summary = await summarize(outcome.transcript.formatted, chat, {
      detailed: args.summary === "detailed",
      chunkChars: cfg.refine.chunkChars,
      boundary: cfg.refine.boundary,
    });
    if (summary.status !== "ok") {
      toolLog.error(`Summary not written: ${summary.message}`);
      return 1;
    }
    const summaryPath = join(outDir, `${label}_summary_${args.summary}.txt`);
    await writeFile(summaryPath, summary.summary.text, "utf8");
    console.log(`Summary:    ${summaryPath}`);
  }

  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    toolLog.error(`Fatal: ${describeError(err)}`);
    process.exit(1);
  });
