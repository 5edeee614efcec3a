import fs from "node:fs";
import { resolvePidPath } from "./dataPaths.js";
import { log } from "./utils/logger.js";

const bootLog = log.withScope("boot");

/**
 * PID lock file so two bot processes never poll the same relay channel.
 */

function isPidRunning(pid: number): boolean {
  try {
    // signal 0 checks existence without killing
    process.kill(pid, 0);
    return true;
  } catch (err: unknown) {
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    // EPERM: exists but owned by someone else
    return code === "EPERM";
  }
}

export function acquireLock(lockFile: string = resolvePidPath()): boolean {
  const currentPid = process.pid;

  if (fs.existsSync(lockFile)) {
    const existingPid = parseInt(fs.readFileSync(lockFile, "utf8").trim(), 10);

    if (!isNaN(existingPid) && existingPid !== currentPid && isPidRunning(existingPid)) {
      bootLog.error(`Bot already running (PID ${existingPid}). Exiting.`);
      return false;
    }

    bootLog.info(`Stale lock file detected (PID ${existingPid}). Overwriting.`);
  }

  fs.writeFileSync(lockFile, currentPid.toString(), "utf8");
  bootLog.info(`PID lock acquired (${currentPid})`);
  process.once("exit", () => releaseLock(lockFile));
  return true;
}

export function releaseLock(lockFile: string = resolvePidPath()): void {
  if (!fs.existsSync(lockFile)) return;
  const owner = parseInt(fs.readFileSync(lockFile, "utf8").trim(), 10);
  if (owner !== process.pid) return;
  fs.unlinkSync(lockFile);
  bootLog.info("PID lock released");
}
