import { mkdir, open, readFile, rename, stat, unlink, type FileHandle } from "node:fs/promises";
import { dirname } from "node:path";
import { LedgerRaceConditionError } from "../errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";

export const STALE_LOCK_AGE_MS = 300000; // 5 minutes

export type LockOptions = {
  timeoutMs?: number;
  logger?: Logger;
};

export async function atomicWriteJson(path: string, data: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.tmp.${process.pid}.${Date.now()}.${Math.random().toString(16).slice(2)}`;
  const payload = JSON.stringify(data, null, 2) + "\n";

  let fh: FileHandle | null = null;
  try {
    fh = await open(tmp, "w");
    await fh.writeFile(payload, "utf8");
    await fh.sync();
    await fh.close();
    fh = null;

    await rename(tmp, path);
  } catch (e) {
    if (fh) await fh.close().catch(() => undefined);
    await unlink(tmp).catch(() => undefined);
    throw e;
  }
}

function isErrno(e: unknown, code: string): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === code;
}

function processAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

/** Remove the lock when it is older than STALE_LOCK_AGE_MS or its owner has exited. */
async function clearAbandonedLock(lockPath: string, owner: string, logger: Logger): Promise<void> {
  let age: number;
  try {
    age = Date.now() - (await stat(lockPath)).mtimeMs;
  } catch (e) {
    if (isErrno(e, "ENOENT")) return;
    throw e;
  }

  if (age > STALE_LOCK_AGE_MS) {
    logger.warn("LOCK_STALE", `Removing stale lock (age: ${Math.round(age / 1000)}s): ${lockPath}`);
    await unlink(lockPath).catch(() => undefined);
    return;
  }

  const content = await readFile(lockPath, "utf8").catch(() => "");
  const [lockPid] = content.split("\n");
  if (lockPid && lockPid !== owner && !processAlive(Number(lockPid))) {
    logger.warn("LOCK_ORPHANED", `Removing orphaned lock (pid: ${lockPid}): ${lockPath}`);
    await unlink(lockPath).catch(() => undefined);
  }
}

/**
 * Exclusive lock file (`open(..., "wx")`) with backoff. Resolves to a
 * release function.
 *
 * @throws LedgerRaceConditionError when the lock is still held after `timeoutMs`
 */
export async function acquireFsLock(lockPath: string, opts: LockOptions = {}): Promise<() => Promise<void>> {
  const timeoutMs = opts.timeoutMs ?? 5000;
  const logger = opts.logger ?? silentLogger;
  await mkdir(dirname(lockPath), { recursive: true });

  const started = Date.now();
  const owner = String(process.pid);
  const token = `${owner}\n${Date.now()}\n${Math.random().toString(16).slice(2)}\n`;
  let retries = 0;

  for (;;) {
    await clearAbandonedLock(lockPath, owner, logger);

    try {
      const fh = await open(lockPath, "wx");
      try {
        await fh.writeFile(token, "utf8");
        await fh.sync();
      } finally {
        await fh.close();
      }

      return async () => {
        const content = await readFile(lockPath, "utf8").catch(() => "");
        if (content === token) {
          await unlink(lockPath);
        } else {
          logger.warn("LOCK_LOST", `Lock was taken over before release: ${lockPath}`);
        }
      };
    } catch (e) {
      if (!isErrno(e, "EEXIST")) throw e;

      retries++;
      if (Date.now() - started > timeoutMs) {
        throw new LedgerRaceConditionError(lockPath, retries);
      }

      const backoff = Math.min(10 * Math.pow(1.5, retries), 250);
      const jitter = Math.random() * backoff * 0.1;
      await new Promise((r) => setTimeout(r, backoff + jitter));
    }
  }
}
