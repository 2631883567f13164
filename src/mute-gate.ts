// Mute Gate
// Exclusive flag held while a competing voice channel (TTS playback, a call,
// a manual mute) is active. The orchestrator refuses to start recording while
// another owner holds it.
//
// FileMuteGate shares the flag across processes: the lock file exists while the
// gate is held and contains the owner's name. Creation uses O_EXCL ("wx"), so
// two processes cannot both acquire it.

import { open, readFile, unlink } from "node:fs/promises";

export interface MuteGate {
  /** Returns true when `owner` holds the gate afterwards (re-acquiring is allowed). */
  acquire(owner: string): Promise<boolean>;
  /** Returns true when the gate was held by `owner` and is now free. */
  release(owner: string): Promise<boolean>;
  /** Current owner, or null when the gate is free. */
  holder(): Promise<string | null>;
}

export async function isHeldByOther(gate: MuteGate, owner: string): Promise<boolean> {
  const current = await gate.holder();
  return current !== null && current !== owner;
}

export class InMemoryMuteGate implements MuteGate {
  private owner: string | null = null;

  async acquire(owner: string): Promise<boolean> {
    if (this.owner === null) {
      this.owner = owner;
      return true;
    }
    return this.owner === owner;
  }

  async release(owner: string): Promise<boolean> {
    if (this.owner !== owner) return false;
    this.owner = null;
    return true;
  }

  async holder(): Promise<string | null> {
    return this.owner;
  }
}

/** Placeholder owner for a lock file written by a process that left it empty. */
export const UNKNOWN_OWNER = "unknown";

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export class FileMuteGate implements MuteGate {
  readonly lockPath: string;

  constructor(lockPath: string) {
    this.lockPath = lockPath;
  }

  async acquire(owner: string): Promise<boolean> {
    try {
      const handle = await open(this.lockPath, "wx");
      try {
        await handle.writeFile(owner, "utf-8");
      } finally {
        await handle.close();
      }
      return true;
    } catch (err) {
      if (errorCode(err) !== "EEXIST") throw err;
      return (await this.holder()) === owner;
    }
  }

  async release(owner: string): Promise<boolean> {
    const current = await this.holder();
    if (current === null || current !== owner) return false;
    await this.removeLockFile();
    return true;
  }

  async holder(): Promise<string | null> {
    try {
      const content = await readFile(this.lockPath, "utf-8");
      return content.trim() || UNKNOWN_OWNER;
    } catch (err) {
      if (errorCode(err) === "ENOENT") return null;
      throw err;
    }
  }

  private async removeLockFile(): Promise<void> {
    try {
      await unlink(this.lockPath);
    } catch (err) {
      if (errorCode(err) !== "ENOENT") throw err;
    }
  }
}
