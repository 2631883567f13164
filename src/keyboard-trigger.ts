// Keyboard Trigger
// Reads line commands from stdin or a key-listener pipe:
//   ""/"toggle" → toggle, "start", "stop", "repeat" (type the last transcription again)

import { createInterface, type Interface } from "node:readline";
import type { Readable } from "node:stream";
import { TriggerSource } from "./types.js";
import { createCommand, type SessionOrchestrator } from "./session-orchestrator.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";

export type KeyboardAction = "toggle" | "start" | "stop" | "repeat";

/** Returns null for input that is not a keyboard command. */
export function parseKeyboardLine(line: string): KeyboardAction | null {
  switch (line.trim().toLowerCase()) {
    case "":
    case "toggle":
      return "toggle";
    case "start":
      return "start";
    case "stop":
      return "stop";
    case "repeat":
      return "repeat";
    default:
      return null;
  }
}

export class KeyboardTrigger {
  private readonly orchestrator: SessionOrchestrator;
  private readonly logger: Logger;
  private lines: Interface | null = null;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(orchestrator: SessionOrchestrator, logger: Logger = createLogger("KeyboardTrigger")) {
    this.orchestrator = orchestrator;
    this.logger = logger;
  }

  start(input: Readable): void {
    if (this.lines) return;
    this.lines = createInterface({ input, crlfDelay: Infinity });
    // Each line goes straight to the orchestrator so a press during a slow
    // command is rejected there instead of waiting behind it.
    this.lines.on("line", (line) => {
      const handled = this.handleLine(line).finally(() => this.inFlight.delete(handled));
      this.inFlight.add(handled);
    });
    this.logger.info("Keyboard trigger listening (Enter = toggle, start, stop, repeat)");
  }

  stop(): void {
    this.lines?.close();
    this.lines = null;
  }

  /** Resolves once every line read so far has been handled. */
  async idle(): Promise<void> {
    await Promise.all(this.inFlight);
  }

  async handleLine(line: string): Promise<void> {
    const action = parseKeyboardLine(line);
    if (!action) {
      this.logger.warn(`Unknown keyboard command: ${line.trim()}`);
      return;
    }

    try {
      if (action === "repeat") {
        await this.orchestrator.repeatLast();
        return;
      }
      const result = await this.orchestrator.execute(createCommand(action, TriggerSource.KEYBOARD));
      if (!result.occurred) {
        this.logger.debug(`Keyboard ${action} rejected: ${result.rejection}`);
      }
    } catch (err) {
      this.logger.error(`Keyboard ${action} failed: ${errorMessage(err)}`);
    }
  }
}
