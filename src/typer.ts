// Types transcribed text into the focused window through an input tool.
// Wayland sessions use wtype, X11 sessions use xdotool; TYPER_COMMAND overrides
// both (the text is passed as the last argument).

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { Typer } from "./session-orchestrator.js";
import { InputInjectionError } from "./errors.js";
import { splitCommandLine } from "./audio-capture.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";

export type DisplayServer = "wayland" | "x11";

export type CommandRunner = (command: string, args: readonly string[]) => Promise<void>;

export interface TyperCommand {
  command: string;
  /** Arguments placed before the text. */
  args: readonly string[];
}

const execFileAsync = promisify(execFile);

const defaultRunner: CommandRunner = async (command, args) => {
  await execFileAsync(command, [...args], { timeout: 30_000 });
};

export function detectDisplayServer(env: NodeJS.ProcessEnv): DisplayServer {
  if (env.XDG_SESSION_TYPE?.toLowerCase() === "wayland" || env.WAYLAND_DISPLAY) {
    return "wayland";
  }
  return "x11";
}

export function typerCommandFor(display: DisplayServer): TyperCommand {
  switch (display) {
    case "wayland":
      return { command: "wtype", args: ["--"] };
    case "x11":
      return { command: "xdotool", args: ["type", "--clearmodifiers", "--"] };
    default: {
      const exhaustiveCheck: never = display;
      throw new Error(`Unknown display server: ${String(exhaustiveCheck)}`);
    }
  }
}

/** Resolves the typing tool from an explicit command line or the session type. */
export function resolveTyperCommand(commandLine: string | undefined, env: NodeJS.ProcessEnv): TyperCommand {
  if (commandLine && commandLine.trim().length > 0) {
    return splitCommandLine(commandLine);
  }
  return typerCommandFor(detectDisplayServer(env));
}

export class CommandTyper implements Typer {
  readonly command: TyperCommand;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor(command: TyperCommand, runner: CommandRunner = defaultRunner, logger: Logger = createLogger("Typer")) {
    this.command = command;
    this.runner = runner;
    this.logger = logger;
  }

  async type(text: string): Promise<void> {
    if (text.length === 0) return;

    try {
      await this.runner(this.command.command, [...this.command.args, text]);
    } catch (err) {
      throw new InputInjectionError(`${this.command.command} failed: ${errorMessage(err)}`);
    }
    this.logger.debug(`Typed ${text.length} chars via ${this.command.command}`);
  }
}
