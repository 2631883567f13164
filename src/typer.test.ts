import { describe, it, expect, vi } from "vitest";
import { CommandTyper, detectDisplayServer, resolveTyperCommand, typerCommandFor } from "./typer.js";
import { InputInjectionError } from "./errors.js";

function createSilentLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

describe("detectDisplayServer", () => {
  it("detects Wayland from the session type or display", () => {
    expect(detectDisplayServer({ XDG_SESSION_TYPE: "Wayland" })).toBe("wayland");
    expect(detectDisplayServer({ WAYLAND_DISPLAY: "wayland-0" })).toBe("wayland");
  });

  it("falls back to X11", () => {
    expect(detectDisplayServer({ XDG_SESSION_TYPE: "x11", DISPLAY: ":0" })).toBe("x11");
    expect(detectDisplayServer({})).toBe("x11");
  });
});

describe("resolveTyperCommand", () => {
  it("picks the tool for the session type", () => {
    expect(resolveTyperCommand(undefined, { WAYLAND_DISPLAY: "wayland-0" })).toEqual(typerCommandFor("wayland"));
    expect(resolveTyperCommand("  ", {})).toEqual({
      command: "xdotool",
      args: ["type", "--clearmodifiers", "--"],
    });
  });

  it("prefers an explicit command line", () => {
    expect(resolveTyperCommand("ydotool type --", { WAYLAND_DISPLAY: "wayland-0" })).toEqual({
      command: "ydotool",
      args: ["type", "--"],
    });
  });
});

describe("CommandTyper", () => {
  it("passes the text as the last argument", async () => {
    const runner = vi.fn(async () => undefined);
    const typer = new CommandTyper(typerCommandFor("wayland"), runner, createSilentLogger());

    await typer.type("-rf hello");

    expect(runner).toHaveBeenCalledWith("wtype", ["--", "-rf hello"]);
  });

  it("does nothing for empty text", async () => {
    const runner = vi.fn(async () => undefined);
    const typer = new CommandTyper(typerCommandFor("x11"), runner, createSilentLogger());

    await typer.type("");

    expect(runner).not.toHaveBeenCalled();
  });

  it("wraps tool failures in InputInjectionError", async () => {
    const runner = vi.fn(async () => {
      throw new Error("spawn xdotool ENOENT");
    });
    const typer = new CommandTyper(typerCommandFor("x11"), runner, createSilentLogger());

    const failure = typer.type("hello");
    await expect(failure).rejects.toBeInstanceOf(InputInjectionError);
    await expect(failure).rejects.toThrow("xdotool failed: spawn xdotool ENOENT");
  });
});
