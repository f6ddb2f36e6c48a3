/**
 * ShellActions service: hands a path to the desktop to open it or show it in
 * its folder.
 */
import { spawn } from "node:child_process"
import path from "node:path"
import { Context, Effect, Layer } from "effect"
import { ShellActionError } from "../errors"

export type ShellAction = ShellActionError["action"]

export interface ShellCommand {
  readonly command: string
  readonly args: ReadonlyArray<string>
}

export interface ShellCall {
  readonly action: ShellAction
  readonly path: string
}

/** Command that performs `action` on `target` for the given platform */
export const shellCommandFor = (
  action: ShellAction,
  target: string,
  platform: NodeJS.Platform
): ShellCommand => {
  switch (platform) {
    case "win32":
      return action === "open"
        ? { command: "rundll32", args: ["url.dll,FileProtocolHandler", target] }
        : { command: "explorer", args: [`/select,${target}`] }
    case "darwin":
      return action === "open"
        ? { command: "open", args: [target] }
        : { command: "open", args: ["-R", target] }
    default:
      // xdg-open has no "select" mode; reveal opens the containing folder
      return action === "open"
        ? { command: "xdg-open", args: [target] }
        : { command: "xdg-open", args: [path.dirname(target)] }
  }
}

/** Start a detached process; resolves once it has spawned */
const launchDetached = ({ command, args }: ShellCommand) =>
  new Promise<void>((resolve, reject) => {
    const child = spawn(command, [...args], { detached: true, stdio: "ignore" })
    child.once("error", reject)
    child.once("spawn", () => {
      child.unref()
      resolve()
    })
  })

export class ShellActions extends Context.Tag("@everyfind/ShellActions")<
  ShellActions,
  {
    /** Open the file with its associated application */
    readonly open: (target: string) => Effect.Effect<void, ShellActionError>
    /** Open the containing folder with the file selected */
    readonly reveal: (target: string) => Effect.Effect<void, ShellActionError>
  }
>() {
  /** Production layer - platform launchers */
  static readonly layer = Layer.sync(ShellActions, () => {
    const platform = process.platform

    const run = (action: ShellAction, target: string) =>
      Effect.tryPromise({
        try: () => launchDetached(shellCommandFor(action, target, platform)),
        catch: (cause) => new ShellActionError({ action, path: target, cause }),
      }).pipe(Effect.withSpan(`ShellActions.${action}`))

    return ShellActions.of({
      open: (target) => run("open", target),
      reveal: (target) => run("reveal", target),
    })
  })

  /** Records every call into `calls` instead of launching anything */
  static readonly recording = (calls: Array<ShellCall>) =>
    Layer.succeed(ShellActions, {
      open: (target: string) => Effect.sync(() => void calls.push({ action: "open", path: target })),
      reveal: (target: string) =>
        Effect.sync(() => void calls.push({ action: "reveal", path: target })),
    })

  /** Test layer - every action succeeds without side effects */
  static readonly testLayer = Layer.succeed(ShellActions, {
    open: () => Effect.void,
    reveal: () => Effect.void,
  })
}
