/**
 * Clipboard service for cross-platform clipboard operations.
 */
import { spawn } from "node:child_process"
import { Context, Effect, Layer } from "effect"
import { ClipboardError } from "../errors"

// =============================================================================
// Process Helpers
// =============================================================================

const pipeTo = (command: string, args: ReadonlyArray<string>, input: string) =>
  new Promise<void>((resolve, reject) => {
    const child = spawn(command, [...args], { stdio: ["pipe", "ignore", "ignore"] })
    child.once("error", reject)
    child.once("close", (code) => {
      if (code === 0) resolve()
      else reject(new Error(`${command} exited with code ${code}`))
    })
    child.stdin.end(input)
  })

// =============================================================================
// Clipboard Service
// =============================================================================

export class Clipboard extends Context.Tag("@everyfind/Clipboard")<
  Clipboard,
  {
    /** Write text to the system clipboard */
    readonly write: (text: string) => Effect.Effect<void, ClipboardError>
  }
>() {
  /** Production layer - uses platform-specific clipboard commands */
  static readonly layer = Layer.sync(Clipboard, () => {
    const platform = process.platform

    const attemptWrite = (command: string, args: ReadonlyArray<string>, text: string) =>
      Effect.tryPromise({
        try: () => pipeTo(command, args, text),
        catch: (error) => new ClipboardError({ operation: "write", cause: error }),
      })

    const write = (text: string): Effect.Effect<void, ClipboardError> => {
      const attempt =
        platform === "darwin"
          ? attemptWrite("pbcopy", [], text)
          : platform === "win32"
            ? attemptWrite("clip", [], text)
            : // Try xclip first, fall back to xsel
              attemptWrite("xclip", ["-selection", "clipboard"], text).pipe(
                Effect.orElse(() => attemptWrite("xsel", ["--clipboard", "--input"], text))
              )

      return attempt.pipe(
        Effect.timeout("5 seconds"),
        Effect.catchTag("TimeoutException", () =>
          new ClipboardError({
            operation: "write",
            cause: new Error("Clipboard write timed out"),
          })
        )
      )
    }

    return Clipboard.of({ write })
  })

  /** Records every write into `writes` instead of touching the system clipboard */
  static readonly recording = (writes: Array<string>) =>
    Layer.succeed(Clipboard, {
      write: (text: string) => Effect.sync(() => void writes.push(text)),
    })

  /** Test layer - writes succeed without side effects */
  static readonly testLayer = Layer.succeed(Clipboard, {
    write: () => Effect.void,
  })
}
