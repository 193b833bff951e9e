import { errorMessage, log } from "./logger.js";

export type Cleanup = () => Promise<unknown> | void;

const cleanups = new Set<Cleanup>();

/** Registers a best-effort cleanup for SIGINT; call the returned function once the work is done. */
export function onInterrupt(cleanup: Cleanup): () => void {
  cleanups.add(cleanup);
  return () => {
    cleanups.delete(cleanup);
  };
}

export async function runInterruptCleanups(): Promise<void> {
  const pending = [...cleanups];
  cleanups.clear();

  for (const cleanup of pending) {
    try {
      await cleanup();
    } catch (error) {
      log("warn", "Cleanup failed", { error: errorMessage(error) });
    }
  }
}

export function installInterruptHandler(notify: (message: string) => void): void {
  process.once("SIGINT", () => {
    notify("Cleaning up...");
    runInterruptCleanups().then(
      () => {
        notify("Done. Exiting gracefully.");
        process.exit(130);
      },
      (error: unknown) => {
        log("error", "Interrupt cleanup failed", { error: errorMessage(error) });
        process.exit(130);
      }
    );
  });
}
