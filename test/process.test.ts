import { readdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { runToCompletion, runWithDeadline, TIMED_OUT } from "../src/process.js";
import { makeTempDir, removeDir } from "./helpers.js";

describe("runWithDeadline", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    await writeFile(join(dir, "in.txt"), "hello\n");
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("binds stdin and stdout to files", async () => {
    const exit = await runWithDeadline(
      { command: process.execPath, args: ["-e", "process.stdin.pipe(process.stdout)"] },
      { stdinPath: join(dir, "in.txt"), stdoutPath: join(dir, "out.txt"), timeoutMs: 5000 }
    );

    expect(exit).toBe(0);
    expect(await readFile(join(dir, "out.txt"), "utf8")).toBe("hello\n");
  });

  it("returns the timeout sentinel when the deadline passes", async () => {
    const exit = await runWithDeadline(
      { command: process.execPath, args: ["-e", "setInterval(() => {}, 1000)"] },
      { stdinPath: join(dir, "in.txt"), stdoutPath: join(dir, "out.txt"), timeoutMs: 200 }
    );

    expect(exit).toBe(TIMED_OUT);
  });

  it.runIf(process.platform === "linux")("closes stdin when stdout cannot be opened", async () => {
    const before = (await readdir("/proc/self/fd")).length;

    await expect(
      runWithDeadline(
        { command: process.execPath, args: ["-e", ""] },
        { stdinPath: join(dir, "in.txt"), stdoutPath: join(dir, "missing", "out.txt"), timeoutMs: 5000 }
      )
    ).rejects.toThrow("ENOENT");

    expect((await readdir("/proc/self/fd")).length).toBe(before);
  });
});

describe("runToCompletion", () => {
  it("captures output and the exit code", async () => {
    const result = await runToCompletion({
      command: process.execPath,
      args: ["-e", "process.stdout.write('out'); process.stderr.write('err'); process.exit(4)"]
    });

    expect(result).toEqual({ exitCode: 4, stdout: "out", stderr: "err" });
  });
});
