// File: src/utils/processRunner.test.ts
// Purpose: launchProcess の spawn 呼び出しとエラー変換を検証する。
// Reason: 実行ファイルが無い場合や Windows 向け引数の組み立てを実プロセスなしで確認するため。
// Related: src/utils/processRunner.ts, src/utils/argEscaper.ts, src/errors.ts

import { EventEmitter } from "events";
import { PassThrough } from "stream";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { LaunchError } from "../errors";
import { launchProcess } from "./processRunner";

const { spawnMock } = vi.hoisted(() => ({ spawnMock: vi.fn() }));

vi.mock("child_process", () => ({ spawn: spawnMock }));

class FakeChild extends EventEmitter {
  readonly pid = 321;
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly kill = vi.fn(() => true);
}

let children: FakeChild[] = [];

function lastChild(): FakeChild {
  const child = children[children.length - 1];
  if (!child) throw new Error("spawn was not called");
  return child;
}

beforeEach(() => {
  children = [];
  spawnMock.mockReset();
  spawnMock.mockImplementation(() => {
    const child = new FakeChild();
    children.push(child);
    return child;
  });
});

describe("launchProcess", () => {
  it("spawn イベントでハンドルを返し、POSIX では引数をそのまま渡す", async () => {
    const pending = launchProcess(
      { command: "/usr/bin/prince", args: ["--structured-log=normal", "my file.html"] },
      { cwd: "/tmp/work", platform: "linux" }
    );
    lastChild().emit("spawn");
    const handle = await pending;

    expect(handle.pid).toBe(321);
    expect(spawnMock).toHaveBeenCalledTimes(1);
    expect(spawnMock.mock.calls[0][0]).toBe("/usr/bin/prince");
    expect(spawnMock.mock.calls[0][1]).toEqual(["--structured-log=normal", "my file.html"]);
    expect(spawnMock.mock.calls[0][2]).toMatchObject({
      cwd: "/tmp/work",
      stdio: "pipe",
      shell: false,
      windowsVerbatimArguments: false,
      argv0: undefined,
    });
  });

  it("Windows では各引数をエスケープし、実行ファイル名を argv0 に渡す", async () => {
    const pending = launchProcess(
      { command: "C:\\Program Files\\Prince\\prince.exe", args: ["--structured-log=normal", "my file.html", 'a"b'] },
      { platform: "win32" }
    );
    lastChild().emit("spawn");
    await pending;

    expect(spawnMock.mock.calls[0][1]).toEqual(["--structured-log=normal", '"my file.html"', 'a\\"b']);
    expect(spawnMock.mock.calls[0][2]).toMatchObject({
      windowsVerbatimArguments: true,
      argv0: '"C:\\Program Files\\Prince\\prince.exe"',
    });
  });

  it("起動前の error イベントは LaunchError になる", async () => {
    const pending = launchProcess({ command: "/nope/prince", args: [] }, { platform: "linux" });
    const enoent = Object.assign(new Error("spawn /nope/prince ENOENT"), { code: "ENOENT" });
    lastChild().emit("error", enoent);

    const error = await pending.catch((reason: unknown) => reason);
    expect(error).toBeInstanceOf(LaunchError);
    if (error instanceof LaunchError) {
      expect(error.message).toBe("Failed to execute /nope/prince: spawn /nope/prince ENOENT");
      expect(error.code).toBe("ENOENT");
      expect(error.command).toBe("/nope/prince");
      expect(error.cause).toBe(enoent);
    }
  });

  it("spawn が同期的に投げた例外も LaunchError になる", async () => {
    spawnMock.mockImplementationOnce(() => {
      throw new TypeError("bad option");
    });

    await expect(launchProcess({ command: "prince", args: [] }, { platform: "linux" })).rejects.toThrow(
      "Failed to execute prince: bad option"
    );
  });

  it("起動後のエラーは exited の error に入る", async () => {
    const pending = launchProcess({ command: "prince", args: [] }, { platform: "linux" });
    const child = lastChild();
    child.emit("spawn");
    const handle = await pending;

    const aborted = new Error("The operation was aborted");
    child.emit("error", aborted);
    child.emit("close", null, "SIGTERM");

    await expect(handle.exited).resolves.toEqual({ code: null, signal: "SIGTERM", error: aborted });
  });

  it("正常終了では終了コードだけを返す", async () => {
    const pending = launchProcess({ command: "prince", args: [] }, { platform: "linux" });
    const child = lastChild();
    child.emit("spawn");
    const handle = await pending;

    child.emit("close", 0, null);
    await expect(handle.exited).resolves.toEqual({ code: 0, signal: null });
  });

  it("kill は子プロセスに転送する", async () => {
    const pending = launchProcess({ command: "prince", args: [] }, { platform: "linux" });
    const child = lastChild();
    child.emit("spawn");
    const handle = await pending;

    handle.kill("SIGKILL");
    expect(child.kill).toHaveBeenCalledWith("SIGKILL");
  });

  it("spawn 完了前の abort は abort 理由で reject する", async () => {
    const controller = new AbortController();
    const reason = new Error("cancelled while starting");
    const pending = launchProcess({ command: "prince", args: [] }, { platform: "linux", signal: controller.signal });

    controller.abort(reason);
    lastChild().emit("error", Object.assign(new Error("The operation was aborted"), { name: "AbortError" }));

    await expect(pending).rejects.toBe(reason);
  });

  it("既に abort 済みのシグナルでは起動しない", async () => {
    const controller = new AbortController();
    controller.abort(new Error("cancelled"));

    await expect(
      launchProcess({ command: "prince", args: [] }, { platform: "linux", signal: controller.signal })
    ).rejects.toThrow("cancelled");
    expect(spawnMock).not.toHaveBeenCalled();
  });
});
