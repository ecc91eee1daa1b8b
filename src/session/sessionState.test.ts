import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync, statSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import {
  readSessionState,
  writeSessionState,
  discardSessionState,
  type StorageState,
} from "./sessionState.ts";

const STORAGE: StorageState = {
  cookies: [
    {
      name: ".AspNet.Cookies",
      value: "test-cookie-value",
      domain: "portal.example.com",
      path: "/",
      expires: 1893456000,
      httpOnly: true,
      secure: true,
      sameSite: "Lax",
    },
  ],
  origins: [
    { origin: "https://portal.example.com", localStorage: [{ name: "tenant", value: "100" }] },
  ],
};

let dir: string;
let file: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "session-state-test-"));
  file = join(dir, "nested", "session.json");
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("readSessionState", () => {
  test("missing file is reported as missing", async () => {
    expect(await readSessionState(file)).toEqual({ status: "missing" });
  });

  test("invalid JSON is reported as corrupt", async () => {
    await writeSessionState(file, STORAGE);
    writeFileSync(file, '{"version":1,"savedAt":', "utf-8");
    expect(await readSessionState(file)).toEqual({ status: "corrupt", reason: "not valid JSON" });
  });

  test("wrong shape is reported as corrupt with the offending path", async () => {
    await writeSessionState(file, STORAGE);
    writeFileSync(
      file,
      JSON.stringify({ version: 1, savedAt: "2026-01-01T00:00:00.000Z", storageState: { cookies: "x", origins: [] } }),
      "utf-8"
    );
    const result = await readSessionState(file);
    expect(result.status).toBe("corrupt");
    expect(result.status === "corrupt" && result.reason).toBe(
      "unexpected shape at storageState.cookies: Expected array, received string"
    );
  });

  test("unknown version is corrupt", async () => {
    await writeSessionState(file, STORAGE);
    writeFileSync(file, JSON.stringify({ version: 2, savedAt: "2026-01-01T00:00:00.000Z", storageState: STORAGE }));
    expect((await readSessionState(file)).status).toBe("corrupt");
  });
});

describe("writeSessionState", () => {
  test("round-trips through readSessionState", async () => {
    const saved = await writeSessionState(file, STORAGE, new Date("2026-10-19T03:00:00.000Z"));
    expect(saved.savedAt).toBe("2026-10-19T03:00:00.000Z");
    expect(await readSessionState(file)).toEqual({ status: "valid", state: saved });
  });

  test("restore is idempotent for an unmodified file", async () => {
    await writeSessionState(file, STORAGE);
    const first = await readSessionState(file);
    const second = await readSessionState(file);
    expect(second).toEqual(first);
  });

  test("replaces the file wholesale and leaves no temp files", async () => {
    await writeSessionState(file, STORAGE);
    await writeSessionState(file, { cookies: [], origins: [] });

    const content = JSON.parse(readFileSync(file, "utf-8"));
    expect(content.storageState).toEqual({ cookies: [], origins: [] });
    expect(readdirSync(join(dir, "nested"))).toEqual(["session.json"]);
  });

  test("writes the file readable by the owner only", async () => {
    await writeSessionState(file, STORAGE);
    expect(statSync(file).mode & 0o777).toBe(0o600);
  });
});

describe("discardSessionState", () => {
  test("removes the file and tolerates a missing one", async () => {
    await writeSessionState(file, STORAGE);
    await discardSessionState(file);
    expect(await readSessionState(file)).toEqual({ status: "missing" });
    await expect(discardSessionState(file)).resolves.toBeUndefined();
  });
});
