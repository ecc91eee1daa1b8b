/**
 * Persisted portal session state.
 *
 * The browser's storage state (cookies + localStorage) is written to a single
 * JSON file so a restart can act as the logged-in user without a new login.
 * Writes go to a temp file in the same directory and are renamed into place,
 * so a crash mid-write leaves either the old file or the new one, never a
 * truncated file that restore() would accept.
 */

import { randomUUID } from "crypto";
import { mkdir, readFile, rename, rm, writeFile } from "fs/promises";
import { dirname } from "path";
import { z } from "zod";

const cookieSchema = z.object({
  name: z.string(),
  value: z.string(),
  domain: z.string(),
  path: z.string(),
  expires: z.number(),
  httpOnly: z.boolean(),
  secure: z.boolean(),
  sameSite: z.enum(["Strict", "Lax", "None"]),
});

const originSchema = z.object({
  origin: z.string(),
  localStorage: z.array(z.object({ name: z.string(), value: z.string() })),
});

export const storageStateSchema = z.object({
  cookies: z.array(cookieSchema),
  origins: z.array(originSchema),
});

export const persistedSessionSchema = z.object({
  version: z.literal(1),
  savedAt: z.string().datetime(),
  storageState: storageStateSchema,
});

export type StorageState = z.infer<typeof storageStateSchema>;
export type PersistedSessionState = z.infer<typeof persistedSessionSchema>;

export type RestoreResult =
  | { status: "valid"; state: PersistedSessionState }
  | { status: "missing" }
  | { status: "corrupt"; reason: string };

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Read and validate the session file. Never throws for a bad file: a missing
 * file is "missing", anything unreadable or off-schema is "corrupt".
 */
export async function readSessionState(file: string): Promise<RestoreResult> {
  let content: string;
  try {
    content = await readFile(file, "utf-8");
  } catch (error) {
    if (isNotFound(error)) return { status: "missing" };
    return { status: "corrupt", reason: `unreadable: ${error instanceof Error ? error.message : String(error)}` };
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch {
    return { status: "corrupt", reason: "not valid JSON" };
  }

  const parsed = persistedSessionSchema.safeParse(json);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    return {
      status: "corrupt",
      reason: `unexpected shape at ${first.path.join(".") || "root"}: ${first.message}`,
    };
  }

  return { status: "valid", state: parsed.data };
}

/**
 * Atomically replace the session file with the given storage state.
 */
export async function writeSessionState(
  file: string,
  storageState: StorageState,
  now: Date = new Date()
): Promise<PersistedSessionState> {
  const state: PersistedSessionState = {
    version: 1,
    savedAt: now.toISOString(),
    storageState,
  };

  await mkdir(dirname(file), { recursive: true });
  const tmp = `${file}.${process.pid}.${randomUUID()}.tmp`;
  try {
    await writeFile(tmp, JSON.stringify(state, null, 2), { encoding: "utf-8", mode: 0o600 });
    await rename(tmp, file);
  } catch (error) {
    await rm(tmp, { force: true });
    throw error;
  }
  return state;
}

/** Remove the persisted session so the next start does not reuse it. */
export async function discardSessionState(file: string): Promise<void> {
  await rm(file, { force: true });
}
