import { promises as fs } from "node:fs";
import path from "node:path";

import type { CookieJar } from "tough-cookie";

import { DEVICE_TRACKING_COOKIE } from "../constants";
import { isRecord } from "../json";
import type { Logger } from "../logger";
import { createEmptySnapshot, type SessionFields, type SessionSnapshot } from "./sessionState";

export interface FileSystemLike {
  mkdir(path: string, options?: { recursive?: boolean }): Promise<unknown>;
  readFile(path: string, encoding: "utf8"): Promise<string>;
  writeFile(path: string, data: string, encoding: "utf8"): Promise<void>;
  rm(path: string, options?: { force?: boolean }): Promise<void>;
}

export interface SessionStore {
  load(): Promise<SessionSnapshot>;
  save(snapshot: SessionSnapshot): Promise<void>;
  clear(): Promise<void>;
}

export interface FileSessionStoreOptions {
  readonly directory: string;
  readonly accountName: string;
  readonly logger: Logger;
  readonly fs?: FileSystemLike;
}

const isMissingFile = (error: unknown): boolean =>
  isRecord(error) && error.code === "ENOENT";

const normalizeFs = (customFs?: FileSystemLike): FileSystemLike => {
  if (customFs) {
    return customFs;
  }
  return {
    mkdir: (target, options) => fs.mkdir(target, options),
    readFile: (target, encoding) => fs.readFile(target, encoding),
    writeFile: (target, data, encoding) => fs.writeFile(target, data, encoding),
    rm: (target, options) => fs.rm(target, options)
  } satisfies FileSystemLike;
};

/** Strips everything but word characters so the account name is safe as a file name. */
export const sanitizeAccountName = (accountName: string): string => accountName.replace(/\W/g, "");

const parseFields = (raw: string): SessionFields | null => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) {
    return null;
  }
  const fields: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === "string") {
      fields[key] = value;
    }
  }
  return fields;
};

const parseCookieJar = (raw: string): CookieJar.Serialized | null => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) {
    return null;
  }
  const rawCookies = parsed.cookies;
  if (!Array.isArray(rawCookies)) {
    return null;
  }
  const cookies = rawCookies.filter(
    (cookie: unknown) => isRecord(cookie) && typeof cookie.key === "string" && cookie.key !== DEVICE_TRACKING_COOKIE
  );
  return {
    version: typeof parsed.version === "string" ? parsed.version : "tough-cookie",
    storeType: typeof parsed.storeType === "string" ? parsed.storeType : "MemoryCookieStore",
    rejectPublicSuffixes: parsed.rejectPublicSuffixes !== false,
    cookies
  };
};

/**
 * Persists a session as two files beside each other: `<account>.session` holds the flat token
 * map as JSON and `<account>.cookiejar` the serialized cookie jar.  Unreadable files are treated
 * as an empty session; failed writes are logged and otherwise ignored.
 */
export const createFileSessionStore = (options: FileSessionStoreOptions): SessionStore => {
  const fsApi = normalizeFs(options.fs);
  const logger = options.logger;
  const baseName = sanitizeAccountName(options.accountName);
  const sessionPath = path.join(options.directory, `${baseName}.session`);
  const cookieJarPath = path.join(options.directory, `${baseName}.cookiejar`);

  const readOptional = async (target: string): Promise<string | null> => {
    try {
      return await fsApi.readFile(target, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        logger.info("Session file not found", { path: target });
      } else {
        logger.warn("Failed to read session file", {
          path: target,
          error: error instanceof Error ? error.message : String(error)
        });
      }
      return null;
    }
  };

  return {
    async load() {
      const empty = createEmptySnapshot();
      const rawFields = await readOptional(sessionPath);
      const rawCookies = await readOptional(cookieJarPath);

      let fields = empty.fields;
      if (rawFields !== null) {
        const parsed = parseFields(rawFields);
        if (parsed) {
          fields = parsed;
        } else {
          logger.warn("Session file is corrupt, starting with an empty session", { path: sessionPath });
        }
      }

      let cookies = empty.cookies;
      if (rawCookies !== null) {
        const parsed = parseCookieJar(rawCookies);
        if (parsed) {
          cookies = parsed;
        } else {
          logger.warn("Cookie jar is corrupt, starting without cookies", { path: cookieJarPath });
        }
      }

      logger.debug("Loaded session", { path: sessionPath, fields: Object.keys(fields).length });
      return { fields, cookies };
    },

    async save(snapshot) {
      try {
        await fsApi.mkdir(options.directory, { recursive: true });
        await fsApi.writeFile(sessionPath, JSON.stringify(snapshot.fields, null, 2), "utf8");
        if (snapshot.cookies) {
          await fsApi.writeFile(cookieJarPath, JSON.stringify(snapshot.cookies), "utf8");
        }
        logger.debug("Saved session", { path: sessionPath });
      } catch (error) {
        logger.warn("Failed to persist session", {
          path: sessionPath,
          error: error instanceof Error ? error.message : String(error)
        });
      }
    },

    async clear() {
      await fsApi.rm(sessionPath, { force: true });
      await fsApi.rm(cookieJarPath, { force: true });
    }
  } satisfies SessionStore;
};

export const createInMemorySessionStore = (initial: SessionSnapshot = createEmptySnapshot()): SessionStore => {
  let current: SessionSnapshot = initial;
  return {
    async load() {
      return current;
    },
    async save(snapshot) {
      current = snapshot;
    },
    async clear() {
      current = createEmptySnapshot();
    }
  } satisfies SessionStore;
};
