import fs from 'node:fs';
import path from 'node:path';
import { v4 as uuidv4, validate as isUuid } from 'uuid';

import { InvalidFileError, SessionCleanupError, describeError } from '../errors';
import type { Session } from '../rag/schema';

const hasErrorCode = (error: unknown, code: string): boolean =>
  error instanceof Error && 'code' in error && error.code === code;

const isInside = (parent: string, child: string): boolean => {
  const relative = path.relative(parent, child);
  return Boolean(relative) && !relative.startsWith('..') && !path.isAbsolute(relative);
};

/**
 * Owns one directory per session under `baseDir`. Session ids are UUIDs, so
 * an id can never name anything outside the base directory.
 */
export class SessionManager {
  readonly baseDir: string;

  private readonly sessions = new Map<string, Session>();

  constructor(baseDir: string) {
    this.baseDir = path.resolve(baseDir);
    fs.mkdirSync(this.baseDir, { recursive: true });
  }

  private assertSessionId(sessionId: string): void {
    if (!isUuid(sessionId)) {
      throw new InvalidFileError(`Invalid session id "${sessionId}".`);
    }
  }

  async create(): Promise<Session> {
    const id = uuidv4();
    const directory = this.getSessionDir(id);

    await fs.promises.mkdir(directory, { recursive: true });

    const session: Session = { id, directory, closed: false };
    this.sessions.set(id, session);

    console.info(`[SESSION] Created session: ${id}`);
    return session;
  }

  get(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  /** Forgets a finished session's handle; its directory stays until cleanup. */
  release(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  getSessionDir(sessionId: string): string {
    this.assertSessionId(sessionId);
    return path.join(this.baseDir, sessionId);
  }

  async save(session: Session, filename: string, content: Uint8Array): Promise<string> {
    if (session.closed) {
      throw new InvalidFileError(`Session ${session.id} has already been cleaned up.`);
    }

    const baseName = path.basename(filename.replace(/\\/g, '/'));

    if (!baseName || baseName === '.' || baseName === '..' || baseName !== filename) {
      throw new InvalidFileError(`Invalid filename "${filename}".`);
    }

    const directory = this.getSessionDir(session.id);
    const filePath = path.resolve(directory, baseName);

    if (!isInside(directory, filePath)) {
      throw new InvalidFileError(`Filename "${filename}" resolves outside the session directory.`);
    }

    await fs.promises.mkdir(directory, { recursive: true });

    const { name, ext } = path.parse(baseName);

    // Uploads sharing a name are kept side by side as name_2.ext, name_3.ext, ...
    for (let copy = 1; ; copy += 1) {
      const target = copy === 1 ? filePath : path.join(directory, `${name}_${copy}${ext}`);

      try {
        await fs.promises.writeFile(target, content, { flag: 'wx' });
      } catch (error) {
        if (hasErrorCode(error, 'EEXIST')) {
          continue;
        }
        throw error;
      }

      console.info(`[SESSION] Saved file ${path.basename(target)} to session ${session.id}`);
      return target;
    }
  }

  /** Absolute path of a saved file, or undefined if it is missing or outside the session. */
  async resolveFile(sessionId: string, filename: string): Promise<string | undefined> {
    if (!isUuid(sessionId)) {
      return undefined;
    }

    const directory = this.getSessionDir(sessionId);
    const filePath = path.resolve(directory, filename);

    if (!isInside(directory, filePath)) {
      return undefined;
    }

    try {
      const stats = await fs.promises.stat(filePath);
      return stats.isFile() ? filePath : undefined;
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return undefined;
      }
      throw error;
    }
  }

  /**
   * Closes the session and removes its directory. Returns false when there
   * was nothing left to remove; safe to call repeatedly.
   */
  async cleanup(sessionOrId: Session | string): Promise<boolean> {
    const sessionId = typeof sessionOrId === 'string' ? sessionOrId : sessionOrId.id;
    this.assertSessionId(sessionId);

    const session = typeof sessionOrId === 'string' ? this.sessions.get(sessionId) : sessionOrId;
    if (session) {
      session.closed = true;
    }
    this.sessions.delete(sessionId);

    const directory = this.getSessionDir(sessionId);

    if (!fs.existsSync(directory)) {
      return false;
    }

    try {
      await fs.promises.rm(directory, { recursive: true, force: true });
    } catch (error) {
      console.error(`[SESSION] Error cleaning up session ${sessionId}: ${describeError(error)}`);
      throw new SessionCleanupError(sessionId, `Failed to remove files for session ${sessionId}.`, { cause: error });
    }

    console.info(`[SESSION] Cleaned up session: ${sessionId}`);
    return true;
  }

  /** Ids of session directories last modified more than `maxAgeMs` ago. */
  async findExpiredSessions(maxAgeMs: number, now: number = Date.now()): Promise<string[]> {
    const entries = await fs.promises.readdir(this.baseDir, { withFileTypes: true });
    const expired: string[] = [];

    for (const entry of entries) {
      if (!entry.isDirectory() || !isUuid(entry.name)) {
        continue;
      }

      try {
        const stats = await fs.promises.stat(path.join(this.baseDir, entry.name));

        if (now - stats.mtimeMs > maxAgeMs) {
          expired.push(entry.name);
        }
      } catch (error) {
        console.error(`[SESSION] Error checking session ${entry.name}: ${describeError(error)}`);
      }
    }

    return expired;
  }
}
