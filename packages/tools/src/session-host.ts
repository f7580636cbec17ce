import type { GameSession } from "@lantern/session";
import type { SessionSnapshot } from "@lantern/schemas";
import { EngineTransitionError, errorMessage } from "@lantern/schemas";

export type SessionFactory = () => Promise<GameSession>;

/**
 * Owns the one live session. The session starts on first use; after a fatal
 * engine error it is closed and dropped, and the next request starts over.
 */
export class SessionHost {
  private factory: SessionFactory;
  private current: GameSession | null = null;
  private starting: Promise<GameSession> | null = null;

  constructor(factory: SessionFactory) {
    this.factory = factory;
  }

  get active(): GameSession | null {
    return this.current;
  }

  snapshot(): SessionSnapshot | null {
    return this.current?.snapshot() ?? null;
  }

  session(): Promise<GameSession> {
    if (this.current) return Promise.resolve(this.current);
    if (!this.starting) {
      this.starting = this.factory()
        .then((session) => {
          this.current = session;
          console.log(`[session] Started "${session.gameName}"`);
          return session;
        })
        .finally(() => {
          this.starting = null;
        });
    }
    return this.starting;
  }

  async run<T>(operation: (session: GameSession) => Promise<T>): Promise<T> {
    const session = await this.session();
    try {
      return await operation(session);
    } catch (err) {
      if (err instanceof EngineTransitionError) {
        console.warn(`[session] ${err.message}; the next request starts a fresh game`);
        await this.discard(session);
      }
      throw err;
    }
  }

  async close(): Promise<void> {
    if (this.current) await this.discard(this.current);
  }

  private async discard(session: GameSession): Promise<void> {
    if (this.current === session) this.current = null;
    try {
      await session.close();
    } catch (err) {
      console.warn(`[session] Closing "${session.gameName}" failed: ${errorMessage(err)}`);
    }
  }
}
