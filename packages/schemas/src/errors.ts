/** A read-side engine call (valid actions, dictionary, state capture) failed. */
export class EngineFailureError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EngineFailureError";
  }
}

/** The engine has no way to perform the requested operation at all. */
export class EngineCapabilityError extends EngineFailureError {
  constructor(message: string) {
    super(message);
    this.name = "EngineCapabilityError";
  }
}

/**
 * A state-changing engine call (step, restore) failed. The session's cached
 * state can no longer be trusted; callers should recreate the session.
 */
export class EngineTransitionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EngineTransitionError";
  }
}

export class SlotNotFoundError extends Error {
  readonly slotName: string;

  constructor(slotName: string) {
    super(`No save found in slot '${slotName}'`);
    this.name = "SlotNotFoundError";
    this.slotName = slotName;
  }
}

export class GameNotFoundError extends Error {
  readonly game: string;
  readonly available: string[];

  constructor(game: string, available: string[]) {
    const hint = available.length > 0 ? `available: ${available.join(", ")}` : "no story files found";
    super(`Game "${game}" not found (${hint})`);
    this.name = "GameNotFoundError";
    this.game = game;
    this.available = available;
  }
}

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TimeoutError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
