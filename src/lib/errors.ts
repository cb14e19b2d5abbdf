// Error taxonomy for liftlog

export class LiftlogError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Store or model backend unreachable, non-2xx, `ok:false`, or malformed payload */
export class UpstreamError extends LiftlogError {}

/** Model output is not valid JSON or does not satisfy the workout schema */
export class ParseError extends LiftlogError {}

/** Checkpoint could not be written durably */
export class PersistenceError extends LiftlogError {}

/** Missing or invalid configuration or operator input; fatal before a run starts */
export class ConfigError extends LiftlogError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
