/** Thrown when a timestamp or subtitle block cannot be parsed */
export class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ParseError';
  }
}

/** Thrown when a cue or word has invalid timing (zero/negative duration, negative start) */
export class InvalidCueError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidCueError';
  }
}

/** The encoder ran but exited with a failure code */
export class EncodeFailedError extends Error {
  constructor(
    public readonly exitCode: number | null,
    public readonly log: string,
  ) {
    super(`FFmpeg failed with exit code ${exitCode ?? 'unknown'}`);
    this.name = 'EncodeFailedError';
  }
}

/** The encoder binary is missing or cannot be started */
export class ProcessLaunchFailedError extends Error {
  constructor(binary: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : cause ? String(cause) : 'not found';
    super(`Failed to launch "${binary}": ${reason}. Make sure FFmpeg is installed.`);
    this.name = 'ProcessLaunchFailedError';
  }
}

/** The render was aborted through its AbortSignal */
export class RenderCancelledError extends Error {
  constructor() {
    super('Render cancelled');
    this.name = 'RenderCancelledError';
  }
}

/** A handler received a payload of the wrong shape */
export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(`Invalid request: ${message}`);
    this.name = 'InvalidRequestError';
  }
}
