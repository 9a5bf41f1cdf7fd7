/**
 * Error taxonomy shared by the store, the identity resolver and the API.
 *
 * `code` is stable and surfaced to clients verbatim; `status` is the HTTP
 * status the API answers with.
 */

export class JamError extends Error {
  readonly code: string;
  readonly status: number;

  constructor(message: string, code: string, status: number) {
    super(message);
    this.name = 'JamError';
    this.code = code;
    this.status = status;
  }
}

export class UnknownJam extends JamError {
  constructor(jamId: string) {
    super(`Jam not found: ${jamId}`, 'UNKNOWN_JAM', 404);
    this.name = 'UnknownJam';
  }
}

export class UnknownSong extends JamError {
  constructor(songId: string) {
    super(`Song not found: ${songId}`, 'UNKNOWN_SONG', 404);
    this.name = 'UnknownSong';
  }
}

export class UnknownAttendee extends JamError {
  constructor(attendeeId: string) {
    super(`Attendee not found: ${attendeeId}`, 'UNKNOWN_ATTENDEE', 404);
    this.name = 'UnknownAttendee';
  }
}

export class DuplicateRegistration extends JamError {
  constructor() {
    super('Already registered to perform this song', 'DUPLICATE_REGISTRATION', 409);
    this.name = 'DuplicateRegistration';
  }
}

export class PerformanceLimitExceeded extends JamError {
  readonly limit: number;

  constructor(limit: number) {
    super(`You can register for at most ${limit} songs in this jam`, 'PERFORMANCE_LIMIT_EXCEEDED', 409);
    this.name = 'PerformanceLimitExceeded';
    this.limit = limit;
  }
}

export class NotRegistered extends JamError {
  constructor() {
    super('Not registered to perform this song', 'NOT_REGISTERED', 404);
    this.name = 'NotRegistered';
  }
}

export class SongAlreadyInJam extends JamError {
  constructor(songId: string) {
    super(`Song already in jam: ${songId}`, 'SONG_ALREADY_IN_JAM', 409);
    this.name = 'SongAlreadyInJam';
  }
}

export class NameTaken extends JamError {
  constructor(name: string) {
    super(`Name already taken in this jam: ${name}`, 'NAME_TAKEN', 409);
    this.name = 'NameTaken';
  }
}

export class InvalidRequest extends JamError {
  constructor(message: string) {
    super(message, 'INVALID_REQUEST', 400);
    this.name = 'InvalidRequest';
  }
}

export class Forbidden extends JamError {
  constructor(message = 'Manager access required') {
    super(message, 'FORBIDDEN', 403);
    this.name = 'Forbidden';
  }
}

export class StoreUnavailable extends JamError {
  constructor(cause?: unknown) {
    super('Store temporarily unavailable, try again', 'STORE_UNAVAILABLE', 503);
    this.name = 'StoreUnavailable';
    if (cause !== undefined) this.cause = cause;
  }
}

export class MutationTimeout extends JamError {
  constructor(ms: number) {
    super(`Request timed out after ${ms}ms`, 'MUTATION_TIMEOUT', 503);
    this.name = 'MutationTimeout';
  }
}

export function isJamError(err: unknown): err is JamError {
  return err instanceof JamError;
}
