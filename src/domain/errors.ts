/**
 * Error hierarchy for the journal.
 *
 * Every domain error carries a stable `code` so the HTTP layer can map it
 * to a status without string-matching messages.
 */
export class JournalError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed path at registration or send time. Never normalized. */
export class PathFormatError extends JournalError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super('PATH_FORMAT', `Invalid journal path '${path}': ${reason}`);
    this.path = path;
  }
}

/** A destination refused or failed to take delivery of rendered content. */
export class DeliveryFailure extends JournalError {
  readonly destinationId: string;

  constructor(destinationId: string, message: string, options?: ErrorOptions) {
    super('DELIVERY_FAILED', message, options);
    this.destinationId = destinationId;
  }
}

/** Router lifecycle misuse (double start, start after stop). */
export class RouterStateError extends JournalError {
  constructor(message: string) {
    super('ROUTER_STATE', message);
  }
}

export class UnknownDestinationError extends JournalError {
  readonly destinationId: string;

  constructor(destinationId: string) {
    super('UNKNOWN_DESTINATION', `No destination configured with id '${destinationId}'`);
    this.destinationId = destinationId;
  }
}

/** Manual sends may not target the root path. */
export class RootBroadcastError extends JournalError {
  constructor() {
    super('ROOT_BROADCAST', 'Cannot broadcast on /');
  }
}

export class ConfigError extends JournalError {
  constructor(message: string, options?: ErrorOptions) {
    super('CONFIG', message, options);
  }
}
