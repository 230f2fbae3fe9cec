export class VistaskError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A single typed observation was required but none matched. */
export class NoObservationsError extends VistaskError {
  constructor(message = 'No observations') {
    super(message);
  }
}

export class UnsupportedTaskError extends VistaskError {
  constructor(
    readonly kind: string,
    readonly requiredLevel: number,
    readonly capabilityLevel: number,
  ) {
    super(`Task "${kind}" requires capability level ${requiredLevel}, engine provides ${capabilityLevel}`);
  }
}

export class InvalidOptionsError extends VistaskError {}

export class ImageDecodeError extends VistaskError {}

export class UnsupportedRequestError extends VistaskError {
  constructor(readonly requestName: string) {
    super(`No detector registered for ${requestName}`);
  }
}

export class RequestNotCompletedError extends VistaskError {
  constructor(readonly requestName: string) {
    super(`${requestName} was never completed by the engine`);
  }
}
