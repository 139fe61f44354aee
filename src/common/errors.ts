export class BridgeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Invalid configuration at context creation. No context is produced.
export class ConfigError extends BridgeError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

// Unknown serializer name, mismatched serializer pairing or undecodable bytes.
export class SerializerError extends BridgeError {}

// Malformed call arguments, or a call on a stopped context.
export class ContextError extends BridgeError {}

// Anything the engine raised while ingesting or running a job.
export class EngineError extends BridgeError {
  static from(e: unknown): EngineError {
    if (e instanceof EngineError) {
      return e;
    }
    const message = e instanceof Error ? e.message : String(e);
    return new EngineError(message, { cause: e });
  }
}
