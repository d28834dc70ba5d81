/**
 * Error taxonomy shared by the codec, protocol, net and state layers.
 *
 * - `configuration` errors are fatal to the call that raised them
 *   (duplicate registration, unknown state, ambiguous role, bind/connect failure).
 * - `protocol` errors concern a single message; the connection stays open.
 *
 * Connection failures are never thrown: they surface as disconnect events.
 */
export type ErrorCategory = "configuration" | "protocol";

export class HostlinkError extends Error {
  readonly category: ErrorCategory;

  constructor(category: ErrorCategory, message: string) {
    super(message);
    this.name = new.target.name;
    this.category = category;
  }
}

export class ConfigurationError extends HostlinkError {
  constructor(message: string) {
    super("configuration", message);
  }
}

/** A message type name was registered twice on the same registry */
export class DuplicateMessageTypeError extends ConfigurationError {
  constructor(readonly kind: string) {
    super(`Cannot register message type "${kind}": already registered`);
  }
}

/** A message type has no serializable fields, or the tag space is exhausted */
export class MessageSchemaError extends ConfigurationError {}

/** DUAL managers need an explicit role; single-role managers only serve their own */
export class AmbiguousRoleError extends ConfigurationError {}

export class UnknownStateError extends ConfigurationError {
  constructor(readonly stateName: string, message = `Unknown state name: ${stateName}`) {
    super(message);
  }
}

/** Bind or connect failure, or a transport started twice */
export class TransportError extends ConfigurationError {}

export class ProtocolError extends HostlinkError {
  constructor(message: string) {
    super("protocol", message);
  }
}

export class UnregisteredMessageError extends ProtocolError {
  constructor(readonly kind: string) {
    super(`Attempted to send message of unregistered type: ${kind}`);
  }
}

export class UnknownTagError extends ProtocolError {
  constructor(readonly tag: number | undefined) {
    super(
      tag === undefined
        ? "Received empty frame: missing type tag"
        : `No message type registered for tag ${tag}`
    );
  }
}

export class DecodeError extends ProtocolError {}

export class EncodeError extends ProtocolError {}
