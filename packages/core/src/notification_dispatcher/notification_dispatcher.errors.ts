export class DispatcherError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DispatcherError";
    Object.setPrototypeOf(this, DispatcherError.prototype);
  }
}

export class ChannelRegistrationError extends DispatcherError {
  constructor(
    public readonly channelName: string,
    reason: string
  ) {
    super(`ChannelRegistration: ${channelName}: ${reason}`);
    this.name = "ChannelRegistrationError";
    Object.setPrototypeOf(this, ChannelRegistrationError.prototype);
  }
}

/** Channel config that cannot be turned into a channel (unknown type, missing parameter) */
export class ChannelConfigError extends DispatcherError {
  constructor(
    public readonly channelName: string,
    reason: string
  ) {
    super(`ChannelConfig: ${channelName}: ${reason}`);
    this.name = "ChannelConfigError";
    Object.setPrototypeOf(this, ChannelConfigError.prototype);
  }
}

export function isDispatcherError(error: unknown): error is DispatcherError {
  return error instanceof DispatcherError;
}

export function isChannelConfigError(error: unknown): error is ChannelConfigError {
  return error instanceof ChannelConfigError;
}
