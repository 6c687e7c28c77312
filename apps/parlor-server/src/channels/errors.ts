/** Base for errors the handler reports back to clients by `code` */
export class ChannelError extends Error {
  constructor(
    readonly code: string,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bookkeeping bug in a collaborator: the channel refuses the operation and stays consistent */
export class InvariantViolation extends ChannelError {
  constructor(message: string, code = "INVARIANT_VIOLATION") {
    super(code, message);
  }
}

export class DuplicateMemberError extends InvariantViolation {
  constructor(channel: string, memberId: number) {
    super(`Member ${memberId} already joined ${channel}`, "ALREADY_JOINED");
  }
}

export class ChannelDestroyedError extends InvariantViolation {
  constructor(channel: string) {
    super(`Channel ${channel} no longer exists`, "CHANNEL_DESTROYED");
  }
}

/** The directory does not hold the channel it was asked to remove */
export class DirectoryInconsistencyError extends ChannelError {
  constructor(channel: string) {
    super("DIRECTORY_INCONSISTENT", `Directory does not hold ${channel}`);
  }
}
