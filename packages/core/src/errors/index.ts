const DISABLE_STACKTRACE : boolean = true;

export class SalsaError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name  = new.target.name;
    if (DISABLE_STACKTRACE) this.stack = undefined;
  }
}

/* Rejected input, raised before any state change */
export class ValidationError           extends SalsaError {}
export class InvalidKeyLengthError     extends ValidationError {}
export class InvalidNonceLengthError   extends ValidationError {}
export class InvalidKeyFormatError     extends ValidationError {}
export class InvalidPartialLengthError extends ValidationError {}
export class InvalidArgumentError      extends ValidationError {}

/* Programmer error: the engine is not in a state that allows the call */
export class MisuseError               extends SalsaError {}
export class CounterExhaustedError     extends MisuseError {}

/* I/O, owned by the runtime glue */
export class ResourceError             extends SalsaError {}
export class FilesystemError           extends ResourceError {}
