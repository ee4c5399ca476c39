export class CommandFrameworkError extends Error {
  constructor(message: string, readonly code: string) {
    super(message);
    this.name = "CommandFrameworkError";
  }
}

/** A command could not be built from its component list. */
export class ConstructionError extends CommandFrameworkError {
  constructor(message: string) {
    super(message, "CONSTRUCTION_ERROR");
    this.name = "ConstructionError";
  }
}

/** A builder operation was called without what it depends on (usually a manager). */
export class UsageError extends CommandFrameworkError {
  constructor(message: string) {
    super(message, "USAGE_ERROR");
    this.name = "UsageError";
  }
}

export class RegistrationError extends CommandFrameworkError {
  constructor(message: string, readonly commandName: string) {
    super(message, "REGISTRATION_ERROR");
    this.name = "RegistrationError";
  }
}

export class ArgumentParseError extends CommandFrameworkError {
  constructor(message: string) {
    super(message, "PARSE_ERROR");
    this.name = "ArgumentParseError";
  }
}
