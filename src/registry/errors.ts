export class DuplicateRegistrationError extends Error {
  constructor(description: string) {
    super(`A handler is already registered for ${description}`);
    this.name = "DuplicateRegistrationError";
  }
}

export class InvalidRegistrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidRegistrationError";
  }
}

export class GroupAlreadyLoadedError extends Error {
  constructor(name: string) {
    super(`Handler group '${name}' is already loaded`);
    this.name = "GroupAlreadyLoadedError";
  }
}
