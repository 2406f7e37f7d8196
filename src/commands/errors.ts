export class InvalidCommandDefinitionError extends Error {
  constructor(command: string, reason: string) {
    super(`Invalid command definition '${command}': ${reason}`);
    this.name = "InvalidCommandDefinitionError";
  }
}

export class CommandSyncError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(args: { path: string; status: number; body: string }) {
    super(`Command sync PUT ${args.path} failed: ${args.status} ${args.body}`);
    this.name = "CommandSyncError";
    this.status = args.status;
    this.body = args.body;
  }
}
