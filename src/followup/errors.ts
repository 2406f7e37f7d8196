export class FollowupHttpError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(args: { method: string; path: string; status: number; body: string }) {
    super(`Follow-up request ${args.method} ${args.path} failed: ${args.status} ${args.body}`);
    this.name = "FollowupHttpError";
    this.status = args.status;
    this.body = args.body;
  }
}
