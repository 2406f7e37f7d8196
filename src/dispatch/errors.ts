export class AlreadyRespondedError extends Error {
  readonly interactionId: string;

  constructor(interactionId: string) {
    super(`Interaction ${interactionId} has already been responded to`);
    this.name = "AlreadyRespondedError";
    this.interactionId = interactionId;
  }
}

export class EmptyResponseError extends Error {
  constructor(handler: string) {
    super(`Handler ${handler} returned no response and committed none`);
    this.name = "EmptyResponseError";
  }
}
