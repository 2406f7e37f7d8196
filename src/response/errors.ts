export class UnsupportedResponseElementError extends Error {
  readonly elementType: string;

  constructor(elementType: string) {
    super(`Unsupported response element of type ${elementType}`);
    this.name = "UnsupportedResponseElementError";
    this.elementType = elementType;
  }
}

export class UndeliverableResponseError extends Error {
  constructor(kind: string) {
    super(`A response of kind ${kind} cannot be delivered as a follow-up message`);
    this.name = "UndeliverableResponseError";
  }
}
