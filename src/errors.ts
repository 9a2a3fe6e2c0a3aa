export class NetworkError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    public cause?: unknown
  ) {
    super(message);
    this.name = "NetworkError";
  }
}

export class ParseError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "ParseError";
  }
}
