export class InvalidConfigurationError extends Error {
  constructor(
    readonly option: string,
    readonly analyzerName: string,
    message: string,
  ) {
    super(message);
    this.name = "InvalidConfigurationError";
  }
}
