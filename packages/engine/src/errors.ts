export class InvalidParameterError extends Error {
  readonly code = 'INVALID_PARAMETER';

  constructor(
    public parameter: string,
    message: string,
  ) {
    super(message);
    this.name = 'InvalidParameterError';
  }
}
