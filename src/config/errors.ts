/** Raised while wiring collaborators from invalid or incomplete settings. */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
