export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class InvalidDateError extends Error {
  constructor(readonly input: string) {
    super(`Invalid date "${input}", expected YYYY-MM-DD`);
    this.name = 'InvalidDateError';
  }
}
