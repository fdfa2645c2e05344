/** The model roster handed to a stage is empty or repeats an id. */
export class RosterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RosterError';
  }
}

/** A config file failed to parse or validate, or names a provider that does not exist. */
export class ConfigError extends Error {
  constructor(
    message: string,
    public issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join('\n')}` : message);
    this.name = 'ConfigError';
  }
}
